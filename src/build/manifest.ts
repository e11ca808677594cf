import fs from 'fs-extra';
import path from 'path';
import {
    type DependencyManifest,
    type EngineConstraints,
    MANIFEST_FILE,
    NPM_LOCKFILES,
    POSTBUILD_HOOK,
    PREBUILD_HOOK
} from './config';
import { ManifestError } from './errors';

export interface ManifestIssues {
    ignoredCacheDirectories: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJsonFile(filePath: string): Promise<Record<string, unknown>> {
    let parsed: unknown;
    try {
        parsed = await fs.readJson(filePath);
    } catch (error) {
        const reason = error instanceof SyntaxError ? `invalid JSON (${error.message})` : String(error);
        throw new ManifestError(reason, filePath);
    }
    if (!isRecord(parsed)) {
        throw new ManifestError('top-level value must be an object', filePath);
    }
    return parsed;
}

/**
 * Looks up a dotted field (`engines.node`) in a JSON document.
 * Returns undefined when the file or any segment of the path is absent.
 */
export async function readManifestField(filePath: string, field: string): Promise<unknown> {
    if (!(await fs.pathExists(filePath))) return undefined;
    const document = await readJsonFile(filePath);
    return lookupField(document, field);
}

export function lookupField(document: unknown, field: string): unknown {
    let current: unknown = document;
    for (const segment of field.split('.')) {
        if (!isRecord(current)) return undefined;
        current = current[segment];
    }
    return current;
}

function stringField(document: unknown, field: string): string | undefined {
    const value = lookupField(document, field);
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

export function isSafeCacheDirectory(name: string): boolean {
    if (name.trim() === '' || path.isAbsolute(name)) return false;
    const normalized = path.normalize(name);
    return normalized !== '.' && normalized !== '..' && !normalized.startsWith(`..${path.sep}`);
}

/**
 * Parses the project's package.json into the fields the build consumes.
 * A missing or unparsable manifest is fatal.
 */
export async function readManifest(buildDir: string, issues?: ManifestIssues): Promise<DependencyManifest> {
    const manifestPath = path.join(buildDir, MANIFEST_FILE);
    if (!(await fs.pathExists(manifestPath))) {
        throw new ManifestError('file not found', manifestPath);
    }
    const pkg = await readJsonFile(manifestPath);

    const engines: EngineConstraints = {
        node: stringField(pkg, 'engines.node'),
        npm: stringField(pkg, 'engines.npm'),
        yarn: stringField(pkg, 'engines.yarn')
    };

    const declared = pkg.cacheDirectories ?? pkg.cache_directories;
    let cacheDirectories: string[] | undefined;
    if (Array.isArray(declared)) {
        cacheDirectories = [];
        for (const entry of declared) {
            if (typeof entry === 'string' && isSafeCacheDirectory(entry)) {
                cacheDirectories.push(path.normalize(entry));
            } else {
                issues?.ignoredCacheDirectories.push(String(entry));
            }
        }
    }

    const scripts = isRecord(pkg.scripts) ? pkg.scripts : {};

    return {
        engines,
        cacheDirectories,
        hooks: {
            prebuild: typeof scripts[PREBUILD_HOOK] === 'string',
            postbuild: typeof scripts[POSTBUILD_HOOK] === 'string'
        },
        hasStartScript: typeof scripts.start === 'string'
    };
}

/**
 * Returns the `lockfileVersion` of the npm lockfile, if there is one.
 */
export async function readLockfileVersion(buildDir: string): Promise<number | undefined> {
    for (const name of NPM_LOCKFILES) {
        const value = await readManifestField(path.join(buildDir, name), 'lockfileVersion');
        if (typeof value === 'number') return value;
    }
    return undefined;
}
