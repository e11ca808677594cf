import fs from 'fs-extra';
import path from 'path';
import {
    type BuildContext,
    CACHE_NAMESPACE,
    CACHED_DIRECTORIES_DIR,
    type CacheStatus,
    DEFAULT_CACHE_DIRECTORIES,
    type DependencyManifest,
    SIGNATURE_FILE,
    type Signature
} from './config';
import { errorMessage } from './errors';
import { Output } from './output';
import { signaturesMatch } from './signature';

export type CopyDirectory = (from: string, to: string) => Promise<void>;

const copyDirectory: CopyDirectory = (from, to) => fs.copy(from, to, { preserveTimestamps: true });

export interface RestoreReport {
    restored: string[];
    skipped: { name: string; reason: 'exists' | 'not-cached' }[];
}

export interface SaveReport {
    saved: string[];
    missing: string[];
    failed: { name: string; error: string }[];
}

export function cacheRoot(context: BuildContext): string {
    return path.join(context.cacheDir, CACHE_NAMESPACE);
}

export function cachedDirectory(context: BuildContext, name: string): string {
    return path.join(cacheRoot(context), CACHED_DIRECTORIES_DIR, name);
}

export async function readStoredSignature(context: BuildContext): Promise<Signature | undefined> {
    const file = path.join(cacheRoot(context), SIGNATURE_FILE);
    if (!(await fs.pathExists(file))) return undefined;
    return fs.readFile(file, 'utf-8');
}

/**
 * Decides whether the stored cache was produced by the same toolchain as this build.
 */
export async function cacheStatus(context: BuildContext, signature: Signature): Promise<CacheStatus> {
    const stored = await readStoredSignature(context);
    if (stored === undefined) return 'absent';
    return signaturesMatch(stored, signature) ? 'valid' : 'invalid';
}

/**
 * The manifest's explicit list wins outright; otherwise the default pair.
 * Restore and save both go through here so the set cannot drift within a build.
 */
export function resolveCacheDirectories(manifest: DependencyManifest): string[] {
    return manifest.cacheDirectories ?? [...DEFAULT_CACHE_DIRECTORIES];
}

export async function restoreCache(context: BuildContext, names: string[], output: Output): Promise<RestoreReport> {
    const report: RestoreReport = { restored: [], skipped: [] };

    for (const name of names) {
        const cached = cachedDirectory(context, name);
        const target = path.join(context.buildDir, name);

        if (await fs.pathExists(target)) {
            output.info(`- ${name} (exists - skipping)`);
            report.skipped.push({ name, reason: 'exists' });
        } else if (await fs.pathExists(cached)) {
            output.info(`- ${name}`);
            await copyDirectory(cached, target);
            report.restored.push(name);
        } else {
            output.info(`- ${name} (not cached - skipping)`);
            report.skipped.push({ name, reason: 'not-cached' });
        }
    }

    return report;
}

/**
 * Replaces the cache store with the current directories and records the signature
 * they were built under. One directory failing to copy does not stop the rest.
 */
export async function saveCache(
    context: BuildContext,
    names: string[],
    signature: Signature,
    output: Output,
    copy: CopyDirectory = copyDirectory
): Promise<SaveReport> {
    const report: SaveReport = { saved: [], missing: [], failed: [] };
    const root = cacheRoot(context);

    await fs.remove(root);
    await fs.ensureDir(root);

    for (const name of names) {
        const source = path.join(context.buildDir, name);

        if (!(await fs.pathExists(source))) {
            output.info(`- ${name} (nothing to cache)`);
            report.missing.push(name);
            continue;
        }

        try {
            await copy(source, cachedDirectory(context, name));
            output.info(`- ${name}`);
            report.saved.push(name);
        } catch (error) {
            const message = errorMessage(error);
            output.warn(`Unable to cache ${name}`, message);
            report.failed.push({ name, error: message });
            await fs.remove(cachedDirectory(context, name));
        }
    }

    await fs.writeFile(path.join(root, SIGNATURE_FILE), signature);
    return report;
}
