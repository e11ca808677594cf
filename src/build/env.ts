import fs from 'fs-extra';
import path from 'path';
import { BLOCKED_ENV_VARS, type BuildContext, type BuildSettings, MODULES_DIR, NODE_DIR, TOOLCHAIN_DIR, YARN_DIR } from './config';

export interface LoadedSettings {
    settings: BuildSettings;
    ignored: string[]; // Blocked variable names found in the environment directory
}

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Reads the environment directory: one file per variable, named after it.
 */
export async function loadEnvDir(envDir: string): Promise<Record<string, string>> {
    const vars: Record<string, string> = {};
    if (!(await fs.pathExists(envDir))) return vars;

    for (const name of (await fs.readdir(envDir)).sort()) {
        if (!VARIABLE_NAME.test(name)) continue;
        const filePath = path.join(envDir, name);
        if (!(await fs.stat(filePath)).isFile()) continue;
        const value = await fs.readFile(filePath, 'utf-8');
        vars[name] = value.replace(/\r?\n$/, '');
    }
    return vars;
}

export function parseToggle(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined) return fallback;
    switch (value.trim().toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
            return false;
        default:
            return fallback;
    }
}

/**
 * Merges the process environment with the environment directory (which wins)
 * and derives the build settings from the result.
 */
export function resolveSettings(
    processEnv: NodeJS.ProcessEnv,
    fileEnv: Record<string, string>,
    defaultStack: string
): LoadedSettings {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(processEnv)) {
        if (value !== undefined) env[key] = value;
    }

    const ignored: string[] = [];
    for (const [key, value] of Object.entries(fileEnv)) {
        if (BLOCKED_ENV_VARS.includes(key)) {
            ignored.push(key);
            continue;
        }
        env[key] = value;
    }

    const nodeEnv = env.NODE_ENV || 'production';
    return {
        settings: {
            cacheEnabled: parseToggle(env.NODE_MODULES_CACHE, true),
            verbose: parseToggle(env.NODE_VERBOSE, false),
            stack: env.STACK || defaultStack,
            nodeEnv,
            env: { ...env, NODE_ENV: nodeEnv }
        },
        ignored
    };
}

export async function loadSettings(
    envDir: string,
    processEnv: NodeJS.ProcessEnv,
    defaultStack: string = `${process.platform}-${process.arch}`
): Promise<LoadedSettings> {
    return resolveSettings(processEnv, await loadEnvDir(envDir), defaultStack);
}

export function toolchainBinDirs(buildDir: string): string[] {
    return [
        path.join(buildDir, TOOLCHAIN_DIR, NODE_DIR, 'bin'),
        path.join(buildDir, TOOLCHAIN_DIR, YARN_DIR, 'bin'),
        path.join(buildDir, MODULES_DIR, '.bin')
    ];
}

/**
 * Environment for every subprocess: installed toolchain first on PATH.
 */
export function buildSubprocessEnv(context: BuildContext, settings: BuildSettings): Record<string, string> {
    const searchPath = toolchainBinDirs(context.buildDir);
    if (settings.env.PATH) searchPath.push(settings.env.PATH);
    return { ...settings.env, PATH: searchPath.join(path.delimiter) };
}

const SHELL_WORD = /^[A-Za-z0-9_.,:/@%+=-]+$/;

/**
 * Quotes a value for use as a single shell word.
 */
export function shellQuote(value: string): string {
    if (SHELL_WORD.test(value)) return value;
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Writes the profile script sourced when the built application starts,
 * so the runtime sees the same toolchain the build used.
 */
export async function writeProfile(context: BuildContext, settings: BuildSettings): Promise<string> {
    const profileDir = path.join(context.buildDir, '.profile.d');
    await fs.ensureDir(profileDir);

    const home = (...segments: string[]) => ['$HOME', ...segments].join('/');
    const content = [
        `export PATH="${home(TOOLCHAIN_DIR, NODE_DIR, 'bin')}:${home(TOOLCHAIN_DIR, YARN_DIR, 'bin')}:$PATH:${home(MODULES_DIR, '.bin')}"`,
        `export NODE_ENV=\${NODE_ENV:-${shellQuote(settings.nodeEnv)}}`,
        ''
    ].join('\n');

    const profilePath = path.join(profileDir, 'depstage.sh');
    await fs.writeFile(profilePath, content);
    return profilePath;
}
