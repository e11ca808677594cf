import fs from 'fs-extra';
import path from 'path';
import { type BuildContext, type BuildPaths, MODULES_DIR, NPM_LOCKFILES, YARN_LOCKFILE } from './config';

async function anyExists(dir: string, names: string[]): Promise<boolean> {
    for (const name of names) {
        if (await fs.pathExists(path.join(dir, name))) return true;
    }
    return false;
}

/**
 * Probes the build directory once and captures what the installer needs to know about it.
 */
export async function analyzeBuild(paths: BuildPaths, stack: string): Promise<BuildContext> {
    const { buildDir } = paths;

    return {
        buildDir: path.resolve(buildDir),
        cacheDir: path.resolve(paths.cacheDir),
        envDir: path.resolve(paths.envDir),
        stack,
        hasPrebuiltModules: await fs.pathExists(path.join(buildDir, MODULES_DIR)),
        usesYarnLock: await fs.pathExists(path.join(buildDir, YARN_LOCKFILE)),
        usesNpmLock: await anyExists(buildDir, NPM_LOCKFILES)
    };
}

export async function presentLockfiles(buildDir: string): Promise<string[]> {
    const found: string[] = [];
    for (const name of [YARN_LOCKFILE, ...NPM_LOCKFILES]) {
        if (await fs.pathExists(path.join(buildDir, name))) found.push(name);
    }
    return found;
}
