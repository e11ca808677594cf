import fs from 'fs-extra';
import path from 'path';
import { type BuildContext, type BuildPaths, type DependencyManifest, NODE_DIR, TOOLCHAIN_DIR, YARN_DIR } from './config';
import { presentLockfiles } from './analyzer';
import { InaccessiblePathError, MultipleLockfilesError, ToolchainDirectoryError, errorMessage } from './errors';
import { type ManifestIssues, readManifest } from './manifest';

async function assertWritableDirectory(label: string, dirPath: string, create: boolean): Promise<void> {
    try {
        if (create) await fs.ensureDir(dirPath);
        const stat = await fs.stat(dirPath);
        if (!stat.isDirectory()) {
            throw new InaccessiblePathError(label, dirPath, 'not a directory');
        }
        await fs.access(dirPath, fs.constants.R_OK | fs.constants.W_OK);
    } catch (error) {
        if (error instanceof InaccessiblePathError) throw error;
        throw new InaccessiblePathError(label, dirPath, errorMessage(error));
    }
}

/**
 * The three positional inputs must be usable directories. The cache directory
 * is created on the very first build.
 */
export async function checkPaths(paths: BuildPaths): Promise<void> {
    await assertWritableDirectory('Build directory', paths.buildDir, false);
    await assertWritableDirectory('Cache directory', paths.cacheDir, true);
    await assertWritableDirectory('Environment directory', paths.envDir, false);
}

/**
 * Fatal checks that run before anything in the build directory is changed.
 * Returns the parsed manifest so it is read exactly once.
 */
export async function runPreflight(context: BuildContext, issues?: ManifestIssues): Promise<DependencyManifest> {
    // 1. Conflicting lockfiles
    if (context.usesYarnLock && context.usesNpmLock) {
        throw new MultipleLockfilesError(await presentLockfiles(context.buildDir));
    }

    // 2. Toolchain directories that only the build itself may create
    for (const dir of [NODE_DIR, YARN_DIR]) {
        const relative = path.join(TOOLCHAIN_DIR, dir);
        if (await fs.pathExists(path.join(context.buildDir, relative))) {
            throw new ToolchainDirectoryError(relative);
        }
    }

    // 3. Manifest
    return readManifest(context.buildDir, issues);
}
