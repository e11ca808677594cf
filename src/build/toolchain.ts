import path from 'path';
import * as semver from 'semver';
import {
    type BuildContext,
    DEFAULT_NODE_RANGE,
    DEFAULT_YARN_RANGE,
    type DependencyManifest,
    NODE_DIR,
    type PackageManager,
    TOOLCHAIN_DIR,
    type Toolchain,
    YARN_DIR
} from './config';
import { ToolchainError } from './errors';
import { Output } from './output';
import type { SubprocessRunner } from './runner';
import type { RuntimeInstaller, RuntimeSession } from './runtime';

/**
 * Runs `<command> --version` and returns the first line it prints.
 */
export async function probeVersion(run: SubprocessRunner, command: string, session: RuntimeSession): Promise<string> {
    const lines: string[] = [];
    const { exitCode } = await run(command, ['--version'], {
        cwd: session.cwd,
        env: session.env,
        onLine: (line) => lines.push(line)
    });
    const version = lines.map((line) => line.trim()).find((line) => line !== '');
    if (exitCode !== 0 || !version) {
        throw new ToolchainError(`Unable to determine the installed ${command} version`, { command, exitCode });
    }
    return version;
}

/**
 * Installs node (and npm or yarn as requested by engines) into the build
 * directory, then reports the versions actually in place.
 */
export async function installToolchain(
    context: BuildContext,
    manifest: DependencyManifest,
    packageManager: PackageManager,
    installer: RuntimeInstaller,
    run: SubprocessRunner,
    session: RuntimeSession,
    output: Output
): Promise<Toolchain> {
    const { engines } = manifest;
    const toolchainRoot = path.join(context.buildDir, TOOLCHAIN_DIR);

    output.header('Installing binaries');
    output.info(`engines.node (package.json):  ${engines.node ?? 'unspecified'}`);
    output.info(`engines.npm (package.json):   ${engines.npm ?? 'unspecified (use default)'}`);
    if (packageManager === 'yarn') {
        output.info(`engines.yarn (package.json):  ${engines.yarn ?? 'unspecified (use default)'}`);
    }

    // 1. Runtime
    const nodeRange = engines.node ?? DEFAULT_NODE_RANGE;
    output.info('');
    output.info(`Resolving node version ${nodeRange}...`);
    const nodeVersion = await installer.installNode(nodeRange, path.join(toolchainRoot, NODE_DIR), session);
    output.info(`Installed node ${nodeVersion}`);

    // 2. npm, only when engines asks for something the bundled one does not satisfy
    if (engines.npm) {
        const bundled = await probeVersion(run, 'npm', session);
        if (semver.satisfies(bundled, engines.npm)) {
            output.info(`npm ${bundled} already installed with node`);
        } else {
            output.info(`Bootstrapping npm ${engines.npm} (replacing ${bundled})...`);
            await installer.installNpm(engines.npm, session);
        }
    }

    // 3. yarn
    if (packageManager === 'yarn') {
        const yarnRange = engines.yarn ?? DEFAULT_YARN_RANGE;
        output.info(`Resolving yarn version ${yarnRange}...`);
        await installer.installYarn(yarnRange, path.join(toolchainRoot, YARN_DIR), session);
    }

    const toolchain: Toolchain = {
        packageManager,
        packageManagerVersion: await probeVersion(run, packageManager, session),
        runtimeVersion: await probeVersion(run, 'node', session)
    };
    output.info(`Using node ${toolchain.runtimeVersion} with ${packageManager} ${toolchain.packageManagerVersion}`);
    return toolchain;
}
