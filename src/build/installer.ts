import fs from 'fs-extra';
import path from 'path';
import { type BuildContext, type CommandSpec, type InstallPlan, InstallStrategy, MODULES_DIR } from './config';
import { Output } from './output';

const yarnInstall = (): CommandSpec => ({ command: 'yarn', args: ['install', '--frozen-lockfile', '--ignore-engines'] });
const npmRebuild = (): CommandSpec => ({ command: 'npm', args: ['rebuild'] });
const npmInstall = (): CommandSpec => ({ command: 'npm', args: ['install'] });

/**
 * Chooses how dependencies get installed. Pure: looks only at the context flags.
 *
 * A yarn lockfile always wins, even over checked-in node_modules, which yarn
 * cannot adopt and which are therefore discarded first.
 */
export function selectStrategy(context: BuildContext): InstallPlan {
    if (context.usesYarnLock) {
        return {
            strategy: InstallStrategy.YARN,
            packageManager: 'yarn',
            discardPrebuiltModules: context.hasPrebuiltModules,
            commands: [yarnInstall()]
        };
    }

    if (context.hasPrebuiltModules) {
        return {
            strategy: InstallStrategy.REBUILD,
            packageManager: 'npm',
            discardPrebuiltModules: false,
            commands: [npmRebuild(), npmInstall()]
        };
    }

    return {
        strategy: InstallStrategy.FRESH,
        packageManager: 'npm',
        discardPrebuiltModules: false,
        commands: [npmInstall()]
    };
}

export function describePlan(plan: InstallPlan): string {
    switch (plan.strategy) {
        case InstallStrategy.YARN:
            return 'Installing node modules (yarn.lock)';
        case InstallStrategy.REBUILD:
            return 'Rebuilding any native modules';
        case InstallStrategy.FRESH:
            return 'Installing node modules';
    }
}

/**
 * Removes node_modules that came with the source. Returns the context
 * reflecting the new state of the build directory.
 */
export async function discardPrebuiltModules(context: BuildContext, output: Output): Promise<BuildContext> {
    output.warn(
        'node_modules checked into source control',
        [
            'This project uses yarn, which cannot reuse a node_modules directory it did not create.',
            'The checked-in node_modules will be removed before installing.',
            'Add node_modules to .gitignore to avoid this.'
        ].join('\n')
    );
    await fs.remove(path.join(context.buildDir, MODULES_DIR));
    return { ...context, hasPrebuiltModules: false };
}
