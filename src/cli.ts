#!/usr/bin/env node
import { Command } from 'commander';
import { compile, exitCodeFor } from './build/compile';
import { errorMessage } from './build/errors';
import { Output } from './build/output';
import { runSubprocess } from './build/runner';
import { DistributionRuntimeInstaller } from './build/runtime';

export function createProgram(output: Output = new Output()): Command {
    const program = new Command();

    program
        .name('depstage')
        .description('Install a Node.js project\'s dependencies for deployment, reusing a build cache')
        .argument('<build-dir>', 'checked-out application source')
        .argument('<cache-dir>', 'directory persisted between builds')
        .argument('<env-dir>', 'directory with one file per configuration variable')
        .action(async (buildDir: string, cacheDir: string, envDir: string) => {
            const outcome = await compile(
                { buildDir, cacheDir, envDir },
                {
                    run: runSubprocess,
                    runtime: new DistributionRuntimeInstaller(runSubprocess),
                    output,
                    processEnv: process.env
                }
            );
            process.exitCode = exitCodeFor(outcome);
        });

    return program;
}

if (require.main === module) {
    const output = new Output();
    createProgram(output)
        .parseAsync(process.argv)
        .catch((error: unknown) => {
            output.error('Build failed', errorMessage(error));
            process.exitCode = 1;
        });
}
