import {
    type BuildContext,
    type CommandSpec,
    type DependencyManifest,
    type InstallPlan,
    POSTBUILD_HOOK,
    PREBUILD_HOOK,
    type PackageManager
} from './config';
import { describePlan } from './installer';
import { LogBuffer } from './log-buffer';
import { Output } from './output';
import type { SubprocessRunner } from './runner';

export type PipelineStage = 'prebuild' | 'install' | 'postbuild';
export type PipelineState = 'start' | PipelineStage | 'done' | 'failed';

export interface PipelineSuccess {
    status: 'done';
    history: PipelineState[];
}

export interface PipelineFailure {
    status: 'failed';
    stage: PipelineStage;
    command: string;
    exitCode: number;
    history: PipelineState[];
}

export type PipelineOutcome = PipelineSuccess | PipelineFailure;

export interface PipelineDeps {
    run: SubprocessRunner;
    log: LogBuffer;
    output: Output;
    env: Record<string, string>;
}

interface StageStep {
    stage: PipelineStage;
    title: string;
    commands: CommandSpec[]; // Empty when the stage has nothing to run
}

export function hookCommand(packageManager: PackageManager, hook: string): CommandSpec {
    return { command: packageManager, args: ['run', hook] };
}

function planStages(manifest: DependencyManifest, plan: InstallPlan): StageStep[] {
    const { packageManager } = plan;
    return [
        {
            stage: 'prebuild',
            title: `Running ${PREBUILD_HOOK}`,
            commands: manifest.hooks.prebuild ? [hookCommand(packageManager, PREBUILD_HOOK)] : []
        },
        { stage: 'install', title: describePlan(plan), commands: plan.commands },
        {
            stage: 'postbuild',
            title: `Running ${POSTBUILD_HOOK}`,
            commands: manifest.hooks.postbuild ? [hookCommand(packageManager, POSTBUILD_HOOK)] : []
        }
    ];
}

/**
 * Runs the prebuild hook, the install strategy and the postbuild hook in order.
 * The first non-zero exit ends the pipeline; later stages never start.
 */
export async function runInstallPipeline(
    context: BuildContext,
    manifest: DependencyManifest,
    plan: InstallPlan,
    deps: PipelineDeps
): Promise<PipelineOutcome> {
    const { run, log, output, env } = deps;
    const history: PipelineState[] = ['start'];

    for (const step of planStages(manifest, plan)) {
        history.push(step.stage);

        if (step.commands.length === 0) continue; // Hook not declared

        output.header(step.title);
        for (const { command, args } of step.commands) {
            const commandLine = [command, ...args].join(' ');
            output.info(commandLine);

            const { exitCode } = await run(command, args, {
                cwd: context.buildDir,
                env,
                onLine: (line) => {
                    log.append(line);
                    output.info(line);
                }
            });

            if (exitCode !== 0) {
                history.push('failed');
                return { status: 'failed', stage: step.stage, command: commandLine, exitCode, history };
            }
        }
    }

    history.push('done');
    return { status: 'done', history };
}
