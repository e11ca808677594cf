import {
    type BuildContext,
    type BuildPaths,
    type BuildSettings,
    type CacheStatus,
    type DependencyManifest,
    InstallStrategy,
    type PackageManager,
    type Signature
} from './config';
import { analyzeBuild } from './analyzer';
import { cacheStatus, resolveCacheDirectories, restoreCache, saveCache } from './cache';
import { type Diagnostic, classify, describeExit } from './classifier';
import { buildSubprocessEnv, loadSettings, writeProfile } from './env';
import { PreconditionError, ToolchainError, errorMessage } from './errors';
import { discardPrebuiltModules, selectStrategy } from './installer';
import { LogBuffer } from './log-buffer';
import type { ManifestIssues } from './manifest';
import { Output } from './output';
import { type PipelineFailure, runInstallPipeline } from './pipeline';
import { checkPaths, runPreflight } from './preflight';
import type { SubprocessRunner } from './runner';
import type { RuntimeInstaller, RuntimeSession } from './runtime';
import { computeSignature } from './signature';
import { installToolchain } from './toolchain';
import { type BuildWarning, collectPreinstallWarnings, postinstallWarnings, reportWarnings } from './warnings';

export interface CompileDeps {
    run: SubprocessRunner;
    runtime: RuntimeInstaller;
    output: Output;
    processEnv: NodeJS.ProcessEnv;
    defaultStack?: string;
}

export type BuildPhase = 'precondition' | 'toolchain' | 'pipeline';

export interface BuildSuccess {
    status: 'succeeded';
    strategy: InstallStrategy;
    cache: CacheStatus | 'disabled';
    signature: Signature;
    log: LogBuffer;
}

export interface BuildFailure {
    status: 'failed';
    phase: BuildPhase;
    message: string;
    diagnostics: Diagnostic[];
    log: LogBuffer;
}

export type BuildOutcome = BuildSuccess | BuildFailure;

interface PreparedBuild {
    context: BuildContext;
    manifest: DependencyManifest;
    settings: BuildSettings;
    warnings: BuildWarning[];
}

export function exitCodeFor(outcome: BuildOutcome): number {
    return outcome.status === 'succeeded' ? 0 : 1;
}

/**
 * Everything that can reject the build before the build directory is touched.
 */
async function prepare(paths: BuildPaths, deps: CompileDeps): Promise<PreparedBuild> {
    await checkPaths(paths);
    const { settings, ignored } = await loadSettings(paths.envDir, deps.processEnv, deps.defaultStack);
    const context = await analyzeBuild(paths, settings.stack);

    const issues: ManifestIssues = { ignoredCacheDirectories: [] };
    const manifest = await runPreflight(context, issues);

    const warnings = await collectPreinstallWarnings(context, manifest, issues);
    if (ignored.length > 0) {
        warnings.unshift({
            title: 'Ignoring reserved variables from the environment directory',
            body: ignored.join(', ')
        });
    }
    return { context, manifest, settings, warnings };
}

function reportFailure(title: string, message: string, diagnostics: Diagnostic[], output: Output): void {
    output.error(`Build failed: ${title}`, message);
    for (const diagnostic of diagnostics) {
        if (diagnostic.severity === 'fatal') {
            output.error(diagnostic.title, diagnostic.message);
        } else {
            output.warn(diagnostic.title, diagnostic.message);
        }
    }
}

function pipelineDiagnostics(log: LogBuffer, failure: PipelineFailure): Diagnostic[] {
    const diagnostics = classify(log);
    const fromExit = describeExit(failure.exitCode);
    return fromExit ? [...diagnostics, fromExit] : diagnostics;
}

async function listDependencies(
    packageManager: PackageManager,
    session: RuntimeSession,
    run: SubprocessRunner,
    output: Output
): Promise<void> {
    output.header('Build dependencies');
    const args = packageManager === 'yarn' ? ['list', '--depth=0'] : ['ls', '--depth=0'];
    const { exitCode } = await run(packageManager, args, session);
    if (exitCode !== 0) {
        output.warn('Unable to list dependencies', `${packageManager} ${args.join(' ')} exited with code ${exitCode}`);
    }
}

/**
 * Installs a project's dependencies into its build directory.
 *
 * Flow:
 * 1. Preconditions (paths, settings, lockfiles, manifest)
 * 2. Strategy selection
 * 3. Runtime and package manager
 * 4. Cache status and restore
 * 5. Prebuild hook, install, postbuild hook
 * 6. Cache save and runtime profile
 */
export async function compile(paths: BuildPaths, deps: CompileDeps): Promise<BuildOutcome> {
    const { output, run } = deps;
    const log = new LogBuffer();

    // 1. Preconditions
    let prepared: PreparedBuild;
    try {
        prepared = await prepare(paths, deps);
    } catch (error) {
        if (error instanceof PreconditionError) {
            output.error('Build failed', error.message);
            return { status: 'failed', phase: 'precondition', message: error.message, diagnostics: [], log };
        }
        throw error;
    }
    const { manifest, settings } = prepared;
    let { context } = prepared;
    reportWarnings(prepared.warnings, output);

    // 2. Strategy
    const plan = selectStrategy(context);
    if (plan.discardPrebuiltModules) {
        context = await discardPrebuiltModules(context, output);
    }

    const session: RuntimeSession = {
        cwd: context.buildDir,
        env: buildSubprocessEnv(context, settings),
        onLine: (line) => {
            log.append(line);
            output.info(line);
        }
    };

    // 3. Toolchain
    let signature: Signature;
    try {
        const toolchain = await installToolchain(context, manifest, plan.packageManager, deps.runtime, run, session, output);
        signature = computeSignature(toolchain, context.stack);
    } catch (error) {
        if (!(error instanceof ToolchainError)) throw error;
        log.append(error.message);
        const diagnostics = classify(log);
        reportFailure('unable to install the toolchain', error.message, diagnostics, output);
        return { status: 'failed', phase: 'toolchain', message: error.message, diagnostics, log };
    }

    // 4. Cache restore
    const cacheDirectories = resolveCacheDirectories(manifest);
    const source = manifest.cacheDirectories ? 'cacheDirectories (package.json)' : 'default cacheDirectories';
    let cache: CacheStatus | 'disabled' = 'disabled';

    output.header('Restoring cache');
    if (!settings.cacheEnabled) {
        output.info('Caching has been disabled because NODE_MODULES_CACHE=false');
    } else {
        try {
            cache = await cacheStatus(context, signature);
        } catch (error) {
            output.warn('Unable to read the stored cache signature', errorMessage(error));
            cache = 'invalid';
        }
        switch (cache) {
            case 'valid':
                output.info(`Loading ${cacheDirectories.length} from ${source}:`);
                await restoreCache(context, cacheDirectories, output);
                break;
            case 'invalid':
                output.info('Skipping cache restore (new runtime signature)');
                break;
            case 'absent':
                output.info('Skipping cache restore (no previous build cache)');
                break;
        }
    }

    // 5. Install
    const result = await runInstallPipeline(context, manifest, plan, { run, log, output, env: session.env });
    if (result.status === 'failed') {
        const message = `${result.command} exited with code ${result.exitCode} during ${result.stage}`;
        const diagnostics = pipelineDiagnostics(log, result);
        reportFailure(`${result.stage} step failed`, message, diagnostics, output);
        return { status: 'failed', phase: 'pipeline', message, diagnostics, log };
    }

    if (settings.verbose) {
        await listDependencies(plan.packageManager, session, run, output);
    }

    // 6. Cache save and profile
    output.header('Caching build');
    if (!settings.cacheEnabled) {
        output.info('Skipping cache save (disabled by config)');
    } else {
        output.info(`Saving ${cacheDirectories.length} ${source}:`);
        try {
            await saveCache(context, cacheDirectories, signature, output);
        } catch (error) {
            output.warn('Unable to save the build cache', errorMessage(error));
        }
    }

    await writeProfile(context, settings);
    reportWarnings(postinstallWarnings(manifest), output);

    output.header('Build succeeded!');
    return { status: 'succeeded', strategy: plan.strategy, cache, signature, log };
}
