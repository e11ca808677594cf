export * from './build/config';
export * from './build/errors';
export { analyzeBuild } from './build/analyzer';
export { cacheStatus, resolveCacheDirectories, restoreCache, saveCache } from './build/cache';
export type { RestoreReport, SaveReport } from './build/cache';
export { FAILURE_PATTERNS, classify, describeExit } from './build/classifier';
export type { Diagnostic, FailurePattern, Severity } from './build/classifier';
export { compile, exitCodeFor } from './build/compile';
export type { BuildOutcome, CompileDeps } from './build/compile';
export { loadSettings } from './build/env';
export { selectStrategy } from './build/installer';
export { LogBuffer } from './build/log-buffer';
export { readManifest, readManifestField } from './build/manifest';
export { Output } from './build/output';
export { runInstallPipeline } from './build/pipeline';
export type { PipelineOutcome, PipelineState } from './build/pipeline';
export { runSubprocess } from './build/runner';
export type { SubprocessRunner } from './build/runner';
export { DistributionRuntimeInstaller } from './build/runtime';
export type { RuntimeInstaller } from './build/runtime';
export { computeSignature } from './build/signature';
