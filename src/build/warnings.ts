import { type BuildContext, DEFAULT_NODE_RANGE, type DependencyManifest, MODULES_DIR } from './config';
import { errorMessage } from './errors';
import { type ManifestIssues, readLockfileVersion } from './manifest';
import { Output } from './output';

export interface BuildWarning {
    title: string;
    body: string;
}

function isOpenEnded(range: string): boolean {
    const trimmed = range.trim();
    return trimmed === '*' || trimmed === 'latest' || (trimmed.startsWith('>') && !trimmed.includes('<'));
}

export function engineWarnings(manifest: DependencyManifest): BuildWarning[] {
    const warnings: BuildWarning[] = [];
    const { node } = manifest.engines;

    if (!node) {
        warnings.push({
            title: 'Node version not specified in package.json',
            body: `Defaulting to node ${DEFAULT_NODE_RANGE}. Add an "engines.node" entry to pin the version you develop with.`
        });
    } else if (isOpenEnded(node)) {
        warnings.push({
            title: `Dangerous semver range (${node}) in engines.node`,
            body: 'An open-ended range lets a new major version of node be installed without warning. Use a range like "20.x".'
        });
    }

    return warnings;
}

/**
 * Non-fatal findings reported before installation starts.
 */
export async function collectPreinstallWarnings(
    context: BuildContext,
    manifest: DependencyManifest,
    issues: ManifestIssues
): Promise<BuildWarning[]> {
    const warnings = engineWarnings(manifest);

    if (issues.ignoredCacheDirectories.length > 0) {
        warnings.push({
            title: 'Ignoring invalid cacheDirectories entries',
            body: `Entries must be relative paths inside the project: ${issues.ignoredCacheDirectories.join(', ')}`
        });
    }

    if (context.hasPrebuiltModules && !context.usesYarnLock) {
        warnings.push({
            title: `${MODULES_DIR} checked into source control`,
            body: 'Existing modules will be rebuilt instead of installed fresh. Add node_modules to .gitignore.'
        });
    }

    if (context.usesNpmLock) {
        try {
            if ((await readLockfileVersion(context.buildDir)) === 1) {
                warnings.push({
                    title: 'Outdated lockfile format',
                    body: 'package-lock.json uses lockfileVersion 1. Regenerate it with a current npm to speed up installs.'
                });
            }
        } catch (error) {
            warnings.push({ title: 'Unable to read the npm lockfile', body: errorMessage(error) });
        }
    }

    return warnings;
}

export function postinstallWarnings(manifest: DependencyManifest): BuildWarning[] {
    if (manifest.hasStartScript) return [];
    return [
        {
            title: 'No start script declared',
            body: 'Without "scripts.start" in package.json the platform cannot infer how to run the application.'
        }
    ];
}

export function reportWarnings(warnings: BuildWarning[], output: Output): void {
    for (const warning of warnings) {
        output.warn(warning.title, warning.body);
    }
}
