import { LogBuffer } from './log-buffer';

export type Severity = 'fatal' | 'warning';

export interface Diagnostic {
    id: string;
    title: string;
    severity: Severity;
    message: string;
}

export interface FailurePattern extends Diagnostic {
    matches: RegExp[]; // Any one matching is enough
}

/**
 * Known failure signatures in package manager output, most specific first.
 * Each entry fires independently; one failure can produce several diagnostics.
 *
 * | id                       | severity | recognised by                                  |
 * |--------------------------|----------|------------------------------------------------|
 * | lockfile-outdated        | fatal    | yarn --frozen-lockfile, npm ci out of sync     |
 * | node-version-unavailable | fatal    | runtime installer could not resolve engines    |
 * | yarn-version-unavailable | fatal    | same, for engines.yarn                         |
 * | invalid-semver           | fatal    | engines range that semver cannot parse         |
 * | integrity-mismatch       | fatal    | EINTEGRITY / yarn integrity check              |
 * | out-of-memory            | fatal    | V8 heap exhaustion                             |
 * | dependency-conflict      | fatal    | npm ERESOLVE                                   |
 * | missing-module           | fatal    | Cannot find module                             |
 * | missing-binary           | warning  | sh: not found / command not found              |
 * | native-build-failed      | warning  | node-gyp errors                                |
 * | unmet-dependency         | warning  | unmet / incorrect peer dependency              |
 * | network-unreachable      | warning  | ECONNRESET, ETIMEDOUT, ENOTFOUND, EAI_AGAIN    |
 */
export const FAILURE_PATTERNS: readonly FailurePattern[] = [
    {
        id: 'lockfile-outdated',
        title: 'Lockfile outdated',
        severity: 'fatal',
        matches: [
            /Your lockfile needs to be updated/,
            /can only install packages when your package\.json and package-lock\.json(?: or npm-shrinkwrap\.json)? are in sync/
        ],
        message: [
            'The lockfile does not match package.json.',
            'Run the install locally, commit the updated lockfile and deploy again.'
        ].join('\n')
    },
    {
        id: 'node-version-unavailable',
        title: 'Node version not found',
        severity: 'fatal',
        matches: [/No matching version found for Node/],
        message: [
            'No released Node.js version satisfies engines.node in package.json.',
            'Pick a range that includes a published release, for example "20.x".'
        ].join('\n')
    },
    {
        id: 'yarn-version-unavailable',
        title: 'Yarn version not found',
        severity: 'fatal',
        matches: [/No matching version found for Yarn/],
        message: [
            'No released Yarn version satisfies engines.yarn in package.json.',
            'Pick a range that includes a published release, for example "1.x".'
        ].join('\n')
    },
    {
        id: 'invalid-semver',
        title: 'Invalid semver requirement',
        severity: 'fatal',
        matches: [/Invalid semver requirement/],
        message: 'An engines entry in package.json is not a valid semver range.'
    },
    {
        id: 'integrity-mismatch',
        title: 'Package integrity check failed',
        severity: 'fatal',
        matches: [/\bEINTEGRITY\b/, /[Ii]ntegrity check failed/, /integrity checksum failed/],
        message: [
            'A downloaded or cached package does not match its recorded checksum.',
            'Clear the build cache and deploy again. If it persists, regenerate the lockfile.'
        ].join('\n')
    },
    {
        id: 'out-of-memory',
        title: 'Out of memory',
        severity: 'fatal',
        matches: [/JavaScript heap out of memory/, /FATAL ERROR: .*Allocation failed/],
        message: [
            'The build ran out of memory.',
            'Reduce memory use in build scripts or raise the limit with NODE_OPTIONS=--max-old-space-size.'
        ].join('\n')
    },
    {
        id: 'dependency-conflict',
        title: 'Conflicting peer dependencies',
        severity: 'fatal',
        matches: [/npm (?:ERR!|error) code ERESOLVE/],
        message: [
            'npm could not resolve the dependency tree because of peer dependency conflicts.',
            'Align the conflicting versions, or set NPM_CONFIG_LEGACY_PEER_DEPS=true.'
        ].join('\n')
    },
    {
        id: 'missing-module',
        title: 'Missing module',
        severity: 'fatal',
        matches: [/Cannot find module/i],
        message: [
            'A module required during the build is not installed.',
            'Make sure it is listed in dependencies or devDependencies in package.json.'
        ].join('\n')
    },
    {
        id: 'missing-binary',
        title: 'Command not found',
        severity: 'warning',
        matches: [/^sh: (?:\d+: )?\S+: (?:command )?not found$/m, /: command not found$/m],
        message: 'A script calls a command that is not installed. Add the package providing it to package.json.'
    },
    {
        id: 'native-build-failed',
        title: 'Native module build failed',
        severity: 'warning',
        matches: [/gyp ERR!/],
        message: [
            'A dependency with native code failed to compile.',
            'Check that the dependency supports the Node.js version in use.'
        ].join('\n')
    },
    {
        id: 'unmet-dependency',
        title: 'Unmet dependency',
        severity: 'warning',
        matches: [/unmet (?:peer )?dependency/i, /incorrect peer dependency/i],
        message: 'Some dependencies declare requirements that are not satisfied by package.json.'
    },
    {
        id: 'network-unreachable',
        title: 'Network error',
        severity: 'warning',
        matches: [/\b(?:ECONNRESET|ETIMEDOUT|ENOTFOUND|EAI_AGAIN)\b/],
        message: [
            'The package registry could not be reached reliably.',
            'This is often temporary; deploy again. Private registries need credentials in .npmrc.'
        ].join('\n')
    }
];

function toDiagnostic({ id, title, severity, message }: FailurePattern): Diagnostic {
    return { id, title, severity, message };
}

/**
 * Scans captured output for known failure signatures. Read-only.
 */
export function classify(
    log: LogBuffer | readonly string[],
    patterns: readonly FailurePattern[] = FAILURE_PATTERNS
): Diagnostic[] {
    const text = log instanceof LogBuffer ? log.text() : log.join('\n');
    return patterns
        .filter((pattern) => pattern.matches.some((matcher) => matcher.test(text)))
        .map(toDiagnostic);
}

/**
 * Diagnostics derived from the exit code alone.
 */
export function describeExit(exitCode: number): Diagnostic | undefined {
    switch (exitCode) {
        case 127:
            return {
                id: 'exit-command-not-found',
                title: 'Command not found',
                severity: 'fatal',
                message: 'The shell could not find the command it was asked to run.'
            };
        case 137:
            return {
                id: 'exit-killed',
                title: 'Process killed',
                severity: 'fatal',
                message: 'The process was killed, most often because the build exceeded its memory limit.'
            };
        default:
            return undefined;
    }
}
