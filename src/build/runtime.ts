import fs from 'fs-extra';
import * as semver from 'semver';
import { ToolchainError } from './errors';
import type { SubprocessRunner } from './runner';

export interface RuntimeSession {
    cwd: string;
    env: Record<string, string>;
    onLine: (line: string) => void;
}

/**
 * Installs the language runtime and package managers a build asks for.
 */
export interface RuntimeInstaller {
    installNode(range: string, targetDir: string, session: RuntimeSession): Promise<string>;
    installYarn(range: string, targetDir: string, session: RuntimeSession): Promise<void>;
    installNpm(range: string, session: RuntimeSession): Promise<void>;
}

export const NODE_DIST_URL = 'https://nodejs.org/dist';

export function assertValidRange(range: string): void {
    if (semver.validRange(range) === null) {
        throw new ToolchainError(`Invalid semver requirement: ${range}`, { range });
    }
}

/**
 * Highest release satisfying the range. Releases may carry a leading `v`.
 */
export function resolveNodeVersion(range: string, releases: string[]): string {
    assertValidRange(range);
    const versions = releases.map((release) => semver.clean(release)).filter((v): v is string => v !== null);
    const version = semver.maxSatisfying(versions, range);
    if (!version) {
        throw new ToolchainError(`No matching version found for Node: ${range}`, { range });
    }
    return version;
}

export async function fetchNodeReleases(): Promise<string[]> {
    const response = await fetch(`${NODE_DIST_URL}/index.json`);
    if (!response.ok) {
        throw new ToolchainError(`Unable to list Node releases: HTTP ${response.status}`);
    }
    const body: unknown = await response.json();
    if (!Array.isArray(body)) {
        throw new ToolchainError('Unable to list Node releases: unexpected response');
    }
    const releases: string[] = [];
    for (const entry of body) {
        if (typeof entry === 'object' && entry !== null && 'version' in entry && typeof entry.version === 'string') {
            releases.push(entry.version);
        }
    }
    return releases;
}

/**
 * Downloads official Node.js release tarballs and installs package managers
 * through npm itself.
 */
export class DistributionRuntimeInstaller implements RuntimeInstaller {
    constructor(
        private readonly run: SubprocessRunner,
        private readonly listReleases: () => Promise<string[]> = fetchNodeReleases,
        private readonly platform: string = `${process.platform}-${process.arch}`
    ) {}

    async installNode(range: string, targetDir: string, session: RuntimeSession): Promise<string> {
        assertValidRange(range);
        const version = resolveNodeVersion(range, await this.listReleases());
        const url = `${NODE_DIST_URL}/v${version}/node-v${version}-${this.platform}.tar.gz`;
        const tarball = `${targetDir}.tar.gz`;

        await fs.ensureDir(targetDir);
        await this.exec('curl', ['--silent', '--show-error', '--fail', '--location', '--retry', '3', '-o', tarball, url], session,
            `Unable to download Node ${version}`);
        await this.exec('tar', ['xzf', tarball, '-C', targetDir, '--strip-components', '1'], session,
            `Unable to extract Node ${version}`);
        await fs.remove(tarball);
        return version;
    }

    async installYarn(range: string, targetDir: string, session: RuntimeSession): Promise<void> {
        assertValidRange(range);
        await fs.ensureDir(targetDir);
        await this.exec('npm', ['install', '--global', '--prefix', targetDir, `yarn@${range}`], session,
            `No matching version found for Yarn: ${range}`);
    }

    async installNpm(range: string, session: RuntimeSession): Promise<void> {
        assertValidRange(range);
        await this.exec('npm', ['install', '--global', `npm@${range}`], session,
            `Unable to install npm ${range}`);
    }

    private async exec(command: string, args: string[], session: RuntimeSession, failure: string): Promise<void> {
        const { exitCode } = await this.run(command, args, session);
        if (exitCode !== 0) {
            throw new ToolchainError(failure, { command, exitCode });
        }
    }
}
