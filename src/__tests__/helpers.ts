import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import pc from 'picocolors';
import type { BuildContext, BuildPaths, DependencyManifest } from '../build/config';
import { Output } from '../build/output';
import type { RunOptions, SubprocessRunner } from '../build/runner';
import type { RuntimeInstaller, RuntimeSession } from '../build/runtime';

export interface CapturedOutput {
  output: Output;
  out: string[];
  err: string[];
}

export function captureOutput(): CapturedOutput {
  const out: string[] = [];
  const err: string[] = [];
  const output = new Output(
    { out: (line) => out.push(line), err: (line) => err.push(line) },
    pc.createColors(false)
  );
  return { output, out, err };
}

export interface FakeCall {
  command: string;
  args: string[];
  options: RunOptions;
}

export interface FakeResponse {
  exitCode?: number;
  lines?: string[];
}

export const FAKE_VERSIONS: Record<string, string> = {
  node: 'v20.11.1',
  npm: '10.2.4',
  yarn: '1.22.19'
};

/**
 * Records every command. `--version` probes answer from FAKE_VERSIONS unless
 * the responder handles them; everything else succeeds silently by default.
 */
export function fakeRunner(respond: (command: string, args: string[]) => FakeResponse | undefined = () => undefined) {
  const calls: FakeCall[] = [];
  const run: SubprocessRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    const response: FakeResponse = respond(command, args) ??
      (args[0] === '--version' && FAKE_VERSIONS[command] ? { lines: [FAKE_VERSIONS[command]] } : {});
    for (const line of response.lines ?? []) {
      options.onLine?.(line);
    }
    return { exitCode: response.exitCode ?? 0 };
  };
  const commandLines = () => calls.map((call) => [call.command, ...call.args].join(' '));
  return { run, calls, commandLines };
}

export class FakeRuntimeInstaller implements RuntimeInstaller {
  readonly installed: string[] = [];

  constructor(private readonly failWith?: Error) {}

  async installNode(range: string, targetDir: string, session: RuntimeSession): Promise<string> {
    if (this.failWith) throw this.failWith;
    session.onLine(`fetched node for ${range}`);
    await fs.ensureDir(path.join(targetDir, 'bin'));
    this.installed.push(`node@${range}`);
    return '20.11.1';
  }

  async installYarn(range: string, targetDir: string): Promise<void> {
    await fs.ensureDir(path.join(targetDir, 'bin'));
    this.installed.push(`yarn@${range}`);
  }

  async installNpm(range: string): Promise<void> {
    this.installed.push(`npm@${range}`);
  }
}

export async function makeTempDir(prefix = 'depstage-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDirs(dirs: string[]): Promise<void> {
  await Promise.all(dirs.map((dir) => fs.remove(dir)));
}

/**
 * A build/cache/env triple under one temporary root.
 */
export async function makeBuildPaths(): Promise<BuildPaths & { root: string }> {
  const root = await makeTempDir();
  const paths = {
    root,
    buildDir: path.join(root, 'build'),
    cacheDir: path.join(root, 'cache'),
    envDir: path.join(root, 'env')
  };
  await fs.ensureDir(paths.buildDir);
  await fs.ensureDir(paths.cacheDir);
  await fs.ensureDir(paths.envDir);
  return paths;
}

export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    await fs.outputFile(path.join(dir, name), content);
  }
}

export function makeContext(overrides: Partial<BuildContext> = {}): BuildContext {
  return {
    buildDir: '/tmp/build',
    cacheDir: '/tmp/cache',
    envDir: '/tmp/env',
    stack: 'linux-x64',
    hasPrebuiltModules: false,
    usesYarnLock: false,
    usesNpmLock: false,
    ...overrides
  };
}

export function makeManifest(overrides: Partial<DependencyManifest> = {}): DependencyManifest {
  return {
    engines: {},
    hooks: { prebuild: false, postbuild: false },
    hasStartScript: true,
    ...overrides
  };
}
