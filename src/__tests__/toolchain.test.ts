import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import type { BuildContext } from '../build/config';
import type { RuntimeSession } from '../build/runtime';
import { installToolchain, probeVersion } from '../build/toolchain';
import {
  FakeRuntimeInstaller,
  captureOutput,
  fakeRunner,
  makeBuildPaths,
  makeContext,
  makeManifest,
  removeTempDirs
} from './helpers';

describe('probeVersion', () => {
  const session: RuntimeSession = { cwd: '/tmp', env: {}, onLine: () => undefined };

  it('returns the first non-empty line', async () => {
    const runner = fakeRunner(() => ({ lines: ['', '  1.22.19  '] }));
    expect(await probeVersion(runner.run, 'yarn', session)).toBe('1.22.19');
  });

  it('fails when the command fails', async () => {
    const runner = fakeRunner(() => ({ exitCode: 127 }));
    await expect(probeVersion(runner.run, 'yarn', session)).rejects.toThrow('Unable to determine the installed yarn version');
  });
});

describe('installToolchain', () => {
  let root: string;
  let context: BuildContext;
  let session: RuntimeSession;

  beforeEach(async () => {
    const paths = await makeBuildPaths();
    root = paths.root;
    context = makeContext({ buildDir: paths.buildDir, cacheDir: paths.cacheDir, envDir: paths.envDir });
    session = { cwd: paths.buildDir, env: {}, onLine: () => undefined };
  });

  afterEach(async () => {
    await removeTempDirs([root]);
  });

  it('installs the default node when engines is silent and reports npm versions', async () => {
    const runtime = new FakeRuntimeInstaller();
    const runner = fakeRunner();
    const { output } = captureOutput();

    const toolchain = await installToolchain(context, makeManifest(), 'npm', runtime, runner.run, session, output);

    expect(runtime.installed).toEqual(['node@20.x']);
    expect(toolchain).toEqual({ packageManager: 'npm', packageManagerVersion: '10.2.4', runtimeVersion: 'v20.11.1' });
  });

  it('installs yarn into the toolchain directory when yarn is the package manager', async () => {
    const runtime = new FakeRuntimeInstaller();
    const runner = fakeRunner();
    const { output } = captureOutput();
    const manifest = makeManifest({ engines: { node: '18.x', yarn: '1.22.x' } });

    const toolchain = await installToolchain(context, manifest, 'yarn', runtime, runner.run, session, output);

    expect(runtime.installed).toEqual(['node@18.x', 'yarn@1.22.x']);
    expect(toolchain.packageManagerVersion).toBe('1.22.19');
  });

  it('leaves the bundled npm alone when it satisfies engines.npm', async () => {
    const runtime = new FakeRuntimeInstaller();
    const { output, out } = captureOutput();

    await installToolchain(context, makeManifest({ engines: { npm: '10.x' } }), 'npm', runtime, fakeRunner().run, session, output);

    expect(runtime.installed).toEqual(['node@20.x']);
    expect(out).toContain('       npm 10.2.4 already installed with node');
  });

  it('replaces npm when engines.npm asks for another version', async () => {
    const runtime = new FakeRuntimeInstaller();
    const { output } = captureOutput();

    await installToolchain(context, makeManifest({ engines: { npm: '9.x' } }), 'npm', runtime, fakeRunner().run, session, output);

    expect(runtime.installed).toEqual(['node@20.x', 'npm@9.x']);
  });

  it('places node under the build directory', async () => {
    const { output } = captureOutput();
    await installToolchain(context, makeManifest(), 'npm', new FakeRuntimeInstaller(), fakeRunner().run, session, output);
    expect(await fs.pathExists(path.join(context.buildDir, '.depstage', 'node', 'bin'))).toBe(true);
  });
});
