import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { collectPreinstallWarnings, engineWarnings, postinstallWarnings, reportWarnings } from '../build/warnings';
import { captureOutput, makeContext, makeManifest, makeTempDir, removeTempDirs, writeFiles } from './helpers';

describe('engineWarnings', () => {
  it('warns when no node version is declared', () => {
    expect(engineWarnings(makeManifest()).map((w) => w.title)).toEqual(['Node version not specified in package.json']);
  });

  it('warns about open-ended ranges', () => {
    expect(engineWarnings(makeManifest({ engines: { node: '>=18' } })).map((w) => w.title)).toEqual([
      'Dangerous semver range (>=18) in engines.node'
    ]);
    expect(engineWarnings(makeManifest({ engines: { node: '*' } }))).toHaveLength(1);
  });

  it('accepts bounded ranges', () => {
    expect(engineWarnings(makeManifest({ engines: { node: '20.x' } }))).toEqual([]);
    expect(engineWarnings(makeManifest({ engines: { node: '>=18 <21' } }))).toEqual([]);
  });
});

describe('collectPreinstallWarnings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDirs([dir]);
  });

  const manifest = makeManifest({ engines: { node: '20.x' } });
  const noIssues = () => ({ ignoredCacheDirectories: [] });

  it('flags checked-in modules for npm projects', async () => {
    const warnings = await collectPreinstallWarnings(makeContext({ buildDir: dir, hasPrebuiltModules: true }), manifest, noIssues());
    expect(warnings.map((w) => w.title)).toEqual(['node_modules checked into source control']);
  });

  it('leaves checked-in modules of yarn projects to the installer', async () => {
    const context = makeContext({ buildDir: dir, hasPrebuiltModules: true, usesYarnLock: true });
    expect(await collectPreinstallWarnings(context, manifest, noIssues())).toEqual([]);
  });

  it('flags version 1 npm lockfiles', async () => {
    await writeFiles(dir, { 'package-lock.json': JSON.stringify({ lockfileVersion: 1 }) });
    const warnings = await collectPreinstallWarnings(makeContext({ buildDir: dir, usesNpmLock: true }), manifest, noIssues());
    expect(warnings.map((w) => w.title)).toEqual(['Outdated lockfile format']);
  });

  it('reports an unreadable lockfile without failing', async () => {
    await writeFiles(dir, { 'package-lock.json': '{ broken' });
    const warnings = await collectPreinstallWarnings(makeContext({ buildDir: dir, usesNpmLock: true }), manifest, noIssues());
    expect(warnings.map((w) => w.title)).toEqual(['Unable to read the npm lockfile']);
  });

  it('lists ignored cache directories', async () => {
    const warnings = await collectPreinstallWarnings(makeContext({ buildDir: dir }), manifest, {
      ignoredCacheDirectories: ['../up']
    });
    expect(warnings).toEqual([
      {
        title: 'Ignoring invalid cacheDirectories entries',
        body: 'Entries must be relative paths inside the project: ../up'
      }
    ]);
  });
});

describe('postinstallWarnings', () => {
  it('mentions a missing start script', () => {
    expect(postinstallWarnings(makeManifest({ hasStartScript: false })).map((w) => w.title)).toEqual([
      'No start script declared'
    ]);
    expect(postinstallWarnings(makeManifest())).toEqual([]);
  });
});

describe('reportWarnings', () => {
  it('writes each warning as a block on stderr', () => {
    const { output, err, out } = captureOutput();
    reportWarnings([{ title: 'First', body: 'line one\nline two' }], output);
    expect(err).toEqual(['', '!     Warning: First', '!     line one', '!     line two']);
    expect(out).toEqual([]);
  });
});
