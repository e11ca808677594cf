import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import path from 'path';
import { createProgram } from '../cli';
import { captureOutput, makeTempDir, removeTempDirs } from './helpers';

describe('cli', () => {
  let dir: string;
  let previousExitCode: typeof process.exitCode;

  beforeEach(async () => {
    dir = await makeTempDir();
    previousExitCode = process.exitCode;
  });

  afterEach(async () => {
    process.exitCode = previousExitCode;
    await removeTempDirs([dir]);
  });

  it('reports an unusable build directory and exits non-zero', async () => {
    const { output, err } = captureOutput();
    const buildDir = path.join(dir, 'missing');

    await createProgram(output).parseAsync([buildDir, path.join(dir, 'cache'), dir], { from: 'user' });

    expect(process.exitCode).toBe(1);
    expect(err[1]).toBe('!     Build failed');
    expect(err[2].startsWith(`!     Build directory ${buildDir} is not usable: ENOENT`)).toBe(true);
  });
});
