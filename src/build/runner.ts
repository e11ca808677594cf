import spawn from 'cross-spawn';
import { constants } from 'os';
import { createInterface } from 'readline';
import type { Readable } from 'stream';

export interface RunOptions {
    cwd: string;
    env: Record<string, string>;
    onLine?: (line: string) => void;
}

export interface RunResult {
    exitCode: number;
}

/**
 * Executes one command to completion. Never rejects on a non-zero exit;
 * callers decide what a failing exit code means.
 */
export type SubprocessRunner = (command: string, args: string[], options: RunOptions) => Promise<RunResult>;

function signalExitCode(signal: NodeJS.Signals | null): number {
    if (!signal) return 1;
    const entry = Object.entries(constants.signals).find(([name]) => name === signal);
    return entry ? 128 + Number(entry[1]) : 1;
}

function forwardLines(stream: Readable | null, onLine: (line: string) => void): Promise<void> {
    if (!stream) return Promise.resolve();
    const reader = createInterface({ input: stream, crlfDelay: Infinity });
    reader.on('line', onLine);
    return new Promise((resolve) => reader.on('close', () => resolve()));
}

export const runSubprocess: SubprocessRunner = (command, args, options) => {
    return new Promise((resolve) => {
        const child = spawn(command, args, {
            cwd: options.cwd,
            stdio: ['ignore', 'pipe', 'pipe'],
            env: options.env
        });

        const onLine = options.onLine ?? (() => undefined);
        const drained = Promise.all([forwardLines(child.stdout, onLine), forwardLines(child.stderr, onLine)]);

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
            if (code !== null && code < 0) return; // Spawn failure, reported through 'error'
            const exitCode = code ?? signalExitCode(signal);
            void drained.then(() => resolve({ exitCode }));
        });

        // Spawn failures (missing binary, bad cwd) surface the same way a shell would report them
        child.on('error', (err: NodeJS.ErrnoException) => {
            onLine(`${command}: ${err.message}`);
            resolve({ exitCode: err.code === 'ENOENT' ? 127 : 1 });
        });
    });
};
