import type { Signature, Toolchain } from './config';

/**
 * Fingerprint of the toolchain a cache was produced with:
 * package manager version, then runtime version, then platform.
 */
export function computeSignature(toolchain: Toolchain, stack: string): Signature {
    return [
        `${toolchain.packageManager}-${toolchain.packageManagerVersion}`,
        `node-${toolchain.runtimeVersion}`,
        stack
    ].join('/');
}

export function signaturesMatch(stored: Signature, current: Signature): boolean {
    return stored === current;
}
