export type BuildErrorCode =
    | 'MULTIPLE_LOCKFILES'
    | 'INVALID_MANIFEST'
    | 'TOOLCHAIN_DIRECTORY_PRESENT'
    | 'INACCESSIBLE_PATH'
    | 'TOOLCHAIN_FAILURE';

/**
 * Base class for every error the build raises on purpose.
 */
export class BuildError extends Error {
    readonly code: BuildErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(message: string, code: BuildErrorCode, details?: Record<string, unknown>) {
        super(message);
        this.name = 'BuildError';
        this.code = code;
        this.details = details;
    }
}

/**
 * Raised before any installation work begins. The build directory is untouched.
 */
export class PreconditionError extends BuildError {
    constructor(message: string, code: BuildErrorCode, details?: Record<string, unknown>) {
        super(message, code, details);
        this.name = 'PreconditionError';
    }
}

export class MultipleLockfilesError extends PreconditionError {
    constructor(lockfiles: string[]) {
        super(
            [
                `Two different lockfiles found: ${lockfiles.join(' and ')}`,
                'Both npm and yarn have created lockfiles for this application,',
                'but only one can be used to install dependencies. Delete the',
                'lockfile of the package manager you do not use and commit the change.'
            ].join('\n'),
            'MULTIPLE_LOCKFILES',
            { lockfiles }
        );
        this.name = 'MultipleLockfilesError';
    }
}

export class ManifestError extends PreconditionError {
    constructor(reason: string, manifestPath: string) {
        super(`Unable to read ${manifestPath}: ${reason}`, 'INVALID_MANIFEST', { manifestPath });
        this.name = 'ManifestError';
    }
}

export class ToolchainDirectoryError extends PreconditionError {
    constructor(directory: string) {
        super(
            [
                `${directory} is checked into source control`,
                'This directory is created during the build and must not be committed.',
                'Remove it from the repository and add it to .gitignore.'
            ].join('\n'),
            'TOOLCHAIN_DIRECTORY_PRESENT',
            { directory }
        );
        this.name = 'ToolchainDirectoryError';
    }
}

export class InaccessiblePathError extends PreconditionError {
    constructor(label: string, dirPath: string, reason: string) {
        super(`${label} ${dirPath} is not usable: ${reason}`, 'INACCESSIBLE_PATH', { label, dirPath });
        this.name = 'InaccessiblePathError';
    }
}

/**
 * Installing or probing the runtime and package manager failed.
 * Handled like a pipeline failure: the message is classified before it is reported.
 */
export class ToolchainError extends BuildError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'TOOLCHAIN_FAILURE', details);
        this.name = 'ToolchainError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
