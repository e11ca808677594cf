export enum InstallStrategy {
    YARN = 'yarn',
    REBUILD = 'rebuild',
    FRESH = 'fresh'
}

export type PackageManager = 'npm' | 'yarn';

export type CacheStatus = 'valid' | 'invalid' | 'absent';

export interface BuildPaths {
    buildDir: string;
    cacheDir: string;
    envDir: string;
}

export interface BuildContext extends Readonly<BuildPaths> {
    readonly stack: string; // Platform identifier, part of the cache signature
    readonly hasPrebuiltModules: boolean;
    readonly usesYarnLock: boolean;
    readonly usesNpmLock: boolean;
}

export interface BuildSettings {
    cacheEnabled: boolean;
    verbose: boolean;
    stack: string;
    nodeEnv: string;
    env: Record<string, string>; // Variables forwarded to every subprocess
}

export interface Toolchain {
    packageManager: PackageManager;
    packageManagerVersion: string;
    runtimeVersion: string;
}

export type Signature = string;

export interface EngineConstraints {
    node?: string;
    npm?: string;
    yarn?: string;
}

export interface DependencyManifest {
    engines: EngineConstraints;
    cacheDirectories?: string[]; // Undefined when the project does not declare any
    hooks: {
        prebuild: boolean;
        postbuild: boolean;
    };
    hasStartScript: boolean;
}

export interface CommandSpec {
    command: string;
    args: string[];
}

export interface InstallPlan {
    strategy: InstallStrategy;
    packageManager: PackageManager;
    discardPrebuiltModules: boolean;
    commands: CommandSpec[];
}

export const TOOLCHAIN_DIR = '.depstage';
export const NODE_DIR = 'node';
export const YARN_DIR = 'yarn';

export const CACHE_NAMESPACE = 'node';
export const SIGNATURE_FILE = 'signature';
export const CACHED_DIRECTORIES_DIR = 'dirs'; // Kept apart from the signature record
export const DEFAULT_CACHE_DIRECTORIES = ['node_modules', 'bower_components'];

export const MANIFEST_FILE = 'package.json';
export const YARN_LOCKFILE = 'yarn.lock';
export const NPM_LOCKFILES = ['package-lock.json', 'npm-shrinkwrap.json'];
export const MODULES_DIR = 'node_modules';

export const PREBUILD_HOOK = 'depstage-prebuild';
export const POSTBUILD_HOOK = 'depstage-postbuild';

export const DEFAULT_NODE_RANGE = '20.x';
export const DEFAULT_YARN_RANGE = '1.x';

// Never forwarded from the environment directory to subprocesses
export const BLOCKED_ENV_VARS = [
    'PATH',
    'GIT_DIR',
    'CPATH',
    'CPPATH',
    'LD_PRELOAD',
    'LIBRARY_PATH'
];
