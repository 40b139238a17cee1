export type PackageRuntime = {
    /** Runtime executable, resolved through the search path. */
    command: string;
    /** Arguments placed before the package id, e.g. `run`. */
    argsPrefix: string[];
};

export type BatchTiming = {
    windowMs: number;
    cooldownMs: number;
};

export type Config = {
    configDir: string;
    homeDir: string;
    binDir: string;
    profilesDir: string;
    prefsDir: string;
    locksDir: string;
    scriptsDir: string;
    aliasesPath: string;
    blocklistPath: string;
    activeProfilePath: string;
    hookTimeoutMs: number;
    promptTimeoutMs: number;
    batch: BatchTiming;
    packageRuntime: PackageRuntime;
    watchPaths: string[];
    searchPath: string[];
};

export type ConfigOverrides = {
    configDir?: string;
    homeDir?: string;
    binDir?: string;
    hookTimeoutMs?: number;
    promptTimeoutMs?: number;
    batch?: Partial<BatchTiming>;
    watchPaths?: string[];
};
