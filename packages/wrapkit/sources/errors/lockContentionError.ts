import { WrapkitError } from "./wrapkitError.js";

/**
 * Another mutation holds the configuration lock. Callers should try again later.
 */
export class LockContentionError extends WrapkitError {
    readonly lockPath: string;
    readonly holderPid: number | null;

    constructor(lockPath: string, holderPid: number | null) {
        const holder = holderPid === null ? "another process" : `process ${holderPid}`;
        super("lock", `Configuration is locked by ${holder}; try again.`, { input: lockPath });
        this.name = "LockContentionError";
        this.lockPath = lockPath;
        this.holderPid = holderPid;
    }
}
