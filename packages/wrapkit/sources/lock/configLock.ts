import { promises as fs } from "node:fs";
import path from "node:path";

import { LockContentionError } from "../errors/lockContentionError.js";
import { getLogger } from "../log.js";
import { errorCodeIs } from "../util/lineFileRead.js";
import { processIsAlive } from "../util/processIsAlive.js";

const logger = getLogger("config.lock");

const STALE_WITHOUT_PID_MS = 10_000;

/**
 * Advisory mutual exclusion over one configuration root, backed by `mkdir`.
 * Only mutations take the lock; reads never wait on it.
 */
export class ConfigLock {
    private readonly lockDir: string;

    constructor(locksDir: string, name = "config") {
        this.lockDir = path.join(locksDir, `${name}.lock`);
    }

    get path(): string {
        return this.lockDir;
    }

    /**
     * Runs func while holding the lock.
     * Throws LockContentionError without retrying when another live process holds it.
     */
    async inLock<T>(func: () => Promise<T> | T): Promise<T> {
        await this.acquire();
        try {
            return await func();
        } finally {
            await this.release();
        }
    }

    private async acquire(): Promise<void> {
        await fs.mkdir(path.dirname(this.lockDir), { recursive: true });
        if (await this.tryCreate()) {
            return;
        }

        const holderPid = await this.holderPidRead();
        if (holderPid !== null && processIsAlive(holderPid)) {
            throw new LockContentionError(this.lockDir, holderPid);
        }
        if (holderPid === null && !(await this.isOlderThan(STALE_WITHOUT_PID_MS))) {
            // Holder may be between mkdir and writing its pid.
            throw new LockContentionError(this.lockDir, null);
        }

        logger.warn({ lock: this.lockDir, holderPid }, "reclaiming stale configuration lock");
        await fs.rm(this.lockDir, { recursive: true, force: true });
        if (!(await this.tryCreate())) {
            throw new LockContentionError(this.lockDir, await this.holderPidRead());
        }
    }

    private async tryCreate(): Promise<boolean> {
        try {
            await fs.mkdir(this.lockDir);
        } catch (error) {
            if (errorCodeIs(error, "EEXIST")) {
                return false;
            }
            throw error;
        }
        await fs.writeFile(path.join(this.lockDir, "pid"), `${process.pid}\n`, "utf8");
        return true;
    }

    private async release(): Promise<void> {
        await fs.rm(this.lockDir, { recursive: true, force: true });
    }

    private async holderPidRead(): Promise<number | null> {
        try {
            const raw = (await fs.readFile(path.join(this.lockDir, "pid"), "utf8")).trim();
            return /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : null;
        } catch (error) {
            if (errorCodeIs(error, "ENOENT")) {
                return null;
            }
            throw error;
        }
    }

    private async isOlderThan(ms: number): Promise<boolean> {
        try {
            const stats = await fs.stat(this.lockDir);
            return Date.now() - stats.mtimeMs > ms;
        } catch (error) {
            if (errorCodeIs(error, "ENOENT")) {
                return true;
            }
            throw error;
        }
    }
}
