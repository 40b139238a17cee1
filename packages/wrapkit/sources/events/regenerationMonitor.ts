import { type FSWatcher, promises as fs, watch } from "node:fs";
import path from "node:path";

import { LockContentionError } from "../errors/lockContentionError.js";
import type { ConfigLock } from "../lock/configLock.js";
import { getLogger } from "../log.js";
import { errorCodeIs } from "../util/lineFileRead.js";
import { EventBatcher } from "./eventBatcher.js";
import type { ChangeType, EventBatchEntry } from "./eventTypes.js";

const logger = getLogger("events.monitor");

export type WatchEventType = "rename" | "change";

export type DirectoryWatch = (
    dir: string,
    listener: (eventType: WatchEventType, fileName: string | null) => void
) => { close(): void };

export type RegenerationMonitorOptions = {
    watchPaths: readonly string[];
    windowMs: number;
    cooldownMs: number;
    lock: ConfigLock;
    /** External wrapper-generation collaborator. */
    regenerate: (batch: EventBatchEntry[]) => Promise<void>;
    watch?: DirectoryWatch;
};

/**
 * Watches package export directories and runs regeneration under the configuration lock.
 * A trigger that finds the lock held is logged and dropped.
 */
export class RegenerationMonitor {
    private readonly options: RegenerationMonitorOptions;
    private readonly batcher: EventBatcher;
    private readonly watch: DirectoryWatch;
    private watchers: Array<{ close(): void }> = [];
    // Keeps notifications in arrival order while each one is classified.
    private classifying: Promise<void> = Promise.resolve();

    constructor(options: RegenerationMonitorOptions) {
        this.options = options;
        this.watch = options.watch ?? directoryWatch;
        this.batcher = new EventBatcher({
            windowMs: options.windowMs,
            cooldownMs: options.cooldownMs,
            onTrigger: (batch) => this.trigger(batch)
        });
    }

    /**
     * Starts watching every existing directory and returns the ones watched.
     */
    async start(): Promise<string[]> {
        const watched: string[] = [];
        for (const dir of this.options.watchPaths) {
            if (!(await directoryExists(dir))) {
                logger.debug({ dir }, "watch path missing; skipped");
                continue;
            }
            this.watchers.push(
                this.watch(dir, (eventType, fileName) => {
                    const target = fileName ? path.join(dir, fileName) : dir;
                    this.classifying = this.classifying
                        .then(async () => this.batcher.notify(target, await this.changeClassify(eventType, target)))
                        .catch((error: unknown) => {
                            logger.warn({ target, error }, "change classification failed");
                        });
                })
            );
            watched.push(dir);
        }
        logger.info({ dirs: watched }, "watching package exports");
        return watched;
    }

    async stop(): Promise<void> {
        for (const watcher of this.watchers) {
            watcher.close();
        }
        this.watchers = [];
        await this.classifying;
        await this.batcher.flush();
        await this.batcher.stop();
    }

    private async trigger(batch: EventBatchEntry[]): Promise<void> {
        try {
            await this.options.lock.inLock(() => this.options.regenerate(batch));
        } catch (error) {
            if (error instanceof LockContentionError) {
                logger.warn({ lock: error.lockPath, holderPid: error.holderPid, entries: batch.length }, "lock held; regeneration dropped");
                return;
            }
            throw error;
        }
    }

    private async changeClassify(eventType: WatchEventType, target: string): Promise<ChangeType> {
        if (eventType === "change") {
            return "modified";
        }
        try {
            await fs.lstat(target);
            return "created";
        } catch (error) {
            if (errorCodeIs(error, "ENOENT")) {
                return "deleted";
            }
            return "renamed";
        }
    }
}

function directoryWatch(dir: string, listener: (eventType: WatchEventType, fileName: string | null) => void): FSWatcher {
    const watcher = watch(dir, { persistent: true, recursive: true }, (eventType, fileName) => {
        listener(eventType === "change" ? "change" : "rename", fileName);
    });
    watcher.on("error", (error) => {
        logger.warn({ dir, error }, "watcher failed");
    });
    return watcher;
}

async function directoryExists(dir: string): Promise<boolean> {
    try {
        return (await fs.stat(dir)).isDirectory();
    } catch (error) {
        if (errorCodeIs(error, "ENOENT") || errorCodeIs(error, "ENOTDIR")) {
            return false;
        }
        throw error;
    }
}
