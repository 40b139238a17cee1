import { getLogger } from "../log.js";
import type { ChangeType, EventBatchEntry } from "./eventTypes.js";

const logger = getLogger("events.batcher");

export type EventBatcherOptions = {
    windowMs: number;
    cooldownMs: number;
    onTrigger: (batch: EventBatchEntry[]) => Promise<void>;
};

/**
 * Coalesces filesystem change notifications into regeneration triggers.
 * The first event after idle opens a window; the batch flushes when the window closes
 * and no earlier than cooldownMs after the previous trigger finished.
 * Expects: callers run on one event loop; notify never blocks.
 */
export class EventBatcher {
    private readonly windowMs: number;
    private readonly cooldownMs: number;
    private readonly onTrigger: (batch: EventBatchEntry[]) => Promise<void>;
    private pending = new Map<string, EventBatchEntry>();
    private windowOpenedAt: number | null = null;
    private lastTriggerAt: number | null = null;
    private timer: ReturnType<typeof setTimeout> | null = null;
    private flushing: Promise<void> | null = null;
    private stopped = false;

    constructor(options: EventBatcherOptions) {
        this.windowMs = options.windowMs;
        this.cooldownMs = options.cooldownMs;
        this.onTrigger = options.onTrigger;
    }

    get pendingCount(): number {
        return this.pending.size;
    }

    notify(path: string, changeType: ChangeType): void {
        if (this.stopped) {
            return;
        }
        const key = `${changeType}\u0000${path}`;
        if (!this.pending.has(key)) {
            this.pending.set(key, { path, changeType });
        }
        if (this.windowOpenedAt === null) {
            this.windowOpenedAt = Date.now();
            this.schedule();
        }
    }

    /**
     * Delivers everything pending now, ignoring the window and cooldown.
     */
    async flush(): Promise<void> {
        this.cancelTimer();
        for (;;) {
            if (this.flushing) {
                await this.flushing;
                continue;
            }
            if (this.pending.size === 0) {
                return;
            }
            await this.flushOnce();
        }
    }

    /**
     * Drops pending events and waits for a trigger in flight. Later notifications are ignored.
     */
    async stop(): Promise<void> {
        this.stopped = true;
        this.cancelTimer();
        this.pending.clear();
        this.windowOpenedAt = null;
        if (this.flushing) {
            await this.flushing;
        }
    }

    private schedule(): void {
        if (this.timer || this.flushing || this.windowOpenedAt === null) {
            return;
        }
        const windowEnd = this.windowOpenedAt + this.windowMs;
        const cooldownEnd = this.lastTriggerAt === null ? 0 : this.lastTriggerAt + this.cooldownMs;
        const delay = Math.max(0, Math.max(windowEnd, cooldownEnd) - Date.now());
        this.timer = setTimeout(() => {
            this.timer = null;
            void this.flushOnce();
        }, delay);
    }

    private async flushOnce(): Promise<void> {
        if (this.flushing || this.pending.size === 0) {
            return;
        }
        const batch = [...this.pending.values()];
        this.pending = new Map();
        this.windowOpenedAt = null;
        logger.debug({ entries: batch.length }, "regeneration trigger");
        this.flushing = this.onTrigger(batch)
            .catch((error: unknown) => {
                logger.error({ error }, "regeneration trigger failed");
            })
            .finally(() => {
                this.flushing = null;
                this.lastTriggerAt = Date.now();
                if (this.pending.size > 0 && !this.stopped) {
                    this.windowOpenedAt ??= Date.now();
                    this.schedule();
                }
            });
        await this.flushing;
    }

    private cancelTimer(): void {
        if (!this.timer) {
            return;
        }
        clearTimeout(this.timer);
        this.timer = null;
    }
}
