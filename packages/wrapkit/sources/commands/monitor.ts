import { spawn } from "node:child_process";

import { RegenerationMonitor } from "../events/regenerationMonitor.js";
import type { EventBatchEntry } from "../events/eventTypes.js";
import { getLogger } from "../log.js";
import { safetyAssert } from "../safety/safetyAssert.js";
import { validateExecutableCandidate } from "../safety/validateExecutableCandidate.js";
import { validatePathWithinHome } from "../safety/validatePathWithinHome.js";
import { commandContextCreate } from "./commandContextCreate.js";

const logger = getLogger("commands.monitor");

/**
 * Watches package exports until SIGINT/SIGTERM. Each trigger runs the --exec script
 * with the changed paths in WRAPKIT_CHANGED_PATHS, or prints them when none is given.
 */
export async function monitorCommand(options: { exec?: string }): Promise<void> {
    const { config, store } = await commandContextCreate();
    const script = options.exec ?? null;
    if (script !== null) {
        safetyAssert(await validatePathWithinHome(script, config.homeDir), script);
        safetyAssert(await validateExecutableCandidate(script, { executable: true }), script);
    }

    const monitor = new RegenerationMonitor({
        watchPaths: config.watchPaths,
        windowMs: config.batch.windowMs,
        cooldownMs: config.batch.cooldownMs,
        lock: store.lock,
        regenerate: (batch) => (script === null ? batchPrint(batch) : regenerationRun(script, batch))
    });
    const watched = await monitor.start();
    if (watched.length === 0) {
        console.error("[wrapkit] warning: no package export directory exists yet; nothing to watch");
    }

    await new Promise<void>((resolve) => {
        process.once("SIGINT", () => resolve());
        process.once("SIGTERM", () => resolve());
    });
    await monitor.stop();
}

async function batchPrint(batch: EventBatchEntry[]): Promise<void> {
    for (const entry of batch) {
        console.log(`${entry.changeType} ${entry.path}`);
    }
}

async function regenerationRun(script: string, batch: EventBatchEntry[]): Promise<void> {
    const exitCode = await new Promise<number | null>((resolve, reject) => {
        const child = spawn(script, [], {
            env: { ...process.env, WRAPKIT_CHANGED_PATHS: batch.map((entry) => entry.path).join("\n") },
            stdio: "inherit"
        });
        child.once("error", reject);
        child.once("exit", (code) => resolve(code));
    });
    if (exitCode !== 0) {
        logger.warn({ script, exitCode }, "regeneration script failed");
    }
}
