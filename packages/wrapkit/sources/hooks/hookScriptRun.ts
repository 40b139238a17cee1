import { spawn } from "node:child_process";

export type HookScriptRunOptions = {
    env: NodeJS.ProcessEnv;
    timeoutMs: number;
    /** Delay between SIGTERM and SIGKILL once the timeout fires. */
    killGraceMs?: number;
    stdio?: "inherit" | "ignore";
};

export type HookScriptRunResult = {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    timedOut: boolean;
};

const DEFAULT_KILL_GRACE_MS = 2_000;

/**
 * Executes a hook script directly (no intermediate shell) in its own process group.
 * On timeout the whole group gets SIGTERM, then SIGKILL after the grace period.
 */
export async function hookScriptRun(scriptPath: string, options: HookScriptRunOptions): Promise<HookScriptRunResult> {
    const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    return new Promise((resolve, reject) => {
        const child = spawn(scriptPath, [], {
            env: options.env,
            stdio: ["ignore", options.stdio ?? "inherit", options.stdio ?? "inherit"],
            detached: true,
            windowsHide: true
        });

        let timedOut = false;
        let killTimer: ReturnType<typeof setTimeout> | null = null;
        const signalGroup = (signal: NodeJS.Signals) => {
            if (child.pid === undefined) {
                return;
            }
            try {
                process.kill(-child.pid, signal);
            } catch {
                child.kill(signal);
            }
        };

        const timeoutTimer = setTimeout(() => {
            timedOut = true;
            signalGroup("SIGTERM");
            killTimer = setTimeout(() => signalGroup("SIGKILL"), killGraceMs);
        }, options.timeoutMs);

        const clearTimers = () => {
            clearTimeout(timeoutTimer);
            if (killTimer) {
                clearTimeout(killTimer);
            }
        };

        child.once("error", (error) => {
            clearTimers();
            reject(error);
        });
        child.once("exit", (code, signal) => {
            clearTimers();
            if (timedOut) {
                // Reap anything the script left running in its group.
                signalGroup("SIGKILL");
            }
            resolve({ exitCode: timedOut ? null : code, signal, timedOut });
        });
    });
}
