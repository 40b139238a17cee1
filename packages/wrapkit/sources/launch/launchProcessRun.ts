import { spawn } from "node:child_process";
import os from "node:os";

import type { PackageRuntime } from "../config/configTypes.js";
import { WrapkitError } from "../errors/wrapkitError.js";
import { getLogger } from "../log.js";
import type { LaunchDecision } from "./launchTypes.js";

const logger = getLogger("launch.process");

/**
 * Command line for a decision: the binary itself, or the package runtime.
 */
export function launchCommandBuild(decision: LaunchDecision, runtime: PackageRuntime): { command: string; args: string[] } {
    if (decision.targetKind === "system") {
        return { command: decision.target, args: [...decision.args] };
    }
    return { command: runtime.command, args: [...runtime.argsPrefix, decision.target, ...decision.args] };
}

/**
 * Runs the decided target with inherited stdio and resolves with its exit code.
 * A signal exit maps to 128 + signal number.
 */
export async function launchProcessRun(decision: LaunchDecision, runtime: PackageRuntime): Promise<number> {
    const { command, args } = launchCommandBuild(decision, runtime);
    logger.debug({ command, argc: args.length, kind: decision.targetKind }, "starting target");
    return new Promise((resolve, reject) => {
        const child = spawn(command, args, { env: decision.env, stdio: "inherit" });
        child.once("error", (error) => {
            reject(new WrapkitError("launch", "Target could not be started.", { input: command, cause: error }));
        });
        child.once("exit", (code, signal) => {
            if (code !== null) {
                resolve(code);
                return;
            }
            const signalNumber = signal ? os.constants.signals[signal] : undefined;
            resolve(128 + (signalNumber ?? 0));
        });
    });
}
