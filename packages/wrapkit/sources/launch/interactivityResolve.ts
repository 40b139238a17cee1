import { envValue } from "../util/envValue.js";

export const FORCE_ENV = "WRAPKIT_FORCE";

export type InteractivityInput = {
    forceInteractive?: boolean;
    forceDesktop?: boolean;
    stdinIsTTY: boolean;
    stdoutIsTTY: boolean;
    env: NodeJS.ProcessEnv;
};

/**
 * Decides once per invocation whether the launch may prompt.
 * The force-interactive flag wins over everything; a desktop override wins over the environment and the terminal.
 */
export function interactivityResolve(input: InteractivityInput): boolean {
    if (input.forceInteractive) {
        return true;
    }
    const forced = envValue(input.env, FORCE_ENV)?.toLowerCase() ?? null;
    const desktop = input.forceDesktop === true || forced === "desktop";
    if (desktop) {
        return false;
    }
    if (forced === "interactive") {
        return true;
    }
    return input.stdinIsTTY && input.stdoutIsTTY;
}
