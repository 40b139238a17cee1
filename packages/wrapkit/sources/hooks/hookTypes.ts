import type { HookFailure } from "../errors/hookFailure.js";
import type { FailureMode } from "../preferences/preferenceTypes.js";

export type HookKind = "pre" | "post";

export type LaunchSource = "interactive" | "desktop" | "cli";

export type HookContext = {
    wrapperName: string;
    /** Canonical target identifier: package id or system binary path. */
    targetId: string;
    source: LaunchSource;
    /** Application exit code; post hooks only. */
    appExitCode?: number | null;
    envOverrides?: Record<string, string>;
};

/**
 * Inputs of the failure-mode chain, highest precedence first.
 */
export type FailureModeChain = {
    runtime?: FailureMode | null;
    env?: FailureMode | null;
    app?: FailureMode | null;
    global?: FailureMode | null;
};

export type HookOutcome = {
    kind: HookKind;
    executed: boolean;
    exitCode: number | null;
    timedOut: boolean;
    /** Mode applied to the outcome; null when the hook was absent or succeeded. */
    failureMode: FailureMode | null;
    /** True when the launch must stop (pre hook under abort). */
    aborted: boolean;
    scriptPath: string | null;
    /** Why the hook did not run, or how it failed. */
    detail: string | null;
    failure: HookFailure | null;
};
