import type { HookOutcome, LaunchSource } from "../hooks/hookTypes.js";
import type { FailureMode, LaunchChoice } from "../preferences/preferenceTypes.js";

export type TargetKind = "system" | "package";

export type LaunchState =
    | "START"
    | "INTERACTIVITY_CHECK"
    | "BYPASS"
    | "RESOLVE_TARGET"
    | "PRE_HOOK"
    | "EXECUTE"
    | "POST_HOOK"
    | "DONE";

export type LaunchRequest = {
    /** Name the wrapper was invoked as; may be an alias. */
    wrapperName: string;
    args: string[];
    forceInteractive?: boolean;
    forceDesktop?: boolean;
    /** One-shot choice for this invocation only; never persisted. */
    launchChoice?: LaunchChoice;
    failureModeOverride?: FailureMode;
    source?: LaunchSource;
    stdinIsTTY: boolean;
    stdoutIsTTY: boolean;
    env: NodeJS.ProcessEnv;
};

/**
 * What to execute. target is an absolute binary path for system targets
 * and a package identifier for package targets.
 */
export type LaunchDecision = {
    targetKind: TargetKind;
    target: string;
    args: string[];
    env: Record<string, string>;
};

export type LaunchResult = {
    ok: boolean;
    exitCode: number;
    decision: LaunchDecision | null;
    states: LaunchState[];
    preHook: HookOutcome | null;
    postHook: HookOutcome | null;
};

export type LaunchCandidates = {
    systemPath: string | null;
    packageId: string | null;
};

export type PreferencePromptRequest = {
    appName: string;
    systemPath: string;
    packageId: string;
};

/** Asks the user to pick a target once; null means no answer. */
export type PreferencePrompt = (request: PreferencePromptRequest) => Promise<LaunchChoice | null>;

/** Runs the decided target and resolves with its exit code. */
export type LaunchExecutor = (decision: LaunchDecision) => Promise<number>;
