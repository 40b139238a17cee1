import { HookFailure } from "../errors/hookFailure.js";
import { getLogger } from "../log.js";
import { validateExecutableCandidate } from "../safety/validateExecutableCandidate.js";
import { errorCodeIs } from "../util/lineFileRead.js";
import { hookFailureModeResolve } from "./hookFailureModeResolve.js";
import { type HookScriptRunResult, hookScriptRun } from "./hookScriptRun.js";
import type { FailureModeChain, HookContext, HookKind, HookOutcome } from "./hookTypes.js";
import { hookWarningWrite } from "./hookWarningWrite.js";

const logger = getLogger("hooks.executor");

export const HOOK_TIMEOUT_EXIT_CODE = 124;
export const HOOK_NOT_FOUND_EXIT_CODE = 127;
export const HOOK_NOT_EXECUTABLE_EXIT_CODE = 126;

export type HookExecutorOptions = {
    timeoutMs: number;
    /** Base environment handed to every hook. */
    env: NodeJS.ProcessEnv;
    killGraceMs?: number;
    stdio?: "inherit" | "ignore";
    warn?: (message: string) => void;
};

/**
 * Runs pre/post launch hooks and applies the resolved failure mode.
 * A missing or non-executable script is an absent hook, not a failure.
 */
export class HookExecutor {
    private readonly options: HookExecutorOptions;
    private readonly warn: (message: string) => void;

    constructor(options: HookExecutorOptions) {
        this.options = options;
        this.warn = options.warn ?? hookWarningWrite;
    }

    async run(
        kind: HookKind,
        scriptPath: string | null,
        context: HookContext,
        chain: FailureModeChain
    ): Promise<HookOutcome> {
        if (scriptPath === null) {
            return absent(kind, null, null);
        }
        const candidate = await validateExecutableCandidate(scriptPath, { executable: true });
        if (!candidate.ok) {
            logger.debug({ hook: kind, script: scriptPath, reason: candidate.reason }, "hook absent");
            return absent(kind, scriptPath, candidate.reason);
        }

        const started = Date.now();
        let result: HookScriptRunResult;
        let startError: string | null = null;
        try {
            result = await hookScriptRun(scriptPath, {
                env: this.envBuild(kind, context),
                timeoutMs: this.options.timeoutMs,
                killGraceMs: this.options.killGraceMs,
                stdio: this.options.stdio
            });
        } catch (error) {
            // Validated but not exec'able: missing interpreter, noexec mount, bad format.
            startError = errorCodeGet(error);
            logger.warn({ hook: kind, script: scriptPath, code: startError }, "hook could not be started");
            result = {
                exitCode: errorCodeIs(error, "ENOENT") ? HOOK_NOT_FOUND_EXIT_CODE : HOOK_NOT_EXECUTABLE_EXIT_CODE,
                signal: null,
                timedOut: false
            };
        }
        logger.debug(
            { hook: kind, script: scriptPath, exitCode: result.exitCode, timedOut: result.timedOut, ms: Date.now() - started },
            "hook finished"
        );

        if (startError === null && !result.timedOut && result.exitCode === 0) {
            return {
                kind,
                executed: true,
                exitCode: 0,
                timedOut: false,
                failureMode: null,
                aborted: false,
                scriptPath,
                detail: null,
                failure: null
            };
        }

        const failureMode = hookFailureModeResolve(chain);
        const detail = failureDetail(result, startError, this.options.timeoutMs);
        const label = kind === "pre" ? "pre-launch hook" : "post-launch hook";
        const aborted = kind === "pre" && failureMode === "abort";
        const failure = new HookFailure(kind, `${label} ${detail}`, {
            exitCode: result.exitCode,
            timedOut: result.timedOut,
            input: scriptPath
        });

        if (aborted) {
            this.warn(`${label} ${detail}; launch aborted`);
        } else if (failureMode !== "ignore") {
            this.warn(`${label} ${detail}`);
        }

        return {
            kind,
            executed: true,
            exitCode: result.exitCode,
            timedOut: result.timedOut,
            failureMode,
            aborted,
            scriptPath,
            detail,
            failure
        };
    }

    private envBuild(kind: HookKind, context: HookContext): NodeJS.ProcessEnv {
        const env: NodeJS.ProcessEnv = {
            ...this.options.env,
            ...context.envOverrides,
            WRAPKIT_HOOK: kind,
            WRAPKIT_WRAPPER_NAME: context.wrapperName,
            WRAPKIT_APP_ID: context.targetId,
            WRAPKIT_SOURCE: context.source
        };
        if (kind === "post") {
            env.WRAPKIT_EXIT_CODE = context.appExitCode === undefined || context.appExitCode === null ? "" : String(context.appExitCode);
        }
        return env;
    }
}

/**
 * Exit code a caller reports for a failed hook; timeouts map to 124, other signals to 1.
 */
export function hookOutcomeExitCode(outcome: HookOutcome): number {
    if (outcome.timedOut) {
        return HOOK_TIMEOUT_EXIT_CODE;
    }
    return outcome.exitCode ?? 1;
}

function absent(kind: HookKind, scriptPath: string | null, detail: string | null): HookOutcome {
    return {
        kind,
        executed: false,
        exitCode: null,
        timedOut: false,
        failureMode: null,
        aborted: false,
        scriptPath,
        detail,
        failure: null
    };
}

function failureDetail(result: HookScriptRunResult, startError: string | null, timeoutMs: number): string {
    if (startError !== null) {
        return `could not be started: ${startError}`;
    }
    if (result.timedOut) {
        return `timed out after ${timeoutMs}ms`;
    }
    if (result.exitCode === null) {
        return `terminated by ${result.signal ?? "signal"}`;
    }
    return `exited with code ${result.exitCode}`;
}

function errorCodeGet(error: unknown): string {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return "unknown error";
}
