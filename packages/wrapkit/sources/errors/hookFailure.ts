import type { HookKind } from "../hooks/hookTypes.js";
import { WrapkitError } from "./wrapkitError.js";

/**
 * A hook exited non-zero or timed out under the `abort` failure mode.
 */
export class HookFailure extends WrapkitError {
    readonly hookKind: HookKind;
    readonly exitCode: number | null;
    readonly timedOut: boolean;

    constructor(hookKind: HookKind, message: string, options: { exitCode: number | null; timedOut: boolean; input?: string }) {
        super("hooks", message, { input: options.input });
        this.name = "HookFailure";
        this.hookKind = hookKind;
        this.exitCode = options.exitCode;
        this.timedOut = options.timedOut;
    }
}
