export type WrapkitComponent = "safety" | "config" | "alias" | "hooks" | "launch" | "lock" | "events" | "wrappers";

/**
 * Base error for every failure the engine reports to its caller.
 * Expects: component names the subsystem; input is the offending raw value, if any.
 */
export class WrapkitError extends Error {
    readonly component: WrapkitComponent;
    readonly input?: string;

    constructor(component: WrapkitComponent, message: string, options?: { input?: string; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "WrapkitError";
        this.component = component;
        this.input = options?.input;
    }
}
