import { WrapkitError } from "./wrapkitError.js";

const INPUT_MAX_LENGTH = 80;

/**
 * Renders an error as the single-line diagnostic shown to users.
 * The offending input is JSON-escaped so it is never echoed as executable text.
 */
export function errorDiagnosticFormat(error: unknown): string {
    if (!(error instanceof WrapkitError)) {
        const message = error instanceof Error ? error.message : String(error);
        return `wrapkit: ${lineFlatten(message)}`;
    }

    const base = `wrapkit: [${error.component}] ${lineFlatten(error.message)}`;
    if (error.input === undefined) {
        return base;
    }
    return `${base} (input: ${inputEscape(error.input)})`;
}

function inputEscape(input: string): string {
    const truncated = input.length > INPUT_MAX_LENGTH ? `${input.slice(0, INPUT_MAX_LENGTH)}...` : input;
    return JSON.stringify(truncated);
}

function lineFlatten(message: string): string {
    return message.replace(/[\r\n]+/g, " ").trim();
}
