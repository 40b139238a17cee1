import { WrapkitError } from "./wrapkitError.js";

/**
 * Configuration layer is malformed, unreadable or of an unsupported schema.
 * Expects: filePath points at the failing document when one is involved.
 */
export class ConfigError extends WrapkitError {
    readonly filePath?: string;

    constructor(message: string, options?: { filePath?: string; input?: string; cause?: unknown }) {
        super("config", message, options);
        this.name = "ConfigError";
        this.filePath = options?.filePath;
    }
}
