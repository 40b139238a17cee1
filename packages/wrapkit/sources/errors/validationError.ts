import { WrapkitError } from "./wrapkitError.js";

export type ValidationErrorCode = "FORBIDDEN" | "TRAVERSAL" | "REJECTED";

/**
 * Identifier, path or script failed a safety check. Always fatal to the operation.
 */
export class ValidationError extends WrapkitError {
    readonly code: ValidationErrorCode;

    constructor(code: ValidationErrorCode, message: string, options?: { input?: string; cause?: unknown }) {
        super("safety", message, options);
        this.name = "ValidationError";
        this.code = code;
    }
}
