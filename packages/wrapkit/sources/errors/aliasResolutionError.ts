import { WrapkitError } from "./wrapkitError.js";

export type AliasResolutionErrorKind = "collision" | "cycle" | "hop_limit";

/**
 * Alias creation or resolution failed. Surfaced to the caller verbatim.
 */
export class AliasResolutionError extends WrapkitError {
    readonly kind: AliasResolutionErrorKind;
    readonly chain: string[];

    constructor(kind: AliasResolutionErrorKind, message: string, options?: { input?: string; chain?: string[] }) {
        super("alias", message, { input: options?.input });
        this.name = "AliasResolutionError";
        this.kind = kind;
        this.chain = options?.chain ?? [];
    }
}
