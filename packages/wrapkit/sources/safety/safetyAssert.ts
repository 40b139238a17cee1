import { ValidationError } from "../errors/validationError.js";
import type { SafetyResult } from "./safetyTypes.js";

/**
 * Converts a failed safety check into a thrown ValidationError carrying the input.
 */
export function safetyAssert(result: SafetyResult, input: string): void {
    if (!result.ok) {
        throw new ValidationError(result.code, result.reason, { input });
    }
}
