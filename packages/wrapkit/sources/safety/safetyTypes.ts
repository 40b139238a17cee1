import type { ValidationErrorCode } from "../errors/validationError.js";

export type SafetyResult = { ok: true } | { ok: false; code: ValidationErrorCode; reason: string };

export const SAFETY_OK: SafetyResult = Object.freeze({ ok: true });
