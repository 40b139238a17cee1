import { ValidationError } from "../errors/validationError.js";
import type { PreferenceKey } from "./profileDocumentSchema.js";

/**
 * Converts a command-line value into the JSON value stored under key.
 * Lists accept JSON or whitespace-separated words; env maps accept JSON or `NAME=value` words.
 * `none` clears a script explicitly.
 */
export function preferenceValueParse(key: PreferenceKey, raw: string): unknown {
    const trimmed = raw.trim();
    switch (key) {
        case "custom_args":
            if (trimmed.startsWith("[")) {
                return jsonParse(trimmed, raw);
            }
            return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
        case "env_vars":
            if (trimmed.startsWith("{")) {
                return jsonParse(trimmed, raw);
            }
            return envPairsParse(trimmed, raw);
        case "pre_launch_script":
        case "post_launch_script":
            return trimmed === "none" ? null : trimmed;
        case "launch_method":
        case "pre_launch_failure_mode":
        case "post_launch_failure_mode":
            return trimmed;
    }
}

function envPairsParse(value: string, raw: string): Record<string, string> {
    const result: Record<string, string> = {};
    if (value.length === 0) {
        return result;
    }
    for (const pair of value.split(/\s+/)) {
        const separator = pair.indexOf("=");
        if (separator <= 0) {
            throw new ValidationError("REJECTED", "Environment entries must look like NAME=value.", { input: raw });
        }
        result[pair.slice(0, separator)] = pair.slice(separator + 1);
    }
    return result;
}

function jsonParse(value: string, raw: string): unknown {
    try {
        return JSON.parse(value);
    } catch (error) {
        throw new ValidationError("REJECTED", "Value is not valid JSON.", { input: raw, cause: error });
    }
}
