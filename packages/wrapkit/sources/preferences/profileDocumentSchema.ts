import { z } from "zod";

import { FAILURE_MODES, LAUNCH_METHODS } from "./preferenceTypes.js";

export const PROFILE_SCHEMA_VERSION = 2;

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const preferenceBlockSchema = z
    .object({
        launch_method: z.enum(LAUNCH_METHODS).optional(),
        custom_args: z.array(z.string()).optional(),
        env_vars: z.record(z.string().regex(ENV_NAME, "Invalid environment variable name"), z.string()).optional(),
        pre_launch_script: z.string().min(1).nullable().optional(),
        post_launch_script: z.string().min(1).nullable().optional(),
        pre_launch_failure_mode: z.enum(FAILURE_MODES).optional(),
        post_launch_failure_mode: z.enum(FAILURE_MODES).optional()
    })
    .passthrough();

export const permissionPresetSchema = z
    .object({
        permissions: z.array(z.string())
    })
    .passthrough();

/**
 * App blocks stay `unknown` here so one malformed block never hides the others.
 */
export const profileDocumentSchema = z
    .object({
        schema_version: z.literal(PROFILE_SCHEMA_VERSION),
        global_preferences: preferenceBlockSchema,
        app_preferences: z.record(z.unknown()),
        permission_presets: z.record(permissionPresetSchema)
    })
    .passthrough();

export type PreferenceBlock = z.infer<typeof preferenceBlockSchema>;
export type ProfileDocument = z.infer<typeof profileDocumentSchema>;

export type PreferenceKey =
    | "launch_method"
    | "custom_args"
    | "env_vars"
    | "pre_launch_script"
    | "post_launch_script"
    | "pre_launch_failure_mode"
    | "post_launch_failure_mode";

export const PREFERENCE_KEYS: readonly PreferenceKey[] = [
    "launch_method",
    "custom_args",
    "env_vars",
    "pre_launch_script",
    "post_launch_script",
    "pre_launch_failure_mode",
    "post_launch_failure_mode"
];

export function profileDocumentEmpty(): ProfileDocument {
    return {
        schema_version: PROFILE_SCHEMA_VERSION,
        global_preferences: {
            pre_launch_failure_mode: "warn",
            post_launch_failure_mode: "warn"
        },
        app_preferences: {},
        permission_presets: {}
    };
}
