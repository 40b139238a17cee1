import type { ResolvedSettings } from "./preferenceTypes.js";

/**
 * Built-in defaults; the lowest precedence layer.
 */
export function settingsDefaults(): ResolvedSettings {
    return {
        launchMethod: "auto",
        customArgs: [],
        envOverrides: {},
        preLaunchScript: null,
        postLaunchScript: null,
        preFailureMode: "warn",
        postFailureMode: "warn"
    };
}
