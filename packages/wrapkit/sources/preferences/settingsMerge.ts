import type { ResolvedSettings, SettingsLayer } from "./preferenceTypes.js";

/**
 * Applies layers over base from lowest to highest precedence.
 * A layer only overrides the fields it declares; arrays and maps are replaced whole.
 */
export function settingsMerge(base: ResolvedSettings, layers: SettingsLayer[]): ResolvedSettings {
    const merged: ResolvedSettings = {
        ...base,
        customArgs: [...base.customArgs],
        envOverrides: { ...base.envOverrides }
    };
    for (const layer of layers) {
        if (layer.launchMethod !== undefined) {
            merged.launchMethod = layer.launchMethod;
        }
        if (layer.customArgs !== undefined) {
            merged.customArgs = [...layer.customArgs];
        }
        if (layer.envOverrides !== undefined) {
            merged.envOverrides = { ...layer.envOverrides };
        }
        if (layer.preLaunchScript !== undefined) {
            merged.preLaunchScript = layer.preLaunchScript;
        }
        if (layer.postLaunchScript !== undefined) {
            merged.postLaunchScript = layer.postLaunchScript;
        }
        if (layer.preFailureMode !== undefined) {
            merged.preFailureMode = layer.preFailureMode;
        }
        if (layer.postFailureMode !== undefined) {
            merged.postFailureMode = layer.postFailureMode;
        }
    }
    return merged;
}
