import type { PreferenceBlock } from "./profileDocumentSchema.js";
import type { SettingsLayer } from "./preferenceTypes.js";

/**
 * Maps a persisted preference block to a settings layer, keeping only the keys it declares.
 */
export function preferenceBlockToLayer(block: PreferenceBlock): SettingsLayer {
    const layer: SettingsLayer = {};
    if (block.launch_method !== undefined) {
        layer.launchMethod = block.launch_method;
    }
    if (block.custom_args !== undefined) {
        layer.customArgs = [...block.custom_args];
    }
    if (block.env_vars !== undefined) {
        layer.envOverrides = { ...block.env_vars };
    }
    if (block.pre_launch_script !== undefined) {
        layer.preLaunchScript = block.pre_launch_script;
    }
    if (block.post_launch_script !== undefined) {
        layer.postLaunchScript = block.post_launch_script;
    }
    if (block.pre_launch_failure_mode !== undefined) {
        layer.preFailureMode = block.pre_launch_failure_mode;
    }
    if (block.post_launch_failure_mode !== undefined) {
        layer.postFailureMode = block.post_launch_failure_mode;
    }
    return layer;
}
