export const LAUNCH_METHODS = ["auto", "system", "package"] as const;
export const LAUNCH_CHOICES = ["system", "package"] as const;
export const FAILURE_MODES = ["abort", "warn", "ignore"] as const;

export type LaunchMethod = (typeof LAUNCH_METHODS)[number];
export type LaunchChoice = (typeof LAUNCH_CHOICES)[number];
export type FailureMode = (typeof FAILURE_MODES)[number];

/**
 * One precedence layer. An absent key means "this layer does not set the field";
 * a null script means "explicitly no script".
 */
export type SettingsLayer = {
    launchMethod?: LaunchMethod;
    customArgs?: string[];
    envOverrides?: Record<string, string>;
    preLaunchScript?: string | null;
    postLaunchScript?: string | null;
    preFailureMode?: FailureMode;
    postFailureMode?: FailureMode;
};

export type ResolvedSettings = {
    launchMethod: LaunchMethod;
    customArgs: string[];
    envOverrides: Record<string, string>;
    preLaunchScript: string | null;
    postLaunchScript: string | null;
    preFailureMode: FailureMode;
    postFailureMode: FailureMode;
};

export type SettingsLayers = {
    global: SettingsLayer;
    app: SettingsLayer;
    preference: LaunchChoice | null;
};

export type AppSettings = {
    appName: string;
    profileName: string;
    settings: ResolvedSettings;
    layers: SettingsLayers;
};

export type PermissionPreset = {
    name: string;
    permissions: string[];
    source: "builtin" | "user";
};

export function launchChoiceIs(value: unknown): value is LaunchChoice {
    return value === "system" || value === "package";
}

export function failureModeIs(value: unknown): value is FailureMode {
    return value === "abort" || value === "warn" || value === "ignore";
}
