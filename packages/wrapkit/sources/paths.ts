import os from "node:os";
import path from "node:path";

export const APP_DIR_NAME = "wrapkit";

export const PROFILE_DEFAULT_NAME = "default";

export const HOOK_SCRIPT_FILE_NAMES = {
    pre: "pre-launch.sh",
    post: "post-run.sh"
} as const;

/**
 * Returns the package export directories watched for install/uninstall events.
 */
export function packageExportPathsResolve(homeDir: string): string[] {
    return [
        "/var/lib/flatpak/exports/bin",
        "/var/lib/flatpak/exports/share/applications",
        path.join(homeDir, ".local", "share", "flatpak", "exports", "bin"),
        path.join(homeDir, ".local", "share", "flatpak", "exports", "share", "applications")
    ];
}

export function homeDirResolve(env: NodeJS.ProcessEnv): string {
    const home = env.HOME?.trim();
    return path.resolve(home && home.length > 0 ? home : os.homedir());
}
