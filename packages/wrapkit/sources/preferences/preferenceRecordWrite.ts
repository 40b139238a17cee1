import { atomicWrite } from "../util/atomicWrite.js";
import { preferenceRecordPath } from "./preferenceRecordRead.js";
import type { LaunchChoice } from "./preferenceTypes.js";

/**
 * Persists a launch choice. Callers hold the configuration lock.
 */
export async function preferenceRecordWrite(prefsDir: string, appName: string, choice: LaunchChoice): Promise<void> {
    await atomicWrite(preferenceRecordPath(prefsDir, appName), `${choice}\n`, 0o644);
}
