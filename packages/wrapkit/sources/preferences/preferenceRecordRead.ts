import { promises as fs } from "node:fs";
import path from "node:path";

import { getLogger } from "../log.js";
import { safetyAssert } from "../safety/safetyAssert.js";
import { validateIdentifierSyntax } from "../safety/validateIdentifierSyntax.js";
import { errorCodeIs } from "../util/lineFileRead.js";
import { type LaunchChoice, launchChoiceIs } from "./preferenceTypes.js";

const logger = getLogger("config.preference");

export function preferenceRecordPath(prefsDir: string, appName: string): string {
    safetyAssert(validateIdentifierSyntax(appName), appName);
    return path.join(prefsDir, `${appName}.pref`);
}

/**
 * Reads the persisted launch choice for an app.
 * A missing file means no choice; unreadable or unknown content is ignored with a warning.
 */
export async function preferenceRecordRead(prefsDir: string, appName: string): Promise<LaunchChoice | null> {
    const filePath = preferenceRecordPath(prefsDir, appName);
    let content: string;
    try {
        content = await fs.readFile(filePath, "utf8");
    } catch (error) {
        if (errorCodeIs(error, "ENOENT")) {
            return null;
        }
        logger.warn({ app: appName, error }, "preference record unreadable; ignoring");
        return null;
    }
    const value = content.trim();
    if (!launchChoiceIs(value)) {
        logger.warn({ app: appName, value: JSON.stringify(value.slice(0, 40)) }, "preference record malformed; ignoring");
        return null;
    }
    return value;
}
