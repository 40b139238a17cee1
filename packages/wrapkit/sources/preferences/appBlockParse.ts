import { ConfigError } from "../errors/configError.js";
import { zodIssuesFormat } from "../util/zodIssuesFormat.js";
import { type PreferenceBlock, type ProfileDocument, preferenceBlockSchema } from "./profileDocumentSchema.js";

/**
 * Extracts and validates one app block. Returns null when the profile has no block for the app.
 */
export function appBlockParse(document: ProfileDocument, appName: string): PreferenceBlock | null {
    if (!Object.prototype.hasOwnProperty.call(document.app_preferences, appName)) {
        return null;
    }
    const parsed = preferenceBlockSchema.safeParse(document.app_preferences[appName]);
    if (!parsed.success) {
        throw new ConfigError(`App block "${appName}" is malformed: ${zodIssuesFormat(parsed.error)}`, {
            input: appName
        });
    }
    return parsed.data;
}
