import { promises as fs } from "node:fs";

import { ConfigError } from "../errors/configError.js";
import { errorCodeIs } from "../util/lineFileRead.js";
import { zodIssuesFormat } from "../util/zodIssuesFormat.js";
import { type ProfileDocument, profileDocumentSchema } from "./profileDocumentSchema.js";
import { profileMigrate } from "./profileMigrate.js";

export type ProfileDocumentLoad = {
    document: ProfileDocument;
    migrated: boolean;
};

/**
 * Reads, migrates and validates a profile document.
 * Returns null when the file does not exist; malformed content is a ConfigError.
 */
export async function profileDocumentRead(filePath: string): Promise<ProfileDocumentLoad | null> {
    let content: string;
    try {
        content = await fs.readFile(filePath, "utf8");
    } catch (error) {
        if (errorCodeIs(error, "ENOENT")) {
            return null;
        }
        throw new ConfigError("Profile could not be read.", { filePath, cause: error });
    }
    return profileDocumentParse(content, filePath);
}

export function profileDocumentParse(content: string, filePath?: string): ProfileDocumentLoad {
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new ConfigError("Profile is not valid JSON.", { filePath, cause: error });
    }
    const migration = profileMigrate(raw, filePath);
    const parsed = profileDocumentSchema.safeParse(migration.document);
    if (!parsed.success) {
        throw new ConfigError(`Profile is malformed: ${zodIssuesFormat(parsed.error)}`, { filePath });
    }
    return { document: parsed.data, migrated: migration.migrated };
}

export function profileDocumentSerialize(document: ProfileDocument): string {
    return `${JSON.stringify(document, null, 4)}\n`;
}
