import { getLogger } from "../log.js";
import { validateIdentifierSyntax } from "../safety/validateIdentifierSyntax.js";
import { lineFileRead } from "../util/lineFileRead.js";
import type { AliasRecord } from "./aliasTypes.js";

const logger = getLogger("alias.records");

/**
 * Reads `aliasName targetName` lines; malformed lines are skipped with a warning.
 */
export async function aliasRecordsRead(filePath: string): Promise<AliasRecord[]> {
    const records: AliasRecord[] = [];
    for (const line of await lineFileRead(filePath)) {
        const parts = line.split(/\s+/);
        const [aliasName, targetName] = parts;
        if (
            parts.length !== 2 ||
            aliasName === undefined ||
            targetName === undefined ||
            !validateIdentifierSyntax(aliasName).ok ||
            !validateIdentifierSyntax(targetName).ok
        ) {
            logger.warn({ line: JSON.stringify(line.slice(0, 80)) }, "skipping malformed alias record");
            continue;
        }
        records.push({ aliasName, targetName });
    }
    return records;
}
