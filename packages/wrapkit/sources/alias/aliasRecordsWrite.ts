import { lineFileWrite } from "../util/lineFileWrite.js";
import type { AliasRecord } from "./aliasTypes.js";

export async function aliasRecordsWrite(filePath: string, records: AliasRecord[]): Promise<void> {
    await lineFileWrite(
        filePath,
        records.map((record) => `${record.aliasName} ${record.targetName}`)
    );
}
