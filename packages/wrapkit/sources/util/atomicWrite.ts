import { promises as fs } from "node:fs";
import path from "node:path";

/**
 * Writes a file atomically by renaming a temp file into place.
 * Readers see either the previous content or the full new content.
 * Expects: payload is fully serialized; parent directories are created on demand.
 */
export async function atomicWrite(filePath: string, payload: string, mode = 0o600): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
    try {
        await fs.writeFile(tempPath, payload, { mode });
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
}
