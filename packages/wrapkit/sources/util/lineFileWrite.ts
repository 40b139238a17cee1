import { atomicWrite } from "./atomicWrite.js";

/**
 * Atomically replaces a line-oriented record file.
 */
export async function lineFileWrite(filePath: string, lines: string[]): Promise<void> {
    const payload = lines.length === 0 ? "" : `${lines.join("\n")}\n`;
    await atomicWrite(filePath, payload, 0o644);
}
