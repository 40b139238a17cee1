import { promises as fs } from "node:fs";

/**
 * Reads a line-oriented record file, dropping blank lines and `#` comments.
 * Returns an empty list when the file does not exist.
 */
export async function lineFileRead(filePath: string): Promise<string[]> {
    let content: string;
    try {
        content = await fs.readFile(filePath, "utf8");
    } catch (error) {
        if (errorCodeIs(error, "ENOENT")) {
            return [];
        }
        throw error;
    }
    return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export function errorCodeIs(error: unknown, code: string): boolean {
    return error instanceof Error && "code" in error && error.code === code;
}
