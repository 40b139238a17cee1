import { errorCodeIs } from "./lineFileRead.js";

/**
 * Checks whether a pid refers to a running process.
 * EPERM means the process exists but belongs to another user.
 */
export function processIsAlive(pid: number): boolean {
    if (!Number.isInteger(pid) || pid <= 0) {
        return false;
    }
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        return errorCodeIs(error, "EPERM");
    }
}
