import { errorDiagnosticFormat } from "../errors/errorDiagnosticFormat.js";
import { LockContentionError } from "../errors/lockContentionError.js";
import { getLogger } from "../log.js";

const logger = getLogger("commands");

export const EXIT_FAILURE = 1;
export const EXIT_LOCKED = 2;

/**
 * Runs a command body and turns a thrown error into a one-line diagnostic and an exit code.
 */
export async function commandRun(func: () => Promise<void>): Promise<void> {
    try {
        await func();
    } catch (error) {
        logger.debug({ error }, "command failed");
        process.exitCode = error instanceof LockContentionError ? EXIT_LOCKED : EXIT_FAILURE;
        console.error(errorDiagnosticFormat(error));
    }
}
