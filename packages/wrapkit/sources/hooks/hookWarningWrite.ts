/**
 * Writes a hook warning to stderr, prefixed so it stands apart from application output.
 */
export function hookWarningWrite(message: string): void {
    process.stderr.write(`[wrapkit] warning: ${message}\n`);
}
