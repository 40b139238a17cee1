import type { ZodError } from "zod";

/**
 * Formats the first few zod issues as `path: message` pairs on one line.
 */
export function zodIssuesFormat(error: ZodError, limit = 3): string {
    return error.issues
        .slice(0, limit)
        .map((issue) => {
            const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
            return `${location}: ${issue.message}`;
        })
        .join("; ");
}
