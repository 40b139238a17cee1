import { createHash } from "node:crypto";

const NAME_MAX_LENGTH = 100;

/**
 * Derives a wrapper name from a package id: the last dotted segment, lowercased,
 * reduced to `[a-z0-9_-]`. Falls back to a short hash when nothing usable remains.
 */
export function wrapperNameFromPackageId(packageId: string): string {
    const segment = packageId.split(".").at(-1) ?? "";
    const name = segment
        .toLowerCase()
        .normalize("NFKD")
        .replace(/[\u0300-\u036f]/g, "")
        .replace(/[^a-z0-9_-]/g, "-")
        .replace(/^-+|-+$/g, "")
        .replace(/-+/g, "-");
    if (name.length === 0) {
        return `app-${createHash("sha256").update(packageId).digest("hex").slice(0, 8)}`;
    }
    return name.slice(0, NAME_MAX_LENGTH);
}
