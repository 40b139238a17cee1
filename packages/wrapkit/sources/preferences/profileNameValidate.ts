import { ValidationError } from "../errors/validationError.js";

const PROFILE_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

/**
 * Profile names double as file names, so only a conservative alphabet is accepted.
 */
export function profileNameValidate(name: string): void {
    if (!PROFILE_NAME.test(name)) {
        throw new ValidationError("FORBIDDEN", "Profile name must be 1-64 letters, digits, '_' or '-'.", {
            input: name
        });
    }
}
