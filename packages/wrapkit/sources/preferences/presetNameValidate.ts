import { ValidationError } from "../errors/validationError.js";

const PRESET_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;

export function presetNameValidate(name: string): void {
    if (!PRESET_NAME.test(name)) {
        throw new ValidationError("FORBIDDEN", "Preset name must be 1-64 letters, digits, '.', '_' or '-'.", {
            input: name
        });
    }
}
