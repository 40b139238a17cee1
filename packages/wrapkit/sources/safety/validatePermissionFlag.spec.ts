import { describe, expect, it } from "vitest";

import { ValidationError } from "../errors/validationError.js";
import { safetyAssert } from "./safetyAssert.js";
import { validatePackageId } from "./validatePackageId.js";
import { validatePermissionFlag } from "./validatePermissionFlag.js";

describe("validatePermissionFlag", () => {
    it("accepts sandbox flags", () => {
        expect(validatePermissionFlag("--share=network")).toEqual({ ok: true });
        expect(validatePermissionFlag("--filesystem=home")).toEqual({ ok: true });
        expect(validatePermissionFlag("--filesystem=~/Music:ro")).toEqual({ ok: true });
        expect(validatePermissionFlag("--nofilesystem=host")).toEqual({ ok: true });
        expect(validatePermissionFlag("--die-with-parent")).toEqual({ ok: true });
    });

    it("rejects anything that could reach a shell", () => {
        for (const flag of ["share=network", "--share=$(id)", "--share=a;b", "--share=a b", "-x", "--"]) {
            expect(validatePermissionFlag(flag)).toMatchObject({ ok: false, code: "REJECTED" });
        }
    });
});

describe("validatePackageId", () => {
    it("requires a dotted identifier", () => {
        expect(validatePackageId("org.mozilla.firefox")).toEqual({ ok: true });
        expect(validatePackageId("com.visualstudio.code-oss")).toEqual({ ok: true });
        expect(validatePackageId("firefox")).toMatchObject({ ok: false, code: "FORBIDDEN" });
        expect(validatePackageId("org..evil")).toMatchObject({ ok: false });
        expect(validatePackageId("org.evil;rm")).toMatchObject({ ok: false });
    });
});

describe("safetyAssert", () => {
    it("throws a ValidationError with the input", () => {
        let caught: unknown = null;
        try {
            safetyAssert({ ok: false, code: "FORBIDDEN", reason: "Nope." }, "sudo");
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ValidationError);
        expect(caught).toMatchObject({ code: "FORBIDDEN", input: "sudo", message: "Nope." });
        expect(() => safetyAssert({ ok: true }, "firefox")).not.toThrow();
    });
});
