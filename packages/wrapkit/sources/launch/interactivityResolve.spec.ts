import { describe, expect, it } from "vitest";

import { interactivityResolve } from "./interactivityResolve.js";

describe("interactivityResolve", () => {
    const tty = { stdinIsTTY: true, stdoutIsTTY: true, env: {} };
    const pipe = { stdinIsTTY: false, stdoutIsTTY: true, env: {} };

    it("is interactive only when both streams are terminals", () => {
        expect(interactivityResolve(tty)).toBe(true);
        expect(interactivityResolve(pipe)).toBe(false);
        expect(interactivityResolve({ ...tty, stdoutIsTTY: false })).toBe(false);
    });

    it("lets the force-interactive flag win over everything", () => {
        expect(interactivityResolve({ ...pipe, forceInteractive: true, forceDesktop: true })).toBe(true);
        expect(interactivityResolve({ ...pipe, forceInteractive: true, env: { WRAPKIT_FORCE: "desktop" } })).toBe(true);
    });

    it("honors the environment override unless a desktop flag is given", () => {
        expect(interactivityResolve({ ...pipe, env: { WRAPKIT_FORCE: "interactive" } })).toBe(true);
        expect(interactivityResolve({ ...pipe, env: { WRAPKIT_FORCE: "Interactive" } })).toBe(true);
        expect(interactivityResolve({ ...pipe, forceDesktop: true, env: { WRAPKIT_FORCE: "interactive" } })).toBe(false);
    });

    it("treats a desktop override as non-interactive on a terminal", () => {
        expect(interactivityResolve({ ...tty, forceDesktop: true })).toBe(false);
        expect(interactivityResolve({ ...tty, env: { WRAPKIT_FORCE: "desktop" } })).toBe(false);
        expect(interactivityResolve({ ...tty, env: { WRAPKIT_FORCE: "bogus" } })).toBe(true);
    });
});
