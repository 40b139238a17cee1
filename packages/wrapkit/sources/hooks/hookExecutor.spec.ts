import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { HookFailure } from "../errors/hookFailure.js";
import { HookExecutor, hookOutcomeExitCode } from "./hookExecutor.js";
import type { HookContext } from "./hookTypes.js";

describe("HookExecutor", () => {
    let dir: string;
    let warnings: string[];
    let executor: HookExecutor;
    const context: HookContext = {
        wrapperName: "firefox",
        targetId: "org.mozilla.firefox",
        source: "interactive",
        envOverrides: { MOZ_ENABLE_WAYLAND: "1" }
    };

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "wrapkit-hooks-"));
        warnings = [];
        executor = new HookExecutor({
            timeoutMs: 5_000,
            env: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
            killGraceMs: 100,
            stdio: "ignore",
            warn: (message) => warnings.push(message)
        });
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    async function scriptWrite(name: string, body: string, mode = 0o755): Promise<string> {
        const filePath = path.join(dir, name);
        await fs.writeFile(filePath, `#!/bin/sh\n${body}\n`, { mode });
        return filePath;
    }

    it("treats a missing script as an absent hook", async () => {
        const outcome = await executor.run("pre", path.join(dir, "missing.sh"), context, { runtime: "abort" });
        expect(outcome).toMatchObject({ executed: false, exitCode: null, failureMode: null, aborted: false });
        expect(warnings).toEqual([]);
    });

    it("treats a non-executable script as an absent hook", async () => {
        const script = await scriptWrite("noexec.sh", "exit 1", 0o644);
        const outcome = await executor.run("pre", script, context, { runtime: "abort" });
        expect(outcome).toMatchObject({ executed: false, detail: "File is not executable." });
    });

    it("passes the invocation context through the environment", async () => {
        const output = path.join(dir, "env.txt");
        const script = await scriptWrite(
            "post.sh",
            `printf '%s|%s|%s|%s|%s|%s' "$WRAPKIT_HOOK" "$WRAPKIT_WRAPPER_NAME" "$WRAPKIT_APP_ID" "$WRAPKIT_SOURCE" "$WRAPKIT_EXIT_CODE" "$MOZ_ENABLE_WAYLAND" > '${output}'`
        );

        const outcome = await executor.run("post", script, { ...context, appExitCode: 3 }, {});
        expect(outcome).toMatchObject({ executed: true, exitCode: 0, failureMode: null, failure: null });
        expect(await fs.readFile(output, "utf8")).toBe("post|firefox|org.mozilla.firefox|interactive|3|1");
    });

    it("aborts a failing pre hook under abort", async () => {
        const script = await scriptWrite("fail.sh", "exit 7");
        const outcome = await executor.run("pre", script, context, { app: "abort" });

        expect(outcome).toMatchObject({ executed: true, exitCode: 7, failureMode: "abort", aborted: true });
        expect(outcome.failure).toBeInstanceOf(HookFailure);
        expect(hookOutcomeExitCode(outcome)).toBe(7);
        expect(warnings).toEqual(["pre-launch hook exited with code 7; launch aborted"]);
    });

    it("degrades abort to warn for post hooks but keeps the hook's exit code", async () => {
        const script = await scriptWrite("fail.sh", "exit 5");
        const outcome = await executor.run("post", script, { ...context, appExitCode: 0 }, { global: "abort" });

        expect(outcome).toMatchObject({ exitCode: 5, failureMode: "abort", aborted: false });
        expect(warnings).toEqual(["post-launch hook exited with code 5"]);
    });

    it("turns a hook whose interpreter is missing into a failed outcome", async () => {
        const script = path.join(dir, "broken.sh");
        await fs.writeFile(script, "#!/nonexistent/interp\nexit 0\n", { mode: 0o755 });

        const outcome = await executor.run("pre", script, context, { app: "abort" });

        expect(outcome).toMatchObject({
            executed: true,
            exitCode: 127,
            timedOut: false,
            failureMode: "abort",
            aborted: true,
            detail: "could not be started: ENOENT"
        });
        expect(outcome.failure).toBeInstanceOf(HookFailure);
        expect(hookOutcomeExitCode(outcome)).toBe(127);
        expect(warnings).toEqual(["pre-launch hook could not be started: ENOENT; launch aborted"]);
    });

    it("warns or stays silent according to the mode", async () => {
        const script = await scriptWrite("fail.sh", "exit 2");

        expect(await executor.run("pre", script, context, {})).toMatchObject({ failureMode: "warn", aborted: false });
        expect(await executor.run("pre", script, context, { env: "ignore", app: "abort" })).toMatchObject({
            failureMode: "ignore",
            aborted: false
        });
        expect(warnings).toEqual(["pre-launch hook exited with code 2"]);
    });

    it("kills a hook that outlives the timeout and treats it as a failure", async () => {
        const slow = new HookExecutor({
            timeoutMs: 200,
            env: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
            killGraceMs: 100,
            stdio: "ignore",
            warn: (message) => warnings.push(message)
        });
        const script = await scriptWrite("slow.sh", "sleep 5");

        const started = Date.now();
        const outcome = await slow.run("pre", script, context, { runtime: "abort" });
        expect(Date.now() - started).toBeLessThan(3_000);
        expect(outcome).toMatchObject({ executed: true, exitCode: null, timedOut: true, aborted: true });
        expect(hookOutcomeExitCode(outcome)).toBe(124);
        expect(warnings).toEqual(["pre-launch hook timed out after 200ms; launch aborted"]);
    });

    it("escalates to SIGKILL when the hook ignores SIGTERM", async () => {
        const slow = new HookExecutor({
            timeoutMs: 200,
            env: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
            killGraceMs: 100,
            stdio: "ignore",
            warn: (message) => warnings.push(message)
        });
        const script = await scriptWrite("stubborn.sh", "trap '' TERM\nsleep 5");

        const started = Date.now();
        const outcome = await slow.run("post", script, context, { runtime: "ignore" });
        expect(Date.now() - started).toBeLessThan(3_000);
        expect(outcome).toMatchObject({ timedOut: true, failureMode: "ignore" });
        expect(warnings).toEqual([]);
    });
});
