import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { formatPrettyMessage, initLogging, resetLogging, resolveLogConfig } from "./log.js";

const ENV_KEYS = ["VITEST", "WRAPKIT_LOG_LEVEL", "LOG_LEVEL", "WRAPKIT_LOG_FORMAT", "WRAPKIT_LOG_JSON", "WRAPKIT_LOG_DEST"];

describe("log", () => {
    const saved = new Map<string, string | undefined>();

    beforeEach(() => {
        for (const key of ENV_KEYS) {
            saved.set(key, process.env[key]);
        }
    });

    afterEach(() => {
        resetLogging();
        for (const [key, value] of saved) {
            if (value === undefined) {
                delete process.env[key];
            } else {
                process.env[key] = value;
            }
        }
    });

    it("defaults to silent level when running in vitest", () => {
        process.env.VITEST = "true";
        delete process.env.WRAPKIT_LOG_LEVEL;
        delete process.env.LOG_LEVEL;

        resetLogging();
        const logger = initLogging();

        expect(logger.level).toBe("silent");
    });

    it("prefers the wrapkit level variable over the generic one", () => {
        process.env.WRAPKIT_LOG_LEVEL = "warn";
        process.env.LOG_LEVEL = "debug";

        expect(resolveLogConfig().level).toBe("warn");
    });

    it("writes to stderr in pretty format by default", () => {
        delete process.env.WRAPKIT_LOG_FORMAT;
        delete process.env.WRAPKIT_LOG_JSON;
        delete process.env.WRAPKIT_LOG_DEST;

        const config = resolveLogConfig();
        expect(config.destination).toBe("stderr");
        expect(config.format).toBe("pretty");
    });

    it("forces json when logging to a file", () => {
        const config = resolveLogConfig({ destination: "/tmp/wrapkit.log", format: "pretty" });
        expect(config.format).toBe("json");
    });
});

describe("formatPrettyMessage", () => {
    it("renders time, padded module and details", () => {
        const time = new Date(2026, 0, 2, 3, 4, 5).getTime();
        const line = formatPrettyMessage({ time, module: "config.store", msg: "loaded", app: "firefox" }, "msg");
        expect(line).toBe("[03:04:05] [config.store    ] loaded app=firefox");
    });

    it("quotes detail values carrying control characters", () => {
        const time = new Date(2026, 0, 2, 3, 4, 5).getTime();
        const line = formatPrettyMessage({ time, module: "safety", msg: "rejected", input: "a\nb" }, "msg");
        expect(line).toBe('[03:04:05] [safety          ] rejected input="a\\nb"');
    });
});
