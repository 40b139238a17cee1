import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    redact: string[];
    service: string;
};

const DEFAULT_REDACT = ["env.*", "envOverrides.*", "*.token", "*.password", "*.secret"];

const VALID_FORMATS = new Set<LogFormat>(["pretty", "json"]);
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

const MODULE_WIDTH = 16;
const PRETTY_RESERVED_FIELDS = new Set(["pid", "hostname", "level", "time", "service", "module", "msg"]);

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }

    const config = resolveLogConfig(overrides);
    rootLogger = buildLogger(config);
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("WRAPKIT_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    // Wrappers share the terminal with the launched application, so logs stay off stdout by default.
    const destination = overrides.destination ?? envValue("WRAPKIT_LOG_DEST") ?? "stderr";
    const forceJson = parseBooleanFlag(envValue("WRAPKIT_LOG_JSON")) ?? false;
    let format = overrides.format ?? parseFormat(envValue("WRAPKIT_LOG_FORMAT")) ?? (forceJson ? "json" : "pretty");
    const service = overrides.service ?? "wrapkit";

    if (!isStdDestination(destination)) {
        format = "json";
    }

    const redact = overrides.redact ?? mergeRedactList(DEFAULT_REDACT, envValue("WRAPKIT_LOG_REDACT"));

    return {
        level,
        format,
        destination,
        redact,
        service
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: config.service
        },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    const destination = resolveDestination(config.destination);

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (!prettyFactory) {
            return destination ? pino(options, destination) : pino(options);
        }
        const prettyStream = prettyFactory({
            colorize: !process.env.NO_COLOR,
            translateTime: false,
            ignore: "pid,hostname,level,service,module",
            hideObject: true,
            messageFormat: formatPrettyMessage,
            singleLine: true,
            destination: config.destination === "stdout" ? 1 : 2
        });
        return pino(options, prettyStream);
    }

    return destination ? pino(options, destination) : pino(options);
}

/**
 * Renders one pretty log line as `[HH:MM:SS] [module] message key=value`.
 * Expects: log is a pino record; messageKey names the message field.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = formatLogTime(log.time);
    const module = formatModuleLabel(log.module);
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details = formatPrettyDetails(log, messageKey);
    const content = [module, message, details].filter((part) => part.length > 0).join(" ");
    return `[${time}] ${content}`;
}

function normalizeModule(moduleName?: string): string {
    if (typeof moduleName !== "string") {
        return "unknown";
    }
    const trimmed = moduleName.trim();
    return trimmed.length > 0 ? trimmed : "unknown";
}

function formatModuleLabel(moduleValue: unknown): string {
    const name = normalizeModule(typeof moduleValue === "string" ? moduleValue : undefined);
    const sized = name.length > MODULE_WIDTH ? name.slice(0, MODULE_WIDTH) : name.padEnd(MODULE_WIDTH, " ");
    return `[${sized}]`;
}

function formatPrettyDetails(log: Record<string, unknown>, messageKey: string): string {
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${formatPrettyDetailValue(value)}`);
    }
    return details.join(" ");
}

function formatPrettyDetailValue(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return String(value);
    }
    if (typeof value === "string") {
        return formatPrettyTextValue(value);
    }
    if (value instanceof Error) {
        return formatPrettyTextValue(value.message);
    }
    if (Array.isArray(value)) {
        return formatPrettyTextValue(value.map((entry) => String(entry)).join(","));
    }
    if (typeof value === "object") {
        if ("message" in value && typeof value.message === "string") {
            return formatPrettyTextValue(value.message);
        }
        return formatPrettyTextValue(JSON.stringify(value));
    }
    return formatPrettyTextValue(String(value));
}

function formatPrettyTextValue(value: string): string {
    const MAX_LENGTH = 160;
    const truncated = value.length > MAX_LENGTH ? `${value.slice(0, MAX_LENGTH)}...` : value;
    if (truncated.length === 0) {
        return '""';
    }
    // Quoting keeps control characters from untrusted input out of the terminal.
    if (/[=\s]/.test(truncated) || /[\u0000-\u001f]/.test(truncated)) {
        return JSON.stringify(truncated);
    }
    return truncated;
}

function formatLogTime(value: unknown): string {
    const date = typeof value === "number" || typeof value === "string" ? new Date(value) : new Date();
    const safe = Number.isNaN(date.getTime()) ? new Date() : date;
    return [safe.getHours(), safe.getMinutes(), safe.getSeconds()].map((part) => String(part).padStart(2, "0")).join(":");
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }

    if (destination === "stderr") {
        return pino.destination(2);
    }

    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase().trim();
    for (const format of VALID_FORMATS) {
        if (format === normalized) {
            return format;
        }
    }
    return null;
}

function parseBooleanFlag(value: string | null): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
        return true;
    }
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key];
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

function mergeRedactList(base: string[], extra: string | null): string[] {
    if (!extra) {
        return [...base];
    }

    const additions = extra
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean);
    return [...new Set([...base, ...additions])];
}

function isStdDestination(destination: LogDestination): boolean {
    return destination === "stdout" || destination === "stderr";
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
