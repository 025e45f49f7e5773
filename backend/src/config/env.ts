import path from "node:path";
import { config as loadDotEnv } from "dotenv";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../logger";
import type { RuntimeTable } from "../services/types";

export interface ServerConfig {
    port: number;
    storageDir: string;
    maxBotsPerUser: number;
    maxUploadBytes: number;
    stopTimeoutMs: number;
    killGraceMs: number;
    reconcileIntervalMs: number;
    logTailLines: number;
    runtimes: RuntimeTable;
    logLevel: LogLevel;
}

const int = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

// Empty string is meaningful for the runtime binaries: it switches the runtime off.
const runtime = (fallback: string) => z.string().trim().default(fallback);

const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(10000),
    BOT_STORAGE_DIR: z.string().trim().min(1).default("/tmp/bots"),
    MAX_BOTS_PER_USER: int(3, 1),
    BOT_MAX_UPLOAD_BYTES: int(1_048_576, 1),
    BOT_STOP_TIMEOUT_MS: int(5000, 0),
    BOT_KILL_GRACE_MS: int(2000, 0),
    BOT_RECONCILE_INTERVAL_MS: int(30_000, 0),
    BOT_LOG_TAIL_LINES: int(1000, 1),
    BOT_PYTHON_BIN: runtime("python3"),
    BOT_NODE_BIN: runtime("node"),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`);
        this.name = "ConfigError";
    }
}

/**
 * Reads the server settings from the environment. `.env` is merged into `process.env` first, so
 * a real environment variable always wins over the file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    if (env === process.env) {
        loadDotEnv();
    }

    // Unset and blank variables fall back to defaults, except the runtime switches.
    const present = Object.fromEntries(
        Object.entries(env).filter(
            ([key, value]) => value !== undefined && (value.trim() !== "" || key.endsWith("_BIN")),
        ),
    );
    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        );
    }
    const vars = parsed.data;

    const runtimes: RuntimeTable = {};
    if (vars.BOT_PYTHON_BIN) runtimes.py = vars.BOT_PYTHON_BIN;
    if (vars.BOT_NODE_BIN) runtimes.js = vars.BOT_NODE_BIN;

    return {
        port: vars.PORT,
        storageDir: path.resolve(vars.BOT_STORAGE_DIR),
        maxBotsPerUser: vars.MAX_BOTS_PER_USER,
        maxUploadBytes: vars.BOT_MAX_UPLOAD_BYTES,
        stopTimeoutMs: vars.BOT_STOP_TIMEOUT_MS,
        killGraceMs: vars.BOT_KILL_GRACE_MS,
        reconcileIntervalMs: vars.BOT_RECONCILE_INTERVAL_MS,
        logTailLines: vars.BOT_LOG_TAIL_LINES,
        runtimes,
        logLevel: vars.LOG_LEVEL,
    };
}
