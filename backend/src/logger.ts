export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type Meta = Record<string, unknown>;

export interface Logger {
    debug(evt: string, meta?: Meta): void;
    info(evt: string, meta?: Meta): void;
    warn(evt: string, meta?: Meta): void;
    error(evt: string, meta?: Meta): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function resolveLogLevel(raw: string | undefined): LogLevel {
    const candidate = raw?.trim().toLowerCase();
    const match = LOG_LEVELS.find((level) => level === candidate);
    return match ?? "info";
}

let threshold: LogLevel = resolveLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel) {
    threshold = level;
}

function serialize(value: unknown): unknown {
    if (value instanceof Error) {
        return { name: value.name, message: value.message };
    }
    return value;
}

function write(level: Exclude<LogLevel, "silent">, scope: string, evt: string, meta: Meta) {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[threshold]) return;
    const entry: Meta = { ts: new Date().toISOString(), lvl: level, scope, evt };
    for (const [key, value] of Object.entries(meta)) {
        entry[key] = serialize(value);
    }
    const line = JSON.stringify(entry);
    if (level === "error") {
        console.error(line);
    } else {
        console.log(line);
    }
}

export function createLogger(scope: string): Logger {
    return {
        debug: (evt, meta = {}) => write("debug", scope, evt, meta),
        info: (evt, meta = {}) => write("info", scope, evt, meta),
        warn: (evt, meta = {}) => write("warn", scope, evt, meta),
        error: (evt, meta = {}) => write("error", scope, evt, meta),
    };
}
