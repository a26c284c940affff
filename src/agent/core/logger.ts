export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL || "";
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel) {
    threshold = level;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export const logger = {
    debug: (msg: string) => { if (enabled("debug")) console.debug(`[DEBUG] ${msg}`); },
    info: (msg: string) => { if (enabled("info")) console.log(`[INFO] ${msg}`); },
    warn: (msg: string) => { if (enabled("warn")) console.warn(`[WARN] ${msg}`); },
    error: (msg: string) => { if (enabled("error")) console.error(`[ERROR] ${msg}`); },
};

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
