export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, context?: LogContext) => void;
    info: (message: string, context?: LogContext) => void;
    warn: (message: string, context?: LogContext) => void;
    error: (message: string, context?: LogContext) => void;
    child: (scope: string) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

// Libraries stay quiet unless the host application asks for more.
const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVELS;
}

export function resolveLogLevel(configured: string | undefined): LogLevel {
    const normalized = configured?.trim().toLowerCase();

    if (!normalized) {
        return DEFAULT_LOG_LEVEL;
    }

    if (isLogLevel(normalized)) {
        return normalized;
    }

    return "silent";
}

let currentLevel: LogLevel = resolveLogLevel(process.env.LOG_LEVEL);

/** Overrides the level picked up from `LOG_LEVEL` at load time. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function normalizeError(error: unknown): unknown {
    if (!(error instanceof Error)) {
        return error;
    }

    return {
        name: error.name,
        message: error.message,
        stack: error.stack,
    };
}

function normalizeContext(context: LogContext): LogContext {
    const output: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
        output[key] = normalizeError(value);
    }
    return output;
}

function emit(
    level: Exclude<LogLevel, "silent">,
    message: string,
    scope: string | null,
    context: LogContext | undefined,
): void {
    if (!shouldLog(level)) {
        return;
    }

    const prefix = scope
        ? `[${level.toUpperCase()}] [${scope}] ${message}`
        : `[${level.toUpperCase()}] ${message}`;

    const method = level === "debug"
        ? console.debug
        : level === "info"
            ? console.info
            : level === "warn"
                ? console.warn
                : console.error;

    if (context) {
        method(prefix, normalizeContext(context));
        return;
    }

    method(prefix);
}

export function createLogger(scope?: string): Logger {
    const scoped = scope?.trim() || null;

    return {
        debug: (message: string, context?: LogContext) =>
            emit("debug", message, scoped, context),
        info: (message: string, context?: LogContext) =>
            emit("info", message, scoped, context),
        warn: (message: string, context?: LogContext) =>
            emit("warn", message, scoped, context),
        error: (message: string, context?: LogContext) =>
            emit("error", message, scoped, context),
        child: (childScope: string) => {
            const trimmed = childScope.trim();
            const nextScope = scoped ? `${scoped}.${trimmed}` : trimmed;
            return createLogger(nextScope);
        },
    };
}

export const logger = createLogger("tidal");
