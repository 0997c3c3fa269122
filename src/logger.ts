export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface Logger {
    debug: (message: string, ...details: unknown[]) => void;
    info: (message: string, ...details: unknown[]) => void;
    warn: (message: string, ...details: unknown[]) => void;
    error: (message: string, ...details: unknown[]) => void;
}

function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(raw: string | undefined = process.env.ROVER_SIM_LOG_LEVEL): LogLevel {
    const candidate = raw?.trim().toLowerCase();
    return candidate && isLogLevel(candidate) ? candidate : 'warn';
}

/**
 * Console-backed logger. Every line is prefixed with `[scope]` so output from
 * the generator, planner and rover can be told apart.
 */
export function createLogger(scope: string, level: LogLevel = resolveLogLevel()): Logger {
    const threshold = LEVEL_ORDER[level];
    const prefix = `[${scope}]`;
    const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

    return {
        debug: (message, ...details) => {
            if (enabled('debug')) console.debug(prefix, message, ...details);
        },
        info: (message, ...details) => {
            if (enabled('info')) console.info(prefix, message, ...details);
        },
        warn: (message, ...details) => {
            if (enabled('warn')) console.warn(prefix, message, ...details);
        },
        error: (message, ...details) => {
            if (enabled('error')) console.error(prefix, message, ...details);
        },
    };
}
