export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const levels: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3
};

let currentLevel: LogLevel = 'info';

export type LogMeta = Record<string, unknown>;

export interface Logger {
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
    debug(message: string, meta?: LogMeta): void;
    child(scope: string): Logger;
}

const formatMessage = (scope: string | undefined, message: string, meta?: LogMeta): string => {
    const prefix = scope ? `[${scope}] ` : '';
    if (!meta || Object.keys(meta).length === 0) {
        return `${prefix}${message}`;
    }
    return `${prefix}${message} | ${JSON.stringify(meta)}`;
};

const enabled = (level: LogLevel): boolean => levels[currentLevel] >= levels[level];

const createLogger = (scope?: string): Logger => ({
    info: (message, meta) => {
        if (enabled('info')) {
            console.log(formatMessage(scope, message, meta));
        }
    },
    warn: (message, meta) => {
        if (enabled('warn')) {
            console.warn(formatMessage(scope, message, meta));
        }
    },
    error: (message, meta) => {
        console.error(formatMessage(scope, message, meta));
    },
    debug: (message, meta) => {
        if (enabled('debug')) {
            console.debug(formatMessage(scope, message, meta));
        }
    },
    child: (childScope: string) => createLogger(scope ? `${scope}:${childScope}` : childScope)
});

export const setLogLevel = (level: LogLevel): void => {
    currentLevel = level;
};

export const getLogLevel = (): LogLevel => currentLevel;

export const logger: Logger = createLogger();

export const errorMeta = (error: unknown): LogMeta => {
    if (error instanceof Error) {
        return { error: error.name, message: error.message };
    }
    return { error: String(error) };
};
