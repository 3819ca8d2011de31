/**
 * LogLevel - SysLog RFC5424 compliant log levels
 *
 * @see RFC5424: https://tools.ietf.org/html/rfc5424
 */
export interface LogLevels {
    emerg: number;
    alert: number;
    crit: number;
    error: number;
    warning: number;
    notice: number;
    info: number;
    debug: number;
}

export const LogLevels: LogLevels = {
    emerg: 0,
    alert: 1,
    crit: 2,
    error: 3,
    warning: 4,
    notice: 5,
    info: 6,
    debug: 7
};

export type LogLevel = keyof LogLevels;

/**
 * Logger - SysLog RFC5424 compliant logger type
 *
 * @see RFC5424: https://tools.ietf.org/html/rfc5424
 */
export type Logger = {
    [Level in LogLevel]: (message: string, extra?: Record<string, unknown>) => void;
};

export const isLogLevel = (value: string): value is LogLevel => Object.prototype.hasOwnProperty.call(LogLevels, value);

/**
 * Console logger implementation of the Logger interface, to be used by default if no custom logger is provided.
 *
 * Every level goes to stderr: stdout carries the stdio transport's frames.
 */
export const consoleLogger: Logger = {
    debug: (message, extra) => {
        console.error(message, extra);
    },
    info: (message, extra) => {
        console.error(message, extra);
    },
    notice: (message, extra) => {
        console.error(message, extra);
    },
    warning: (message, extra) => {
        console.warn(message, extra);
    },
    error: (message, extra) => {
        console.error(message, extra);
    },
    crit: (message, extra) => {
        console.error(message, extra);
    },
    alert: (message, extra) => {
        console.error(message, extra);
    },
    emerg: (message, extra) => {
        console.error(message, extra);
    }
};

/**
 * Logger that drops everything. Handy for tests and embedding.
 */
export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    notice: () => {},
    warning: () => {},
    error: () => {},
    crit: () => {},
    alert: () => {},
    emerg: () => {}
};

export interface CreateLoggerOptions {
    /**
     * Most verbose level that is still emitted. Defaults to `info`.
     */
    level?: LogLevel;

    /**
     * Where records go. Defaults to {@link consoleLogger}.
     */
    sink?: Logger;
}

/**
 * Builds a {@link Logger} from one writer that receives the level with each record.
 */
export function loggerFrom(write: (level: LogLevel, message: string, extra?: Record<string, unknown>) => void): Logger {
    return {
        emerg: (message, extra) => write('emerg', message, extra),
        alert: (message, extra) => write('alert', message, extra),
        crit: (message, extra) => write('crit', message, extra),
        error: (message, extra) => write('error', message, extra),
        warning: (message, extra) => write('warning', message, extra),
        notice: (message, extra) => write('notice', message, extra),
        info: (message, extra) => write('info', message, extra),
        debug: (message, extra) => write('debug', message, extra)
    };
}

/**
 * Wraps a sink so that records more verbose than `level` are dropped.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
    const threshold = LogLevels[options.level ?? 'info'];
    const sink = options.sink ?? consoleLogger;

    return loggerFrom((level, message, extra) => {
        if (LogLevels[level] <= threshold) {
            sink[level](message, extra);
        }
    });
}

/**
 * Writes one line per record to stderr: stdout belongs to the stdio transport.
 */
export const stderrLogger: Logger = loggerFrom((level, message, extra) => {
    const suffix = extra && Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra)}` : '';
    process.stderr.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}${suffix}\n`);
});
