/**
 * Diagnostics for the builder. It only reports what it swallows: query
 * fallbacks (warn), rejected URLs and bodies (debug) and built requests
 * (trace). Level comes from REQUEST_BUILDER_LOG_LEVEL, default 'warn'.
 */

export type LogLevel = 'silent' | 'warn' | 'debug' | 'trace';

type EmitLevel = Exclude<LogLevel, 'silent'>;

/**
 * Where messages go. `console` satisfies it.
 */
export interface LogSink {
    warn(...data: unknown[]): void;
    debug(...data: unknown[]): void;
    log(...data: unknown[]): void;
}

export type RequestBuilderLogger = Record<EmitLevel, (message: string, ...args: unknown[]) => void>;

const PREFIX = '[request-builder]';

const RANK: Record<LogLevel, number> = { silent: 0, warn: 1, debug: 2, trace: 3 };

const SINK_METHOD: Record<EmitLevel, keyof LogSink> = { warn: 'warn', debug: 'debug', trace: 'log' };

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(RANK, value);
}

let currentLevel: LogLevel = 'warn';
let sink: LogSink = console;

const envLevel = process.env.REQUEST_BUILDER_LOG_LEVEL?.toLowerCase();
if (envLevel && isLogLevel(envLevel)) {
    currentLevel = envLevel;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

/**
 * Route messages somewhere other than the console; call with no argument to restore it.
 */
export function setLogSink(next: LogSink = console): void {
    sink = next;
}

function emit(level: EmitLevel, message: string, args: unknown[]): void {
    if (RANK[level] > RANK[currentLevel]) {
        return;
    }
    sink[SINK_METHOD[level]](`${PREFIX} ${message}`, ...args);
}

const loggerInstance: RequestBuilderLogger = {
    warn: (message, ...args) => emit('warn', message, args),
    debug: (message, ...args) => emit('debug', message, args),
    trace: (message, ...args) => emit('trace', message, args),
};

export function getLogger(): RequestBuilderLogger {
    return loggerInstance;
}
