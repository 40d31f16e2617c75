import CONSTANTS from "./module/constants";

export enum LogLevel {
    Trace = 0,
    Debug = 1,
    Info = 2,
    Warn = 3,
    Error = 4,
    Silent = 5,
}

export interface LogRecord {
    level: LogLevel;
    message: string;
    details: unknown[];
}

export type LogSink = (record: LogRecord) => void;

let threshold: LogLevel = LogLevel.Info;
const sinks = new Set<LogSink>();

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

/**
 * Registers a listener that receives every record at or above the current threshold.
 * Returns a function that removes the listener again.
 */
export function addLogSink(sink: LogSink): () => void {
    sinks.add(sink);
    return () => {
        sinks.delete(sink);
    };
}

export function logTrace(message: string, ...details: unknown[]) {
    log(LogLevel.Trace, message, ...details);
}

export function logDebug(message: string, ...details: unknown[]) {
    log(LogLevel.Debug, message, ...details);
}

export function logInfo(message: string, ...details: unknown[]) {
    log(LogLevel.Info, message, ...details);
}

export function logWarn(message: string, ...details: unknown[]) {
    log(LogLevel.Warn, message, ...details);
}

export function logError(message: string, ...details: unknown[]) {
    log(LogLevel.Error, message, ...details);
}

/**
 * Creates a log message with a provided log level that determines the console channel.
 * @param logLevel default is info
 * @param details extra arguments to pass to the console
 */
function log(logLevel: LogLevel = LogLevel.Info, message: string, ...details: unknown[]) {
    if (logLevel < threshold || logLevel === LogLevel.Silent) {
        return;
    }

    for (const sink of sinks) {
        sink({ level: logLevel, message, details });
    }

    const line = `${CONSTANTS.MODULE_NAME} | ${message}`;
    switch (logLevel) {
        case LogLevel.Trace:
            console.trace(line, ...details);
            break;
        case LogLevel.Debug:
            console.debug(line, ...details);
            break;
        case LogLevel.Info:
            console.info(line, ...details);
            break;
        case LogLevel.Warn:
            console.warn(line, ...details);
            break;
        case LogLevel.Error:
            console.error(line, ...details);
            break;
    }
}
