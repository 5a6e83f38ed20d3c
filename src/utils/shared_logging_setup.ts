import log, {LogLevel, LogLevelNames} from "loglevel";
import {renderUnknownValue} from "./misc";


// Create an object that maps the names of the log levels to their numeric values
const LogLevelValues = {
    TRACE: log.levels.TRACE,
    DEBUG: log.levels.DEBUG,
    INFO: log.levels.INFO,
    WARN: log.levels.WARN,
    ERROR: log.levels.ERROR,
    SILENT: log.levels.SILENT,
};
export const origLoggerFactory = log.methodFactory;


export const defaultLogLevel: keyof LogLevel = "WARN";

const logLevelCache: { chosenLogLevel: keyof LogLevel } = {chosenLogLevel: defaultLogLevel};

//every logger made by createNamedLogger, so that a level change reaches loggers created before it
const namedLoggers: Map<string, log.Logger> = new Map();

export interface LogMessage {
    timestamp: string;
    loggerName: string;
    level: LogLevelNames;
    msg: string;
}

/**
 * receives every log record emitted by a named logger, e.g. so that the process driving the browser can pull the
 * in-page logs out alongside an extraction result
 */
export type LogSink = (record: LogMessage) => void;

const logSinkHolder: { sink: LogSink | undefined } = {sink: undefined};

export function setLogSink(sink: LogSink | undefined): void {
    logSinkHolder.sink = sink;
}

function forwardToSink(timestampStr: string, loggerName: string, methodName: LogLevelNames, msgArgs: unknown[]) {
    const sink = logSinkHolder.sink;
    if (!sink) {return;}
    try {
        sink({timestamp: timestampStr, loggerName: loggerName, level: methodName, msg: msgArgs.join(" ")});
    } catch (error: unknown) {
        console.error(`error while forwarding log message to the registered log sink: ${renderUnknownValue(error)}`);
    }
}

function currentTimestamp(): string {
    let timestampStr = new Date().toISOString();
    if (typeof window !== "undefined" && window.crossOriginIsolated) {
        const preciseTimestamp = performance.timeOrigin + performance.now();
        const fractionOfMs = preciseTimestamp % 1;
        timestampStr = new Date(preciseTimestamp).toISOString();
        timestampStr = timestampStr.slice(0, timestampStr.length - 1)
            + fractionOfMs.toFixed(3).slice(2) + "Z";
    }
    return timestampStr;
}

/**
 * Create a logger with the given name, using the 'plugin' functionality of loglevel to prefix each message with a
 * timestamp, the logger name, and the level, and to hand each record to the registered log sink (if any)
 * @param loggerName the name of the logger (a class or module name)
 */
export const createNamedLogger = (loggerName: string): log.Logger => {
    const newLogger = log.getLogger(loggerName);

    newLogger.methodFactory = function (methodName, logLevel, loggerNameOrSymbol) {
        const rawMethod = origLoggerFactory(methodName, logLevel, loggerNameOrSymbol);
        const actualLoggerName: string = typeof loggerNameOrSymbol === "string" ? loggerNameOrSymbol :
            (Symbol.keyFor(loggerNameOrSymbol) ?? loggerNameOrSymbol.toString());
        return function (...args: unknown[]) {
            const timestampStr = currentTimestamp();
            rawMethod(augmentLogMsg(timestampStr, actualLoggerName, methodName, ...args));
            forwardToSink(timestampStr, actualLoggerName, methodName, args);
        };
    };

    newLogger.setLevel(logLevelCache.chosenLogLevel);
    newLogger.rebuild();
    namedLoggers.set(loggerName, newLogger);

    return newLogger;
}

/**
 * change the level of every named logger (including ones created later)
 * @param newLogLevel the new level, e.g. "DEBUG"
 * @throws Error if the value isn't one of loglevel's level names
 */
export function setLogLevelForAllLoggers(newLogLevel: unknown): void {
    if (!isLogLevelName(newLogLevel)) {
        throw new Error(`Invalid log level name: ${newLogLevel}`);
    }
    logLevelCache.chosenLogLevel = newLogLevel;
    namedLoggers.forEach(namedLogger => {
        const existingLogLevel = LogLevelDict[namedLogger.getLevel()];
        if (existingLogLevel !== newLogLevel) {
            namedLogger.debug(`log level changed from ${existingLogLevel} to ${newLogLevel}`);
            namedLogger.setLevel(newLogLevel);
            namedLogger.rebuild();
        }
    });
}

export function getChosenLogLevel(): keyof LogLevel {return logLevelCache.chosenLogLevel;}

/**
 * Augment a log message with a timestamp, logger name, and log level
 * @param timestampStr the timestamp string to use
 * @param loggerName the name of the logger (usually a module or class name)
 * @param levelName the log level name
 * @param args the arguments to the logger call
 *              this might just be 0 or more objects/strings/other-primitives to concatenate together with spaces
 *              in between, or it might be a format string containing placeholder patterns followed by some number of
 *              substitution strings; latter scenario is not yet supported
 * @return a single augmented log message
 */
export function augmentLogMsg(timestampStr: string, loggerName: string | symbol, levelName: LogLevelNames,
                              ...args: unknown[]) {
    if (typeof args[0] === "string" && args[0].includes("%s")) {
        console.warn("log message contains %s, which is a placeholder for substitution strings. " +
            "This is not supported by this logging feature yet; please use string concatenation instead.");
    }
    //for now, just supporting the simple "one or more objects get concatenated together" approach
    return [timestampStr, String(loggerName), levelName.toUpperCase(), ...args].join(" ");
}

export function isLogLevelName(logLevelName: unknown): logLevelName is keyof LogLevel {
    return typeof logLevelName === "string" && logLevelName in LogLevelValues;
}

// Create a mapping object that maps from the numeric values of the log levels to their names
export const LogLevelDict: { [K in typeof LogLevelValues[keyof typeof LogLevelValues]]: keyof LogLevel } = {
    [LogLevelValues.TRACE]: "TRACE",
    [LogLevelValues.DEBUG]: "DEBUG",
    [LogLevelValues.INFO]: "INFO",
    [LogLevelValues.WARN]: "WARN",
    [LogLevelValues.ERROR]: "ERROR",
    [LogLevelValues.SILENT]: "SILENT",
};
