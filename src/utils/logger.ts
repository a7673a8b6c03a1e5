// src/utils/logger.ts

import { writeFileSync } from 'node:fs';
import { CONFIG } from '../config';

/** Defines logging severity levels. */
export enum LogLevel {
    NONE = 0,
    ERROR = 1,
    WARN = 2,
    INFO = 3,
    DEBUG = 4,
}

type LogArg = string | number | boolean | object | null | undefined;

// --- Log Buffering ---
let logBuffer: string[] = [];

/** Maps a level name (any case) to its LogLevel, or undefined if it names no level. */
export function parseLogLevel(value: string): LogLevel | undefined {
    switch (value.trim().toUpperCase()) {
        case 'NONE': return LogLevel.NONE;
        case 'ERROR': return LogLevel.ERROR;
        case 'WARN': return LogLevel.WARN;
        case 'INFO': return LogLevel.INFO;
        case 'DEBUG': return LogLevel.DEBUG;
        default: return undefined;
    }
}

// Function to get the configured log level safely
function getConfiguredLogLevel(): LogLevel {
    const defaultLevel = LogLevel.WARN;
    const configured = parseLogLevel(CONFIG.LOG_LEVEL);
    if (configured === undefined) {
        console.warn(`[Logger Init WARN] Invalid LOG_LEVEL in CONFIG: "${CONFIG.LOG_LEVEL}". Defaulting to ${LogLevel[defaultLevel]}.`);
        return defaultLevel;
    }
    return configured;
}

let currentLogLevel = getConfiguredLogLevel();

function _logAndBuffer(level: LogLevel, levelStr: string, message: string): void {
    const timestamp = new Date().toISOString();
    const formattedMessage = `[${timestamp}] [${levelStr}] ${message}`;

    logBuffer.push(formattedMessage);
    if (logBuffer.length > CONFIG.MAX_LOG_BUFFER_SIZE) {
        logBuffer.shift();
    }

    // stdout carries conversion results; every level goes to stderr
    if (level === LogLevel.WARN) {
        console.warn(formattedMessage);
    } else {
        console.error(formattedMessage);
    }
}

// Helper function to stringify arguments before joining
function formatArgs(...args: LogArg[]): string {
    return args.map(arg => {
        if (arg instanceof Error) {
            return `${arg.name}: ${arg.message}`;
        }
        if (typeof arg === 'object' && arg !== null) {
            try { return JSON.stringify(arg); } catch { return String(arg); }
        }
        return String(arg);
    }).join(' ');
}


// --- Logger Object Definition ---
interface Logger {
    debug(...args: LogArg[]): void;
    info(...args: LogArg[]): void;
    warn(...args: LogArg[]): void;
    error(...args: LogArg[]): void;

    setLogLevel(level: LogLevel): void;
    getCurrentLogLevel(): LogLevel;
    clearLogBuffer(): void;
    getLogBufferAsString(includeHeader?: boolean): string;
    writeLogFile(filename: string): void;
}


export const logger: Logger = {
    /** Logs messages only if the configured level is DEBUG or higher. */
    debug(...args: LogArg[]): void {
        if (currentLogLevel >= LogLevel.DEBUG) {
            _logAndBuffer(LogLevel.DEBUG, 'DEBUG', formatArgs(...args));
        }
    },
    /** Logs messages only if the configured level is INFO or higher. */
    info(...args: LogArg[]): void {
        if (currentLogLevel >= LogLevel.INFO) {
            _logAndBuffer(LogLevel.INFO, 'INFO', formatArgs(...args));
        }
    },
    /** Logs messages only if the configured level is WARN or higher. */
    warn(...args: LogArg[]): void {
        if (currentLogLevel >= LogLevel.WARN) {
            _logAndBuffer(LogLevel.WARN, 'WARN', formatArgs(...args));
        }
    },
    /** Logs messages only if the configured level is ERROR or higher. */
    error(...args: LogArg[]): void {
        if (currentLogLevel >= LogLevel.ERROR) {
            _logAndBuffer(LogLevel.ERROR, 'ERROR', formatArgs(...args));
        }
    },
    setLogLevel(level: LogLevel): void {
        if (level >= LogLevel.NONE && level <= LogLevel.DEBUG) {
            currentLogLevel = level;
        } else {
            console.warn(`[Logger WARN] Attempted to set invalid log level: ${level}`);
        }
    },
    getCurrentLogLevel(): LogLevel {
        return currentLogLevel;
    },

    /** Clears the internal log buffer. */
    clearLogBuffer(): void {
        logBuffer = [];
    },

    /** Generates the full log content as a string, optionally with a header. */
    getLogBufferAsString(includeHeader: boolean = true): string {
        let logContent = '';
        if (includeHeader) {
            logContent += `--- elemental-units log ---\n`;
            logContent += `Timestamp: ${new Date().toISOString()}\n`;
            logContent += `Log Level Setting: ${CONFIG.LOG_LEVEL} (Active: ${LogLevel[currentLogLevel]})\n`;
            logContent += `Max Buffer Size: ${CONFIG.MAX_LOG_BUFFER_SIZE}\n`;
            logContent += `Current Buffer Size: ${logBuffer.length}\n`;
            logContent += `---------------------------\n\n`;
        }
        logContent += logBuffer.join('\n');
        return logContent;
    },

    /** Writes the buffered log, with header, to a file. Failures are logged, not thrown. */
    writeLogFile(filename: string): void {
        this.info(`--- Writing log file "${filename}"... ---`);
        try {
            writeFileSync(filename, this.getLogBufferAsString(true) + '\n', 'utf8');
        } catch (error) {
            const errorMsg = `Failed to write log file: ${error instanceof Error ? error.message : String(error)}`;
            this.error(errorMsg);
            console.error(`[Logger ERROR] ${errorMsg}`);
        }
    }
};
