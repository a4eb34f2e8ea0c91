/**
 * Centralized logging for the document engine
 *
 * Provides structured logging with:
 * - Log levels (DEBUG, INFO, WARN, ERROR)
 * - Module-scoped loggers
 * - A replaceable sink (console by default)
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

/**
 * Map string config values to LogLevel
 */
const LOG_LEVEL_MAP: Record<string, LogLevel> = {
    'debug': LogLevel.DEBUG,
    'info': LogLevel.INFO,
    'warn': LogLevel.WARN,
    'error': LogLevel.ERROR
};

/**
 * Receives every formatted line that passes the level filter
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Error entry for tracking recent errors
 */
export interface ErrorEntry {
    timestamp: number;
    module: string;
    message: string;
    error?: Error;
}

const consoleSink: LogSink = (level, line) => {
    switch (level) {
        case LogLevel.DEBUG:
            console.debug(line);
            break;
        case LogLevel.INFO:
            console.log(line);
            break;
        case LogLevel.WARN:
            console.warn(line);
            break;
        case LogLevel.ERROR:
            console.error(line);
            break;
    }
};

/**
 * Global logging state
 */
export class LoggingService {
    private configuredLevel: LogLevel = LogLevel.WARN;
    private sink: LogSink = consoleSink;
    private recentErrors: ErrorEntry[] = [];
    private maxRecentErrors: number = 50;

    /**
     * Set the minimum level, either as a LogLevel or its name
     */
    setLevel(level: LogLevel | string): void {
        if (typeof level === 'string') {
            this.configuredLevel = LOG_LEVEL_MAP[level.toLowerCase()] ?? LogLevel.WARN;
        } else {
            this.configuredLevel = level;
        }
    }

    getConfiguredLevel(): LogLevel {
        return this.configuredLevel;
    }

    /**
     * Replace the output sink; returns the previous one
     */
    setSink(sink: LogSink): LogSink {
        const previous = this.sink;
        this.sink = sink;
        return previous;
    }

    resetSink(): void {
        this.sink = consoleSink;
    }

    /**
     * Check if a log level should be output
     */
    shouldLog(level: LogLevel): boolean {
        // Errors are always logged regardless of configured level
        if (level === LogLevel.ERROR) {
            return true;
        }
        return level >= this.configuredLevel;
    }

    private formatMessage(level: LogLevel, module: string, message: string, data?: object): string {
        const timestamp = new Date().toISOString();
        const levelStr = LogLevel[level].padEnd(5);
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        return `[${timestamp}] [${levelStr}] [${module}] ${message}${dataStr}`;
    }

    log(level: LogLevel, module: string, message: string, data?: object): void {
        if (!this.shouldLog(level)) {
            return;
        }
        this.sink(level, this.formatMessage(level, module, message, data));
    }

    /**
     * Log an error and remember it in the recent error list
     */
    logError(module: string, message: string, error?: Error, data?: object): void {
        this.log(LogLevel.ERROR, module, message, data);
        if (error?.stack) {
            this.sink(LogLevel.ERROR, `  Stack: ${error.stack}`);
        }

        this.recentErrors.push({
            timestamp: Date.now(),
            module,
            message: error ? `${message}: ${error.message}` : message,
            error
        });
        while (this.recentErrors.length > this.maxRecentErrors) {
            this.recentErrors.shift();
        }
    }

    getRecentErrors(): ErrorEntry[] {
        return [...this.recentErrors];
    }

    clearErrors(): void {
        this.recentErrors = [];
    }
}

// Global singleton instance
const loggingService = new LoggingService();

/**
 * Get the logging service instance
 */
export function getLoggingService(): LoggingService {
    return loggingService;
}

/**
 * Module-scoped logger for convenient logging
 */
export class Logger {
    constructor(private module: string) {}

    /**
     * Log a debug message (only when log level is DEBUG)
     */
    debug(message: string, data?: object): void {
        loggingService.log(LogLevel.DEBUG, this.module, message, data);
    }

    info(message: string, data?: object): void {
        loggingService.log(LogLevel.INFO, this.module, message, data);
    }

    warn(message: string, data?: object): void {
        loggingService.log(LogLevel.WARN, this.module, message, data);
    }

    /**
     * Log an error message with optional Error object
     */
    error(message: string, error?: Error, data?: object): void {
        loggingService.logError(this.module, message, error, data);
    }

    /**
     * Create a child logger with a sub-module name
     */
    child(subModule: string): Logger {
        return new Logger(`${this.module}:${subModule}`);
    }
}

/**
 * Create a logger for a module
 */
export function createLogger(module: string): Logger {
    return new Logger(module);
}

// Pre-created loggers for common modules
export const parserLogger = createLogger('Parser');
export const exportLogger = createLogger('Export');
