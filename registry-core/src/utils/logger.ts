/**
 * Enumeration of available logging levels.
 *
 * Levels are ordered by severity, with lower numbers being more verbose.
 *
 * @enum {number}
 */
export enum LogLevel {
    /** Debug messages - most verbose, includes read operations */
    DEBUG = 0,
    /** Informational messages - committed registry mutations */
    INFO = 1,
    /** Warning messages - potential issues that don't prevent operation */
    WARN = 2,
    /** Error messages - failures that affect functionality */
    ERROR = 3,
    /** Silent mode - no logging output */
    SILENT = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    silent: LogLevel.SILENT
}

/**
 * Maps a configured level name (case-insensitive) to its LogLevel.
 *
 * @throws Error for an unknown level name
 */
export function parseLogLevel(name: string): LogLevel {
    const key = name.toLowerCase()
    if (!isLogLevelName(key)) {
        throw new Error(`Unknown log level: ${name}`)
    }
    return LEVELS_BY_NAME[key]
}

function isLogLevelName(value: string): value is LogLevelName {
    return Object.hasOwn(LEVELS_BY_NAME, value)
}

/**
 * Simple logger class for registry components.
 *
 * Provides structured logging with component identification and configurable levels.
 * Automatically adjusts log level based on environment (errors only in tests).
 *
 * @example
 * ```typescript
 * const logger = new Logger('AssetRegistry', LogLevel.DEBUG)
 * logger.info('Asset created', { assetId: 1 })
 * logger.error('Store unavailable', error)
 * ```
 */
export class Logger {
    /**
     * @param componentName - Name of the component for log prefixing
     * @param level - Minimum log level to output (defaults based on NODE_ENV)
     */
    constructor(
        private readonly componentName: string,
        private readonly level: LogLevel = process.env.NODE_ENV === 'test' ? LogLevel.ERROR : LogLevel.INFO
    ) {}

    /**
     * Creates a logger for another component at the same level.
     */
    child(componentName: string): Logger {
        return new Logger(componentName, this.level)
    }

    debug(message: string, data?: unknown) {
        if (this.level <= LogLevel.DEBUG) {
            console.log(`[${this.componentName}] DEBUG: ${message}`, data || '')
        }
    }

    info(message: string, data?: unknown) {
        if (this.level <= LogLevel.INFO) {
            console.log(`[${this.componentName}] ${message}`, data || '')
        }
    }

    warn(message: string, data?: unknown) {
        if (this.level <= LogLevel.WARN) {
            console.warn(`[${this.componentName}] WARN: ${message}`, data || '')
        }
    }

    /**
     * Logs error messages about failures and exceptions.
     *
     * @param message - Error message
     * @param error - Optional error object or additional data
     */
    error(message: string, error?: unknown) {
        if (this.level <= LogLevel.ERROR) {
            console.error(`[${this.componentName}] ERROR: ${message}`, error || '')
        }
    }
}
