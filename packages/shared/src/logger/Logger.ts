/**
 * Shared Logger - Structured JSON logging for Corroborate services
 *
 * Emits one JSON object per line with correlation IDs, sensitive data
 * masking and operation timing. Console and file sinks are independent.
 */

import { randomUUID } from "crypto";
import * as fs from "fs";
import * as path from "path";

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    FATAL = 4,
}

export type LogMetadata = Record<string, unknown>;

/**
 * Structured log entry
 */
export interface LogEntry {
    timestamp: string;
    level: string;
    message: string;
    correlationId?: string;
    component?: string;
    operation?: string;
    duration?: number;
    metadata?: LogMetadata;
    error?: {
        name: string;
        message: string;
        stack?: string;
        code?: string | number;
    };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    level: LogLevel;
    component: string;
    enableConsole: boolean;
    enableFile: boolean;
    filePath?: string;
    enablePerformanceLogging: boolean;
    sensitiveFields: string[];
    maxStackTraceLines: number;
}

/**
 * Performance timer for operation tracking
 */
export interface PerformanceTimer {
    operation: string;
    startTime: number;
    correlationId?: string;
    metadata?: LogMetadata;
}

function parseLogLevel(raw: string | undefined): LogLevel {
    switch ((raw ?? "INFO").toUpperCase()) {
        case "DEBUG":
            return LogLevel.DEBUG;
        case "WARN":
            return LogLevel.WARN;
        case "ERROR":
            return LogLevel.ERROR;
        case "FATAL":
            return LogLevel.FATAL;
        default:
            return LogLevel.INFO;
    }
}

function errorCode(error: Error): string | number | undefined {
    const candidate: unknown = "code" in error ? error.code : undefined;
    return typeof candidate === "string" || typeof candidate === "number"
        ? candidate
        : undefined;
}

export class Logger {
    private readonly config: LoggerConfig;
    private readonly activeTimers: Map<string, PerformanceTimer> = new Map();

    constructor(config: LoggerConfig) {
        this.config = config;
    }

    /**
     * Create logger configuration from environment variables
     */
    static createConfigFromEnv(
        component: string,
        env: NodeJS.ProcessEnv = process.env,
    ): LoggerConfig {
        return {
            level: parseLogLevel(env.LOG_LEVEL),
            component,
            enableConsole: env.LOG_ENABLE_CONSOLE !== "false",
            enableFile: env.LOG_ENABLE_FILE === "true",
            filePath: env.LOG_FILE_PATH,
            enablePerformanceLogging: env.LOG_ENABLE_PERFORMANCE !== "false",
            sensitiveFields: (env.LOG_SENSITIVE_FIELDS ||
                "password,secret,token,key,authorization").split(","),
            maxStackTraceLines: parseInt(env.LOG_MAX_STACK_LINES || "10", 10),
        };
    }

    static forComponent(component: string): Logger {
        return new Logger(Logger.createConfigFromEnv(component));
    }

    /**
     * Generate a new correlation ID
     */
    static generateCorrelationId(): string {
        return randomUUID();
    }

    private maskSensitiveData(value: unknown): unknown {
        if (value === null || value === undefined) return value;
        if (typeof value === "string") {
            const lowerStr = value.toLowerCase();
            if (
                lowerStr.includes("password") || lowerStr.includes("secret") ||
                lowerStr.includes("token")
            ) {
                return "[MASKED]";
            }
            return value;
        }
        if (Array.isArray(value)) {
            return value.map((item) => this.maskSensitiveData(item));
        }
        if (typeof value === "object") {
            const masked: Record<string, unknown> = {};
            for (const [key, nested] of Object.entries(value)) {
                const lowerKey = key.toLowerCase();
                if (
                    this.config.sensitiveFields.some((field) =>
                        lowerKey.includes(field.toLowerCase())
                    )
                ) {
                    masked[key] = "[MASKED]";
                } else {
                    masked[key] = this.maskSensitiveData(nested);
                }
            }
            return masked;
        }
        return value;
    }

    private maskMetadata(metadata: LogMetadata): LogMetadata {
        const masked: LogMetadata = {};
        for (const [key, value] of Object.entries(metadata)) {
            const lowerKey = key.toLowerCase();
            masked[key] = this.config.sensitiveFields.some((field) =>
                    lowerKey.includes(field.toLowerCase())
                )
                ? "[MASKED]"
                : this.maskSensitiveData(value);
        }
        return masked;
    }

    private formatError(error: Error): LogEntry["error"] {
        const stackLines = error.stack?.split("\n").slice(
            0,
            this.config.maxStackTraceLines,
        );
        return {
            name: error.name,
            message: error.message,
            stack: stackLines?.join("\n"),
            code: errorCode(error),
        };
    }

    private createLogEntry(
        level: LogLevel,
        message: string,
        correlationId?: string,
        operation?: string,
        duration?: number,
        metadata?: LogMetadata,
        error?: Error,
    ): LogEntry {
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: LogLevel[level],
            message,
            component: this.config.component,
        };
        if (correlationId) entry.correlationId = correlationId;
        if (operation) entry.operation = operation;
        if (duration !== undefined) entry.duration = duration;
        if (metadata) entry.metadata = this.maskMetadata(metadata);
        if (error) entry.error = this.formatError(error);
        return entry;
    }

    private writeLog(entry: LogEntry): void {
        const logString = JSON.stringify(entry);

        if (this.config.enableConsole) {
            switch (entry.level) {
                case "DEBUG":
                    console.debug(logString);
                    break;
                case "INFO":
                    console.info(logString);
                    break;
                case "WARN":
                    console.warn(logString);
                    break;
                default:
                    console.error(logString);
            }
        }

        if (this.config.enableFile && this.config.filePath) {
            try {
                const logDir = path.dirname(this.config.filePath);
                if (!fs.existsSync(logDir)) {
                    fs.mkdirSync(logDir, { recursive: true });
                }
                fs.appendFileSync(this.config.filePath, logString + "\n");
            } catch (error) {
                console.error("Failed to write to log file:", error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return level >= this.config.level;
    }

    debug(message: string, correlationId?: string, metadata?: LogMetadata): void {
        if (!this.shouldLog(LogLevel.DEBUG)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.DEBUG, message, correlationId, undefined, undefined, metadata),
        );
    }

    info(message: string, correlationId?: string, metadata?: LogMetadata): void {
        if (!this.shouldLog(LogLevel.INFO)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.INFO, message, correlationId, undefined, undefined, metadata),
        );
    }

    warn(message: string, correlationId?: string, metadata?: LogMetadata): void {
        if (!this.shouldLog(LogLevel.WARN)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.WARN, message, correlationId, undefined, undefined, metadata),
        );
    }

    error(
        message: string,
        error?: Error,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        if (!this.shouldLog(LogLevel.ERROR)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.ERROR, message, correlationId, undefined, undefined, metadata, error),
        );
    }

    fatal(
        message: string,
        error?: Error,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        if (!this.shouldLog(LogLevel.FATAL)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.FATAL, message, correlationId, undefined, undefined, metadata, error),
        );
    }

    // Performance Logging
    startTimer(
        operation: string,
        correlationId?: string,
        metadata?: LogMetadata,
    ): string {
        const timerId = randomUUID();
        this.activeTimers.set(timerId, {
            operation,
            startTime: Date.now(),
            correlationId,
            metadata,
        });
        if (this.config.enablePerformanceLogging) {
            this.debug(`Started operation: ${operation}`, correlationId, {
                timerId,
                ...metadata,
            });
        }
        return timerId;
    }

    endTimer(timerId: string, additionalMetadata?: LogMetadata): number | null {
        const timer = this.activeTimers.get(timerId);
        if (!timer) {
            this.warn(`Timer not found: ${timerId}`);
            return null;
        }
        const duration = Date.now() - timer.startTime;
        this.activeTimers.delete(timerId);
        if (this.config.enablePerformanceLogging && this.shouldLog(LogLevel.DEBUG)) {
            this.writeLog(this.createLogEntry(
                LogLevel.DEBUG,
                `Completed operation: ${timer.operation}`,
                timer.correlationId,
                timer.operation,
                duration,
                { timerId, ...timer.metadata, ...additionalMetadata },
            ));
        }
        return duration;
    }

    getActiveTimerCount(): number {
        return this.activeTimers.size;
    }

    clearTimers(): void {
        this.activeTimers.clear();
    }

    getConfig(): Readonly<LoggerConfig> {
        return this.config;
    }
}
