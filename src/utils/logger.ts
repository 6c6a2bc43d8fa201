import color from "picocolors";
import * as fs from "fs";
import * as fsPromises from "fs/promises";
import path from "path";

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
}

Object.freeze(LogLevel);

export type LogLevelString = keyof typeof LogLevel & string;

const levelByName: Record<string, LogLevel> = {
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARN: LogLevel.WARN,
    ERROR: LogLevel.ERROR,
    NONE: LogLevel.NONE,
};

export function isLogLevelString(str: string): str is LogLevelString {
    return typeof str === "string" && str.toUpperCase() in levelByName;
}

export function logLevelFromString(str: string): LogLevel {
    if (typeof str !== "string") return LogLevel.INFO;
    return levelByName[str.toUpperCase()] ?? LogLevel.INFO;
}

export interface LoggerConfig {
    logLevel: LogLevel;
    logDirectory?: string;
    logToFile?: boolean;
    logToConsole?: boolean;
    bufferedLevels?: string[];
    batchSize?: number;
    flushDelayMs?: number;
}

/** Config as it appears in a JSON file, where the level may be a name. */
export type LoggerConfigInput =
    & Partial<Omit<LoggerConfig, "logLevel">>
    & { logLevel?: LogLevel | string };

const defaultLoggerConfig: LoggerConfig = {
    logLevel: LogLevel.INFO,
    logDirectory: undefined,
    logToFile: false,
    logToConsole: true,
    bufferedLevels: ["debug", "info", "fork", "orphan"],
    batchSize: 1000,
    flushDelayMs: 500,
};

const FILE_LEVELS = ["debug", "info", "warn", "error", "fork", "orphan"];

/** What components log through; satisfied by `Logger` and its children. */
export interface LoggerLike {
    debug(...stuff: unknown[]): void;
    info(...stuff: unknown[]): void;
    warn(...stuff: unknown[]): void;
    error(...stuff: unknown[]): void;
    fork(...stuff: unknown[]): void;
    orphan(...stuff: unknown[]): void;
    child(category: string): LoggerLike;
}

function normalizeConfig(config: LoggerConfigInput): Partial<LoggerConfig> {
    const { logLevel, ...rest } = config;
    if (logLevel === undefined) return rest;
    return {
        ...rest,
        logLevel: typeof logLevel === "string"
            ? logLevelFromString(logLevel)
            : logLevel,
    };
}

function bigintReplacer(_key: string, v: unknown): unknown {
    return typeof v === "bigint" ? v.toString() : v;
}

export class Logger implements LoggerLike {
    private config: LoggerConfig = { ...defaultLoggerConfig };
    private queues: Record<string, string[]> = {};
    private flushTimers: Record<string, NodeJS.Timeout> = {};

    constructor(config?: LoggerConfigInput) {
        this.config = {
            ...defaultLoggerConfig,
            ...(config ? normalizeConfig(config) : {}),
        };
        this.updatePaths();
    }

    private get logDir(): string {
        return this.config.logDirectory || "./logs/";
    }

    private updatePaths() {
        if (!this.config.logToFile) return;
        fs.mkdirSync(this.logDir, { recursive: true });
        for (const level of FILE_LEVELS) {
            const logFilePath = path.join(this.logDir, `${level}.jsonl`);
            if (!fs.existsSync(logFilePath)) {
                fs.writeFileSync(logFilePath, "");
            }
        }
    }

    public setLogConfig(config: LoggerConfigInput) {
        Object.assign(this.config, normalizeConfig(config));
        this.updatePaths();
    }

    get logLevel() {
        return this.config.logLevel;
    }

    canDebug(): boolean {
        return this.logLevel <= LogLevel.DEBUG;
    }
    canInfo(): boolean {
        return this.logLevel <= LogLevel.INFO;
    }
    canWarn(): boolean {
        return this.logLevel <= LogLevel.WARN;
    }
    canError(): boolean {
        return this.logLevel <= LogLevel.ERROR;
    }
    canFork(): boolean {
        return this.canInfo();
    }
    canOrphan(): boolean {
        return this.canInfo();
    }

    setLogLevel(level: LogLevel) {
        this.config.logLevel = level;
    }

    private getQueue(level: string): string[] {
        return this.queues[level] ??= [];
    }

    private scheduleFlush(level: string): void {
        if (this.flushTimers[level]) return;
        this.flushTimers[level] = setTimeout(() => {
            void this.flushQueue(level);
        }, this.config.flushDelayMs ?? 500);
    }

    private async flushQueue(level: string): Promise<void> {
        const queue = this.getQueue(level);
        if (queue.length === 0) return;
        const logFilePath = path.join(
            this.logDir,
            `${level.toLowerCase()}.jsonl`,
        );
        try {
            await fsPromises.appendFile(logFilePath, queue.join(""));
            queue.length = 0;
        } catch (err) {
            console.error(`Log flush failed for ${level}:`, err);
        } finally {
            if (this.flushTimers[level]) {
                clearTimeout(this.flushTimers[level]);
                delete this.flushTimers[level];
            }
        }
    }

    public async flushAll(): Promise<void> {
        await Promise.all(
            Object.keys(this.queues).map((l) => this.flushQueue(l)),
        );
    }

    private appendLog(level: string, stuff: unknown[]) {
        const logFilePath = path.join(
            this.logDir,
            `${level.toLowerCase()}.jsonl`,
        );
        const entry = {
            timestamp: new Date().toISOString(),
            level,
            args: stuff.map((arg) => {
                if (arg instanceof Error) {
                    return {
                        message: arg.message,
                        stack: arg.stack,
                        name: arg.name,
                    };
                }
                if (typeof arg === "bigint") {
                    return arg.toString();
                }
                try {
                    return JSON.parse(JSON.stringify(arg, bigintReplacer));
                } catch {
                    return String(arg);
                }
            }),
        };
        const line = JSON.stringify(entry) + "\n";
        const lowerLevel = level.toLowerCase();
        if (!(this.config.bufferedLevels ?? []).includes(lowerLevel)) {
            fs.appendFileSync(logFilePath, line);
            return;
        }
        const queue = this.getQueue(level);
        queue.push(line);
        if (queue.length >= (this.config.batchSize ?? 1000)) {
            void this.flushQueue(level);
        } else {
            this.scheduleFlush(level);
        }
    }

    private emit(
        level: string,
        paint: (s: string) => string,
        sink: (...args: unknown[]) => void,
        stuff: unknown[],
    ) {
        if (this.config.logToConsole) {
            sink(
                paint(`[${level.padEnd(5)}][${new Date().toUTCString()}]:`),
                ...stuff,
            );
        }

        if (this.config.logToFile) {
            this.appendLog(level, stuff);
        }
    }

    debug(...stuff: unknown[]) {
        if (!this.canDebug()) return;
        this.emit("DEBUG", color.magenta, console.log, stuff);
    }
    info(...stuff: unknown[]) {
        if (!this.canInfo()) return;
        this.emit("INFO", color.cyan, console.log, stuff);
    }
    warn(...stuff: unknown[]) {
        if (!this.canWarn()) return;
        this.emit("WARN", color.yellow, console.warn, stuff);
    }
    error(...stuff: unknown[]) {
        if (!this.canError()) return;
        this.emit("ERROR", color.red, console.error, stuff);
    }
    fork(...stuff: unknown[]) {
        if (!this.canFork()) return;
        this.emit("FORK", color.green, console.log, stuff);
    }
    orphan(...stuff: unknown[]) {
        if (!this.canOrphan()) return;
        this.emit("ORPHAN", color.magenta, console.log, stuff);
    }

    child(category: string): LoggerLike {
        const self = this;
        return {
            debug(...stuff: unknown[]) {
                self.debug({ category }, ...stuff);
            },
            info(...stuff: unknown[]) {
                self.info({ category }, ...stuff);
            },
            warn(...stuff: unknown[]) {
                self.warn({ category }, ...stuff);
            },
            error(...stuff: unknown[]) {
                self.error({ category }, ...stuff);
            },
            fork(...stuff: unknown[]) {
                self.fork({ category }, ...stuff);
            },
            orphan(...stuff: unknown[]) {
                self.orphan({ category }, ...stuff);
            },
            child(subCategory: string): LoggerLike {
                return self.child(`${category}/${subCategory}`);
            },
        };
    }
}

export const logger = new Logger({ logLevel: LogLevel.INFO });
process.on("beforeExit", async () => await logger.flushAll());
