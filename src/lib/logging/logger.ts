/**
 * Scoped logger. Everything goes to a single stream (stderr by default) so that
 * stdout only ever carries program output.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "none"] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const WEIGHTS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    none: 100,
};

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level == value);
}

type LoggerConfig = {
    level: LogLevel;
    json: boolean;
    stream: NodeJS.WritableStream;
};

export type LoggerOptions = Partial<LoggerConfig>;

export type LogContext = Record<string, unknown>;

class LogManager {
    private readonly config: LoggerConfig = {
        level: "warn",
        json: false,
        stream: process.stderr,
    };

    configure(options: LoggerOptions): void {
        this.config.level = options.level ?? this.config.level;
        this.config.json = options.json ?? this.config.json;
        this.config.stream = options.stream ?? this.config.stream;
    }

    get level(): LogLevel {
        return this.config.level;
    }

    create(component: string, ...scopes: string[]): ComponentLogger {
        return new ComponentLogger(this.config, [component, ...scopes]);
    }
}

export const logManager = new LogManager();

export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
    return logManager.create(component, ...scopes);
}

export class ComponentLogger {
    constructor(
        private readonly config: LoggerConfig,
        private readonly scopes: string[],
    ) { }

    debug(message: string, context?: LogContext): void {
        this.write("debug", message, context);
    }

    info(message: string, context?: LogContext): void {
        this.write("info", message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.write("warn", message, context);
    }

    error(message: string, context?: LogContext): void {
        this.write("error", message, context);
    }

    isEnabled(level: LogLevel): boolean {
        return WEIGHTS[level] >= WEIGHTS[this.config.level];
    }

    private write(level: Exclude<LogLevel, "none">, message: string, context?: LogContext): void {
        if (!this.isEnabled(level)) {
            return;
        }

        let payload = this.config.json
            ? JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                scopes: this.scopes,
                message,
                context: context ?? {},
            })
            : this.formatLine(level, message, context);

        this.config.stream.write(`${payload}\n`);
    }

    private formatLine(level: LogLevel, message: string, context?: LogContext): string {
        let ts = new Date().toISOString();
        let scope = this.scopes.join("|");
        return `[${ts}][${level.toUpperCase()}][${scope}] ${message}${formatContext(context)}`;
    }
}

function formatContext(context?: LogContext): string {
    if (!context || Object.keys(context).length === 0) return "";
    let entries = Object.entries(context)
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([key, value]) => `${key}=${stringifyValue(value)}`)
        .join(" ");
    return ` [${entries}]`;
}

function stringifyValue(value: unknown): string {
    if (value === null) return "null";
    if (value === undefined) return "undefined";
    if (typeof value === "string") {
        if (value.length === 0) return '""';
        if (/[\s"\\[\]]/.test(value)) return JSON.stringify(value);
        return value;
    }
    if (value instanceof Error) return JSON.stringify(value.message);
    if (typeof value === "object") return JSON.stringify(value);
    return String(value);
}
