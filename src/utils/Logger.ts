export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Console logger with a scope prefix, e.g. `[PanelLink /dev/ttyACM0] connected`.
 * All loggers share one process-wide level.
 */
export class Logger {
    constructor(private readonly scope: string) {}

    debug(message: string, ...details: unknown[]): void {
        if (this.enabled('debug')) console.debug(this.format(message), ...details);
    }

    info(message: string, ...details: unknown[]): void {
        if (this.enabled('info')) console.log(this.format(message), ...details);
    }

    warn(message: string, ...details: unknown[]): void {
        if (this.enabled('warn')) console.warn(this.format(message), ...details);
    }

    error(message: string, ...details: unknown[]): void {
        if (this.enabled('error')) console.error(this.format(message), ...details);
    }

    private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
    }

    private format(message: string): string {
        return `[${this.scope}] ${message}`;
    }
}

export function createLogger(scope: string): Logger {
    return new Logger(scope);
}
