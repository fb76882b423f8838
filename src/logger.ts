export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVELS, value);
}

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    activeLevel = level;
}

// stdout carries the MCP transport, so everything goes to stderr.
export class Logger {
    private scope: string;

    constructor(scope: string) {
        this.scope = scope;
    }

    debug(message: string, ...details: unknown[]): void {
        this.write('debug', message, details);
    }

    info(message: string, ...details: unknown[]): void {
        this.write('info', message, details);
    }

    warn(message: string, ...details: unknown[]): void {
        this.write('warn', message, details);
    }

    error(message: string, ...details: unknown[]): void {
        this.write('error', message, details);
    }

    private write(level: LogLevel, message: string, details: unknown[]): void {
        if (LEVELS[level] < LEVELS[activeLevel]) return;

        const line = `[${this.scope}] ${message}`;
        if (level === 'warn') {
            console.warn(line, ...details);
        } else {
            console.error(line, ...details);
        }
    }
}
