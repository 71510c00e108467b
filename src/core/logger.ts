export interface ReplLogger {
    info(msg: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
    success(msg: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
}

export class ConsoleLogger implements ReplLogger {
    info(msg: string, ...args: unknown[]): void {
        console.log(msg, ...args);
    }

    error(msg: string, ...args: unknown[]): void {
        console.error(msg, ...args);
    }

    success(msg: string, ...args: unknown[]): void {
        console.log(msg, ...args);
    }

    warn(msg: string, ...args: unknown[]): void {
        console.warn(msg, ...args);
    }
}

export type LogLevel = 'info' | 'error' | 'success' | 'warn';

export interface LogEntry {
    level: LogLevel;
    message: string;
}

/**
 * Keeps every message in memory. Lets the CLI reports be checked without a console.
 */
export class RecordingLogger implements ReplLogger {
    readonly entries: LogEntry[] = [];

    info(msg: string): void {
        this.entries.push({ level: 'info', message: msg });
    }

    error(msg: string): void {
        this.entries.push({ level: 'error', message: msg });
    }

    success(msg: string): void {
        this.entries.push({ level: 'success', message: msg });
    }

    warn(msg: string): void {
        this.entries.push({ level: 'warn', message: msg });
    }

    messages(level?: LogLevel): string[] {
        return this.entries
            .filter((entry) => level === undefined || entry.level === level)
            .map((entry) => entry.message);
    }
}
