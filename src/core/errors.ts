import type { ReplLogger } from './logger';

/**
 * Base error class for cmdloop with recovery hints
 */
export class ReplError extends Error {
    constructor(message: string, public recoveryHint?: string) {
        super(message);
        this.name = 'ReplError';
    }

    toString(): string {
        if (this.recoveryHint) {
            return `${this.message}\nHint: ${this.recoveryHint}`;
        }
        return this.message;
    }
}

/**
 * The terminal device could not be accessed for reading or writing.
 * Always fatal to the loop.
 */
export class AccessTerminalError extends ReplError {
    constructor(message: string) {
        super(message);
        this.name = 'AccessTerminalError';
    }
}

/**
 * Raised by the Commander or a command parser when a line could not be
 * turned into a command.
 */
export class ParseCommandError extends ReplError {
    constructor(message: string) {
        super(message);
        this.name = 'ParseCommandError';
    }

    /**
     * Wraps anything with a message (or a string form) into a ParseCommandError.
     */
    static convert(err: unknown): ParseCommandError {
        return new ParseCommandError(describeError(err));
    }
}

/**
 * The parsers handed to a Commander were malformed or conflicted amongst themselves.
 */
export class InvalidCommandParserSpec extends ReplError {
    constructor(message: string) {
        super(message, 'Check command names, shorthands and example commands.');
        this.name = 'InvalidCommandParserSpec';
    }
}

/**
 * Domain error raised by a command's apply. Recoverable: the loop prints it and carries on.
 */
export class ApplicationError<E> extends ReplError {
    constructor(public readonly error: E) {
        super(describeError(error));
        this.name = 'ApplicationError';
    }
}

/**
 * What a command's apply may reject with.
 */
export type ApplyCommandError<E> = ApplicationError<E> | AccessTerminalError;

/**
 * A description lint fired outside the allowed exclusions
 */
export class LintError extends ReplError {
    constructor(message: string) {
        super(message, 'Fix the command description or add the lint to the exclusions.');
        this.name = 'LintError';
    }
}

/**
 * Config file is unreadable or does not match the schema
 */
export class ConfigError extends ReplError {
    constructor(message: string) {
        super(message, 'Fix or remove cmdloop.config.json.');
        this.name = 'ConfigError';
    }
}

export function describeError(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }
    return String(err);
}

/**
 * Log error with recovery hint
 */
export function logError(logger: ReplLogger, error: Error): void {
    logger.error(`[ERROR] ${error.message}`);
    if (error instanceof ReplError && error.recoveryHint) {
        logger.info(`Hint: ${error.recoveryHint}`);
    }
}
