/**
 * CORE: Commands
 * An executable command and the parser that builds it from user input.
 * This is the 'execute' part of the loop.
 */

import { ParseCommandError } from './errors';
import type { Looper } from './looper';

/**
 * The outcome of applying a Command.
 * - applied: side effects (if any) were committed to the application context.
 * - skipped: the command declined without an error, e.g. the user aborted it.
 */
export type ApplyOutcome = 'applied' | 'skipped';

/**
 * One parsed, executable action. `C` is the application context, `E` the
 * domain error carried by ApplicationError.
 *
 * `apply` rejects with an ApplyCommandError<E>: ApplicationError for a
 * recoverable domain failure, AccessTerminalError when the terminal is gone.
 */
export interface Command<C, E> {
    apply(looper: Looper<C, E>): Promise<ApplyOutcome>;
}

export interface Example {
    /** Part-sentence: lowercase start, no trailing period. */
    scenario: string;
    /** Sample arguments, without the command name. */
    command: string;
}

export interface Description {
    /** One or more fully punctuated sentences. */
    purpose: string;
    /** Argument syntax without the command name. Blank if the command takes no arguments. */
    usage: string;
    examples: Example[];
}

/**
 * Builds commands of one kind from the argument text that follows the
 * command's name (or shorthand) on the input line.
 */
export interface NamedCommandParser<C, E> {
    /**
     * @throws ParseCommandError if the arguments are malformed
     */
    parse(args: string): Command<C, E>;

    /** Optional alias the user may type instead of the full name. */
    shorthand(): string | undefined;

    name(): string;

    description(): Description;
}

/**
 * For commands without arguments: builds the command via `ctor` when `args` is empty.
 */
export function parseNoArgs<C, E>(
    parser: Pick<NamedCommandParser<C, E>, 'name'>,
    args: string,
    ctor: () => Command<C, E>
): Command<C, E> {
    if (args !== '') {
        throw new ParseCommandError(`invalid arguments to '${parser.name()}': '${args}'`);
    }
    return ctor();
}
