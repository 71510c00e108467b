/**
 * The `quit` command. Stops the run flag; the looper returns once control
 * comes back to it.
 */

import type { ApplyOutcome, Command, Description, NamedCommandParser } from '../core/command';
import { parseNoArgs } from '../core/command';
import type { Looper } from '../core/looper';

export class Quit<C, E> implements Command<C, E> {
    async apply(looper: Looper<C, E>): Promise<ApplyOutcome> {
        looper.runFlag.stop();
        await looper.terminal.printLine('Exiting.');
        return 'applied';
    }
}

export class QuitParser<C, E> implements NamedCommandParser<C, E> {
    parse(args: string): Command<C, E> {
        return parseNoArgs(this, args, () => new Quit<C, E>());
    }

    shorthand(): string {
        return 'q';
    }

    name(): string {
        return 'quit';
    }

    description(): Description {
        return {
            purpose: 'Exits the program.',
            usage: '',
            examples: [],
        };
    }
}
