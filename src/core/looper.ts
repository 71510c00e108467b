/**
 * CORE: Looper
 * Runs commands from successive lines of user input until a command stops
 * the run flag. This is the 'loop' part of the REPL.
 */

import type { ApplyOutcome, Command } from './command';
import type { Commander } from './commander';
import { ApplicationError } from './errors';
import type { Terminal } from './terminal';

/**
 * Whether the looper is running. A command stops it to end the session;
 * the looper notices once that command returns.
 */
export class RunFlag {
    private running = false;

    start(): void {
        this.running = true;
    }

    stop(): void {
        this.running = false;
    }

    isRunning(): boolean {
        return this.running;
    }
}

/** Picks the prompt for the next read. */
export type LastCommandOutcome = ApplyOutcome | 'erred';

export type Prompts = Record<LastCommandOutcome, string>;

export const DEFAULT_PROMPTS: Prompts = {
    applied: '+>> ',
    skipped: '->> ',
    erred: '!>> ',
};

export interface LooperOptions {
    prompts?: Partial<Prompts>;
}

/**
 * Holds the terminal, the commander, the run flag and the caller's context.
 * Each is handed to commands separately through this object; the looper
 * never copies or resets the context.
 */
export class Looper<C, E> {
    readonly runFlag = new RunFlag();
    private readonly prompts: Prompts;

    constructor(
        readonly terminal: Terminal,
        readonly commander: Commander<C, E>,
        readonly context: C,
        options: LooperOptions = {}
    ) {
        this.prompts = { ...DEFAULT_PROMPTS, ...options.prompts };
    }

    /**
     * Loops until a command stops the run flag. ApplicationErrors are printed
     * and the loop continues with the error prompt; AccessTerminalError (or
     * anything else a command rejects with) ends the loop and propagates.
     *
     * May be called again after it returns: the run flag is restarted, the
     * context is left as the previous run left it.
     */
    async run(): Promise<void> {
        this.runFlag.start();
        let lastOutcome: LastCommandOutcome = 'applied';

        while (this.runFlag.isRunning()) {
            const command: Command<C, E> = await this.terminal.readValue(this.prompts[lastOutcome], (line) =>
                this.commander.parse(line)
            );
            try {
                lastOutcome = await command.apply(this);
            } catch (err) {
                if (!(err instanceof ApplicationError)) {
                    throw err;
                }
                await this.terminal.printLine(`Command error: ${err.message}.`);
                lastOutcome = 'erred';
            }
        }
    }
}
