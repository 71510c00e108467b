/**
 * SHELL: Inquirer Terminal
 * Interactive terminal: each line is read through an inquirer input prompt.
 */

import inquirer from 'inquirer';
import { AccessTerminalError, describeError } from '../core/errors';
import { Terminal } from '../core/terminal';
import { type Output, WritableOutput } from './streaming-terminal';

/** Asks for one line of input, showing `message` as the prompt. */
export type LinePrompt = (message: string) => Promise<string>;

export const inquirerLinePrompt: LinePrompt = async (message) => {
    const { line } = await inquirer.prompt<{ line: string }>([
        { type: 'input', name: 'line', message, prefix: '' },
    ]);
    return line;
};

/**
 * Complete lines go straight to the output. A trailing partial line (such as
 * the looper's "+>> ") is held back and becomes the message of the next
 * inquirer prompt, so the prompt and the typed text share one line.
 */
export class InquirerTerminal extends Terminal {
    private pending = '';

    constructor(
        private readonly output: Output = new WritableOutput(process.stdout),
        private readonly prompt: LinePrompt = inquirerLinePrompt
    ) {
        super();
    }

    async print(text: string): Promise<void> {
        const buffered = this.pending + text;
        const end = buffered.lastIndexOf('\n');
        this.pending = buffered.slice(end + 1);
        if (end !== -1) {
            await this.output.print(buffered.slice(0, end + 1));
        }
    }

    async readLine(): Promise<string> {
        const message = this.pending.trimEnd();
        this.pending = '';
        try {
            return await this.prompt(message);
        } catch (err) {
            throw new AccessTerminalError(describeError(err));
        }
    }
}
