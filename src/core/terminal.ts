/**
 * CORE: Terminal
 * Text-based interface with the user: the 'read' and 'print' parts of the loop.
 * Concrete devices live in src/shell.
 */

import type { output, ZodTypeAny } from 'zod';
import { parseArgs } from './args';
import { ParseCommandError } from './errors';

/**
 * A line-oriented I/O device. Implementations only provide `print` and
 * `readLine`; both reject with AccessTerminalError when the device cannot be used.
 */
export abstract class Terminal {
    abstract print(text: string): Promise<void>;

    /**
     * Reads one complete line, waiting until it becomes available.
     */
    abstract readLine(): Promise<string>;

    async printLine(text: string): Promise<void> {
        await this.print(`${text}\n`);
    }

    /**
     * Prompts until `parser` accepts the trimmed line. A ParseCommandError is
     * reported as "Invalid input: <msg>." and never reaches the caller; any
     * other error propagates.
     */
    async readValue<V>(prompt: string, parser: (text: string) => V): Promise<V> {
        for (;;) {
            await this.print(prompt);
            const line = await this.readLine();
            try {
                return parser(line.trim());
            } catch (err) {
                if (!(err instanceof ParseCommandError)) {
                    throw err;
                }
                await this.printLine(`Invalid input: ${err.message}.`);
            }
        }
    }

    async readSchema<S extends ZodTypeAny>(prompt: string, schema: S): Promise<output<S>> {
        return this.readValue(prompt, (text) => parseArgs(schema, text));
    }

    /**
     * Like readSchema, but an empty line yields `fallback`.
     */
    async readSchemaOrDefault<S extends ZodTypeAny>(
        prompt: string,
        schema: S,
        fallback: output<S>
    ): Promise<output<S>> {
        return this.readValue(prompt, (text) => (text === '' ? fallback : parseArgs(schema, text)));
    }
}
