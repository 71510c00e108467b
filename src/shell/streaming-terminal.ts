/**
 * SHELL: Streaming Terminal
 * Terminal composed over separate input and output adapters. Adapters exist
 * for Node streams; anything else can plug in through the Input/Output interfaces.
 */

import readline from 'readline';
import type { Readable, Writable } from 'stream';
import { AccessTerminalError, describeError } from '../core/errors';
import { Terminal } from '../core/terminal';

export interface Input {
    /** Resolves with the next line, without its line terminator. */
    readLine(): Promise<string>;
    close?(): void;
}

export interface Output {
    print(text: string): Promise<void>;
}

export class StreamingTerminal extends Terminal {
    constructor(
        readonly input: Input,
        readonly output: Output
    ) {
        super();
    }

    /**
     * Terminal over the process's stdin and stdout.
     */
    static stdio(): StreamingTerminal {
        return new StreamingTerminal(new ReadableInput(process.stdin), new WritableOutput(process.stdout));
    }

    print(text: string): Promise<void> {
        return this.output.print(text);
    }

    readLine(): Promise<string> {
        return this.input.readLine();
    }

    /**
     * Releases the input, letting the process exit once the session is over.
     */
    close(): void {
        this.input.close?.();
    }
}

/**
 * Reads lines from a Readable. Lines arriving before they are asked for are
 * buffered; once the stream ends, readLine rejects with "end of input".
 */
export class ReadableInput implements Input {
    private readonly rl: readline.Interface;
    private readonly lines: AsyncIterator<string>;

    constructor(stream: Readable) {
        this.rl = readline.createInterface({ input: stream, crlfDelay: Infinity, terminal: false });
        this.lines = this.rl[Symbol.asyncIterator]();
    }

    async readLine(): Promise<string> {
        let next: IteratorResult<string>;
        try {
            next = await this.lines.next();
        } catch (err) {
            throw new AccessTerminalError(describeError(err));
        }
        if (next.done) {
            throw new AccessTerminalError('end of input');
        }
        return next.value;
    }

    close(): void {
        this.rl.close();
    }
}

export class WritableOutput implements Output {
    private failure: Error | null = null;

    constructor(private readonly stream: Writable) {
        // A failed write also surfaces as an 'error' event; keep it for the next print instead of crashing.
        stream.on('error', (err: Error) => {
            this.failure = err;
        });
    }

    print(text: string): Promise<void> {
        if (this.failure !== null) {
            return Promise.reject(new AccessTerminalError(this.failure.message));
        }
        return new Promise((resolve, reject) => {
            this.stream.write(text, (err) => {
                if (err) {
                    reject(new AccessTerminalError(err.message));
                } else {
                    resolve();
                }
            });
        });
    }
}
