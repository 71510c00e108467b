/**
 * SHELL: Mock Terminal
 * Scriptable terminal that records every call. Used to test REPL sessions
 * without a real console.
 */

import { AccessTerminalError, describeError } from '../core/errors';
import { Terminal } from '../core/terminal';

export type LineReader = () => string | Promise<string>;
export type TextWriter = (text: string) => void | Promise<void>;

export type ReadLineResult = { ok: true; line: string } | { ok: false; error: string };
export type PrintResult = { ok: true } | { ok: false; error: string };

/** A single call made against the mock, with what it returned. */
export type Invocation =
    | { type: 'readLine'; result: ReadLineResult }
    | { type: 'print'; text: string; result: PrintResult };

export class MockTerminal extends Terminal {
    private reader: LineReader = () => '';
    private writer: TextWriter = () => undefined;
    private readonly recorded: Invocation[] = [];

    onReadLine(delegate: LineReader): this {
        this.reader = delegate;
        return this;
    }

    onPrint(delegate: TextWriter): this {
        this.writer = delegate;
        return this;
    }

    invocations(): ReadonlyArray<Invocation> {
        return this.recorded;
    }

    /** Text of every successful print, in order. */
    printed(): string[] {
        return this.recorded.flatMap((invocation) =>
            invocation.type === 'print' && invocation.result.ok ? [invocation.text] : []
        );
    }

    async print(text: string): Promise<void> {
        try {
            await this.writer(text);
        } catch (err) {
            this.recorded.push({ type: 'print', text, result: { ok: false, error: describeError(err) } });
            throw err;
        }
        this.recorded.push({ type: 'print', text, result: { ok: true } });
    }

    async readLine(): Promise<string> {
        let line: string;
        try {
            line = await this.reader();
        } catch (err) {
            this.recorded.push({ type: 'readLine', result: { ok: false, error: describeError(err) } });
            throw err;
        }
        this.recorded.push({ type: 'readLine', result: { ok: true, line } });
        return line;
    }
}

/**
 * A reader that hands out `script` one line at a time, then fails with
 * AccessTerminalError("no more lines").
 */
export function lines(script: readonly string[]): LineReader {
    let next = 0;
    return () => {
        if (next >= script.length) {
            throw new AccessTerminalError('no more lines');
        }
        return script[next++];
    };
}
