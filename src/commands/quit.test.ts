import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Commander } from '../core/commander';
import * as lint from '../core/lint';
import { Looper } from '../core/looper';
import { MockTerminal } from '../shell/mock-terminal';
import { Quit, QuitParser } from './quit';

describe('quit', () => {
    it('parses without arguments only', () => {
        const parser = new QuitParser<null, never>();
        assert.ok(parser.parse('') instanceof Quit);
        assert.throws(() => parser.parse('now'), {
            name: 'ParseCommandError',
            message: "invalid arguments to 'quit': 'now'",
        });
    });

    it('has a lint-clean description', () => {
        lint.assertPedantic(new QuitParser());
    });

    it('stops the run flag and says goodbye', async () => {
        const terminal = new MockTerminal();
        const looper = new Looper(terminal, new Commander<null, never>([new QuitParser()]), null);
        looper.runFlag.start();

        assert.strictEqual(await new Quit<null, never>().apply(looper), 'applied');
        assert.strictEqual(looper.runFlag.isRunning(), false);
        assert.deepStrictEqual(terminal.printed(), ['Exiting.\n']);
    });
});
