/**
 * Calculator sessions end to end, plus description lints for every command.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Commander } from '../core/commander';
import { DEFAULT_CONFIG } from '../core/config';
import * as lint from '../core/lint';
import { lines, MockTerminal } from '../shell/mock-terminal';
import { calculatorParsers, Register, runCalculator } from './index';

async function session(script: string[], register = new Register()): Promise<{ printed: string[]; register: Register }> {
    const terminal = new MockTerminal().onReadLine(lines(script));
    await runCalculator(terminal, DEFAULT_CONFIG, register);
    return { printed: terminal.printed(), register };
}

describe('calculator', () => {
    it('registers cleanly', () => {
        const commander = new Commander(calculatorParsers());
        assert.deepStrictEqual(
            commander.parsers().map((parser) => parser.name()),
            ['add', 'clear', 'divide', 'help', 'print', 'quit', 'subtract']
        );
    });

    it('has lint-clean descriptions', () => {
        for (const parser of calculatorParsers()) {
            assert.doesNotThrow(() => lint.assertPedantic(parser), parser.name());
        }
    });

    it('adds, subtracts and prints', async () => {
        const { printed, register } = await session(['add 2', 's 0.5', 'print', 'quit']);
        assert.strictEqual(register.value, 1.5);
        assert.deepStrictEqual(printed, [
            '+>> ', 'register: 2\n',
            '+>> ', 'register: 1.5\n',
            '+>> ', 'register: 1.5\n',
            '+>> ', 'Exiting.\n',
        ]);
    });

    it('divides', async () => {
        const register = new Register();
        register.value = 9;
        const { printed } = await session(['d 4', 'q'], register);
        assert.strictEqual(register.value, 2.25);
        assert.deepStrictEqual(printed, ['+>> ', 'register: 2.25\n', '+>> ', 'Exiting.\n']);
    });

    it('reports division by zero as a command error', async () => {
        const { printed, register } = await session(['a 3', 'divide 0', 'p', 'quit']);
        assert.strictEqual(register.value, 3);
        assert.deepStrictEqual(printed, [
            '+>> ', 'register: 3\n',
            '+>> ', 'Command error: division by zero.\n',
            '!>> ', 'register: 3\n',
            '+>> ', 'Exiting.\n',
        ]);
    });

    it('rejects operands that are not numbers', async () => {
        const { printed } = await session(['add x', 'add 1e2', 'quit']);
        assert.deepStrictEqual(printed, [
            '+>> ', 'Invalid input: invalid float literal.\n',
            '+>> ', 'register: 100\n',
            '+>> ', 'Exiting.\n',
        ]);
    });

    it('skips clear when the user declines', async () => {
        const { printed, register } = await session(['a 5', 'clear', 'n', 'p', 'quit']);
        assert.strictEqual(register.value, 5);
        assert.deepStrictEqual(printed, [
            '+>> ', 'register: 5\n',
            '+>> ', 'Clear the register? [y/N] ',
            '->> ', 'register: 5\n',
            '+>> ', 'Exiting.\n',
        ]);
    });

    it('treats an empty answer as no', async () => {
        const { register } = await session(['a 5', 'c', '', 'q']);
        assert.strictEqual(register.value, 5);
    });

    it('clears after confirmation, asking again on a bad answer', async () => {
        const { printed, register } = await session(['a 5', 'c', 'maybe', 'Y', 'q']);
        assert.strictEqual(register.value, 0);
        assert.deepStrictEqual(printed, [
            '+>> ', 'register: 5\n',
            '+>> ', 'Clear the register? [y/N] ',
            "Invalid input: expected 'y' or 'n'.\n",
            'Clear the register? [y/N] ',
            'register: 0\n',
            '+>> ', 'Exiting.\n',
        ]);
    });

    it('prints the banner and uses configured prompts', async () => {
        const terminal = new MockTerminal().onReadLine(lines(['print', 'quit']));
        await runCalculator(terminal, {
            prompts: { applied: 'calc> ', skipped: 'calc-> ', erred: 'calc!> ' },
            banner: 'Calculator ready.',
        });
        assert.deepStrictEqual(terminal.printed(), ['Calculator ready.\n', 'calc> ', 'register: 0\n', 'calc> ', 'Exiting.\n']);
    });
});
