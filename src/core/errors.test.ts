/**
 * CORE: Error Taxonomy Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    AccessTerminalError,
    ApplicationError,
    InvalidCommandParserSpec,
    ParseCommandError,
    ReplError,
    describeError,
    logError,
} from './errors';
import { RecordingLogger } from './logger';

describe('errors', () => {
    it('formats the recovery hint', () => {
        assert.strictEqual(new ReplError('broken', 'fix it').toString(), 'broken\nHint: fix it');
        assert.strictEqual(new AccessTerminalError('closed').toString(), 'closed');
    });

    it('ApplicationError keeps the domain error and uses its message', () => {
        const cause = new RangeError('out of range');
        const err = new ApplicationError(cause);
        assert.strictEqual(err.error, cause);
        assert.strictEqual(err.message, 'out of range');
        assert.strictEqual(new ApplicationError('plain text').message, 'plain text');
        assert.strictEqual(new ApplicationError(404).message, '404');
    });

    it('ParseCommandError.convert takes errors and other values', () => {
        assert.strictEqual(ParseCommandError.convert(new Error('bad')).message, 'bad');
        assert.strictEqual(ParseCommandError.convert('worse').message, 'worse');
    });

    it('describeError prefers the message', () => {
        assert.strictEqual(describeError(new TypeError('nope')), 'nope');
        assert.strictEqual(describeError(undefined), 'undefined');
    });
});

describe('logError', () => {
    it('logs the message and the hint', () => {
        const logger = new RecordingLogger();
        logError(logger, new InvalidCommandParserSpec("duplicate command parser for 'g'"));
        assert.deepStrictEqual(logger.entries, [
            { level: 'error', message: "[ERROR] duplicate command parser for 'g'" },
            { level: 'info', message: 'Hint: Check command names, shorthands and example commands.' },
        ]);
    });

    it('logs plain errors without a hint', () => {
        const logger = new RecordingLogger();
        logError(logger, new Error('plain'));
        assert.deepStrictEqual(logger.messages(), ['[ERROR] plain']);
    });

    it('skips the hint when there is none', () => {
        const logger = new RecordingLogger();
        logError(logger, new AccessTerminalError('no more lines'));
        assert.deepStrictEqual(logger.messages('error'), ['[ERROR] no more lines']);
        assert.deepStrictEqual(logger.messages('info'), []);
    });
});
