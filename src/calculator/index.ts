/**
 * Example application: a calculator with a single register.
 * @module calculator
 */

import { z } from 'zod';
import { parseArgs } from '../core/args';
import type { ApplyOutcome, Command, Description, NamedCommandParser } from '../core/command';
import { parseNoArgs } from '../core/command';
import { Commander } from '../core/commander';
import { DEFAULT_CONFIG, type ReplConfig } from '../core/config';
import { ApplicationError } from '../core/errors';
import { Looper } from '../core/looper';
import type { Terminal } from '../core/terminal';
import { HelpParser } from '../commands/help';
import { QuitParser } from '../commands/quit';

export class RegisterError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RegisterError';
    }
}

export class Register {
    value = 0;

    describe(): string {
        return `register: ${this.value}`;
    }
}

export type CalculatorLooper = Looper<Register, RegisterError>;
type CalculatorCommand = Command<Register, RegisterError>;
type CalculatorParser = NamedCommandParser<Register, RegisterError>;

const FLOAT_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export const OperandSchema = z.string().regex(FLOAT_LITERAL, 'invalid float literal').transform(Number);

export const ConfirmSchema = z
    .string()
    .transform((answer) => answer.toLowerCase())
    .pipe(z.enum(['y', 'yes', 'n', 'no'], { errorMap: () => ({ message: "expected 'y' or 'n'" }) }))
    .transform((answer) => answer === 'y' || answer === 'yes');

/**
 * Replaces the register's value with `op(value)` and prints the result.
 */
class Adjust implements CalculatorCommand {
    constructor(private readonly op: (value: number) => number) {}

    async apply(looper: CalculatorLooper): Promise<ApplyOutcome> {
        const register = looper.context;
        register.value = this.op(register.value);
        await looper.terminal.printLine(register.describe());
        return 'applied';
    }
}

class Divide implements CalculatorCommand {
    constructor(private readonly divisor: number) {}

    async apply(looper: CalculatorLooper): Promise<ApplyOutcome> {
        if (this.divisor === 0) {
            throw new ApplicationError(new RegisterError('division by zero'));
        }
        return new Adjust((value) => value / this.divisor).apply(looper);
    }
}

class Print implements CalculatorCommand {
    async apply(looper: CalculatorLooper): Promise<ApplyOutcome> {
        await looper.terminal.printLine(looper.context.describe());
        return 'applied';
    }
}

class Clear implements CalculatorCommand {
    async apply(looper: CalculatorLooper): Promise<ApplyOutcome> {
        const confirmed = await looper.terminal.readSchemaOrDefault(
            'Clear the register? [y/N] ',
            ConfirmSchema,
            false
        );
        if (!confirmed) {
            return 'skipped';
        }
        looper.context.value = 0;
        await looper.terminal.printLine(looper.context.describe());
        return 'applied';
    }
}

export class AddParser implements CalculatorParser {
    parse(args: string): CalculatorCommand {
        const operand = parseArgs(OperandSchema, args);
        return new Adjust((value) => value + operand);
    }

    shorthand(): string {
        return 'a';
    }

    name(): string {
        return 'add';
    }

    description(): Description {
        return {
            purpose: 'Adds a value to the register.',
            usage: '<value>',
            examples: [{ scenario: 'adds 1.5 to the register', command: '1.5' }],
        };
    }
}

export class SubtractParser implements CalculatorParser {
    parse(args: string): CalculatorCommand {
        const operand = parseArgs(OperandSchema, args);
        return new Adjust((value) => value - operand);
    }

    shorthand(): string {
        return 's';
    }

    name(): string {
        return 'subtract';
    }

    description(): Description {
        return {
            purpose: 'Subtracts a value from the register.',
            usage: '<value>',
            examples: [{ scenario: 'subtracts 0.5 from the register', command: '0.5' }],
        };
    }
}

export class DivideParser implements CalculatorParser {
    parse(args: string): CalculatorCommand {
        return new Divide(parseArgs(OperandSchema, args));
    }

    shorthand(): string {
        return 'd';
    }

    name(): string {
        return 'divide';
    }

    description(): Description {
        return {
            purpose: 'Divides the register by a value. Dividing by zero is an error.',
            usage: '<value>',
            examples: [{ scenario: 'halves the register', command: '2' }],
        };
    }
}

export class PrintParser implements CalculatorParser {
    parse(args: string): CalculatorCommand {
        return parseNoArgs(this, args, () => new Print());
    }

    shorthand(): string {
        return 'p';
    }

    name(): string {
        return 'print';
    }

    description(): Description {
        return {
            purpose: 'Prints the contents of the register.',
            usage: '',
            examples: [],
        };
    }
}

export class ClearParser implements CalculatorParser {
    parse(args: string): CalculatorCommand {
        return parseNoArgs(this, args, () => new Clear());
    }

    shorthand(): string {
        return 'c';
    }

    name(): string {
        return 'clear';
    }

    description(): Description {
        return {
            purpose: 'Resets the register to zero after asking for confirmation.',
            usage: '',
            examples: [],
        };
    }
}

export function calculatorParsers(config: ReplConfig = DEFAULT_CONFIG): CalculatorParser[] {
    return [
        new AddParser(),
        new SubtractParser(),
        new DivideParser(),
        new PrintParser(),
        new ClearParser(),
        new HelpParser({ template: config.helpTemplate }),
        new QuitParser(),
    ];
}

/**
 * Runs a calculator session on `terminal` until `quit`. The register is
 * returned so callers can inspect (or reuse) its final state.
 */
export async function runCalculator(
    terminal: Terminal,
    config: ReplConfig = DEFAULT_CONFIG,
    register: Register = new Register()
): Promise<Register> {
    const commander = new Commander(calculatorParsers(config));
    if (config.banner !== undefined) {
        await terminal.printLine(config.banner);
    }
    await new Looper(terminal, commander, register, { prompts: config.prompts }).run();
    return register;
}
