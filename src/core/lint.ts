/**
 * CORE: Description Lints
 * Documentation-quality rules over a parser's Description. Meant for the
 * parser author's own tests, not for runtime checks.
 */

import type { Description, Example, NamedCommandParser } from './command';
import { LintError } from './errors';

export type Lint =
    | 'PurposeHasExcessWhitespace'
    | 'PurposeIsEmpty'
    | 'PurposeDoesNotBeginWithUppercase'
    | 'PurposeDoesNotEndWithPeriod'
    | 'UsageHasExcessWhitespace'
    | 'UsageBeginsWithCommandName'
    | 'ExampleScenarioHasExcessWhitespace'
    | 'ExampleScenarioIsEmpty'
    | 'ExampleScenarioBeginsWithUppercase'
    | 'ExampleScenarioEndsWithPeriod'
    | 'ExampleCommandHasExcessWhitespace'
    | 'ExampleCommandIsEmpty'
    | 'ExampleCommandBeginsWithCommandName';

export type Lintable = Pick<NamedCommandParser<unknown, unknown>, 'name' | 'description'>;

const UPPERCASE_START = /^\p{Uppercase}/u;

/**
 * Runs every lint over the parser's description and returns the ones that
 * failed, in rule order. The purpose is judged on its trimmed form; usage and
 * example fields on the raw text.
 */
export function validate(parser: Lintable): Lint[] {
    const failed: Lint[] = [];
    validateDescription(parser.name(), parser.description(), failed);
    return failed;
}

/**
 * @throws LintError on the first lint raised
 */
export function assertPedantic(parser: Lintable): void {
    assert(parser, []);
}

/**
 * @throws LintError on the first raised lint that is not in `exclusions`
 */
export function assert(parser: Lintable, exclusions: readonly Lint[]): void {
    for (const lint of validate(parser)) {
        if (!exclusions.includes(lint)) {
            throw new LintError(`failed lint: ${lint}`);
        }
    }
}

function check(lint: Lint, condition: boolean, failed: Lint[]): boolean {
    if (!condition) {
        failed.push(lint);
    }
    return condition;
}

function noExcessWhitespace(text: string, lint: Lint, failed: Lint[]): void {
    check(lint, text.trim() === text, failed);
}

function validateDescription(commandName: string, desc: Description, failed: Lint[]): void {
    noExcessWhitespace(desc.purpose, 'PurposeHasExcessWhitespace', failed);
    const purpose = desc.purpose.trim();
    if (check('PurposeIsEmpty', purpose !== '', failed)) {
        check('PurposeDoesNotBeginWithUppercase', UPPERCASE_START.test(purpose), failed);
        check('PurposeDoesNotEndWithPeriod', purpose.endsWith('.'), failed);
    }

    const { usage } = desc;
    noExcessWhitespace(usage, 'UsageHasExcessWhitespace', failed);
    if (usage !== '') {
        check('UsageBeginsWithCommandName', !usage.startsWith(commandName), failed);
    }

    for (const example of desc.examples) {
        validateExample(commandName, example, failed);
    }
}

function validateExample(commandName: string, example: Example, failed: Lint[]): void {
    const { scenario, command } = example;
    noExcessWhitespace(scenario, 'ExampleScenarioHasExcessWhitespace', failed);
    if (check('ExampleScenarioIsEmpty', scenario !== '', failed)) {
        check('ExampleScenarioBeginsWithUppercase', !UPPERCASE_START.test(scenario), failed);
        check('ExampleScenarioEndsWithPeriod', !scenario.endsWith('.'), failed);
    }

    noExcessWhitespace(command, 'ExampleCommandHasExcessWhitespace', failed);
    if (check('ExampleCommandIsEmpty', command !== '', failed)) {
        check('ExampleCommandBeginsWithCommandName', !command.startsWith(commandName), failed);
    }
}
