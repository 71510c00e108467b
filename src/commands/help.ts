/**
 * The `help` command: a table of every registered command, its usage and
 * examples, rendered through a nunjucks template.
 */

import nunjucks from 'nunjucks';
import path from 'path';
import type { ApplyOutcome, Command, Description, NamedCommandParser } from '../core/command';
import { parseNoArgs } from '../core/command';
import type { Commander } from '../core/commander';
import { describeError } from '../core/errors';
import type { Looper } from '../core/looper';

export const DEFAULT_HELP_TEMPLATE = path.resolve(__dirname, '../../templates/help.njk');

const MIN_COMMAND_WIDTH = 15;

export interface HelpRow {
    /** "<shorthand>, <name>" or just the name. */
    command: string;
    lines: string[];
}

export function helpRows<C, E>(commander: Commander<C, E>): HelpRow[] {
    return commander.parsers().map((parser) => {
        const name = parser.name();
        const shorthand = parser.shorthand();
        const { purpose, usage, examples } = parser.description();

        const lines = [purpose, `usage: ${name} ${usage}`.trimEnd()];
        for (const example of examples) {
            lines.push(`example - ${example.scenario}:`);
            lines.push(`    ${name} ${example.command}`);
        }

        return {
            command: shorthand === undefined ? name : `${shorthand}, ${name}`,
            lines,
        };
    });
}

export function renderHelp<C, E>(commander: Commander<C, E>, template: string = DEFAULT_HELP_TEMPLATE): string {
    const env = new nunjucks.Environment(new nunjucks.FileSystemLoader(path.dirname(template)), {
        autoescape: false,
        throwOnUndefined: true,
        trimBlocks: true,
        lstripBlocks: true,
    });
    env.addFilter('pad', (text: string, width: number) => String(text).padEnd(width));

    const rows = helpRows(commander);
    const width = Math.max(MIN_COMMAND_WIDTH, ...rows.map((row) => row.command.length));
    return env.render(path.basename(template), { width, rows });
}

export class Help<C, E> implements Command<C, E> {
    constructor(private readonly template: string) {}

    /**
     * A template that fails to render is reported on the terminal and the
     * command is skipped; the session carries on.
     */
    async apply(looper: Looper<C, E>): Promise<ApplyOutcome> {
        let rendered: string;
        try {
            rendered = renderHelp(looper.commander, this.template);
        } catch (err) {
            await looper.terminal.printLine(`Help unavailable: ${describeError(err)}.`);
            return 'skipped';
        }
        await looper.terminal.print(rendered);
        return 'applied';
    }
}

export interface HelpOptions {
    /** Path to a nunjucks template; defaults to the bundled templates/help.njk. */
    template?: string;
}

export class HelpParser<C, E> implements NamedCommandParser<C, E> {
    private readonly template: string;

    constructor(options: HelpOptions = {}) {
        this.template = options.template ?? DEFAULT_HELP_TEMPLATE;
    }

    parse(args: string): Command<C, E> {
        return parseNoArgs(this, args, () => new Help<C, E>(this.template));
    }

    shorthand(): string {
        return 'h';
    }

    name(): string {
        return 'help';
    }

    description(): Description {
        return {
            purpose: 'Displays a list of commands, their usage syntax and examples.',
            usage: '',
            examples: [],
        };
    }
}
