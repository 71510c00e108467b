/**
 * CORE: Commander
 * Compiles command parsers into a dispatch table and decodes input lines
 * into commands. Lines look like `<name|shorthand> [<args>]`.
 */

import type { Command, NamedCommandParser } from './command';
import { InvalidCommandParserSpec, ParseCommandError } from './errors';

export type CommanderResult<C, E> =
    | { success: true; commander: Commander<C, E> }
    | { success: false; error: InvalidCommandParserSpec };

const MIN_NAME_LENGTH = 2;

function duplicate(key: string): InvalidCommandParserSpec {
    return new InvalidCommandParserSpec(`duplicate command parser for '${key}'`);
}

export class Commander<C, E> {
    private readonly registered: ReadonlyArray<NamedCommandParser<C, E>>;
    private readonly byShorthand = new Map<string, number>();
    private readonly byName = new Map<string, number>();
    private readonly sorted: ReadonlyArray<NamedCommandParser<C, E>>;

    /**
     * @throws InvalidCommandParserSpec if a parser is malformed or conflicts with another
     */
    constructor(parsers: ReadonlyArray<NamedCommandParser<C, E>>) {
        this.registered = [...parsers];
        this.registered.forEach((parser, index) => this.register(parser, index));
        this.sorted = [...this.byName.entries()]
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([, index]) => this.registered[index]);
    }

    /**
     * Non-throwing construction, in the manner of zod's safeParse.
     */
    static tryFrom<C, E>(parsers: ReadonlyArray<NamedCommandParser<C, E>>): CommanderResult<C, E> {
        try {
            return { success: true, commander: new Commander(parsers) };
        } catch (err) {
            if (err instanceof InvalidCommandParserSpec) {
                return { success: false, error: err };
            }
            throw err;
        }
    }

    /**
     * The registered parsers, ordered by name.
     */
    parsers(): ReadonlyArray<NamedCommandParser<C, E>> {
        return this.sorted;
    }

    /**
     * @throws ParseCommandError if no parser matches or the matched parser rejects the arguments
     */
    parse(input: string): Command<C, E> {
        if (input === '') {
            throw new ParseCommandError('empty command string');
        }

        const split = input.indexOf(' ');
        const identifier = split === -1 ? input : input.slice(0, split);
        const args = split === -1 ? '' : input.slice(split + 1);

        const index = this.byShorthand.get(identifier) ?? this.byName.get(identifier);
        if (index === undefined) {
            throw new ParseCommandError(`no command parser for '${identifier}'`);
        }
        return this.registered[index].parse(args);
    }

    private register(parser: NamedCommandParser<C, E>, index: number): void {
        for (const example of parser.description().examples) {
            try {
                parser.parse(example.command);
            } catch (err) {
                if (!(err instanceof ParseCommandError)) {
                    throw err;
                }
                throw new InvalidCommandParserSpec(
                    `unparsable example command '${example.command}': ${err.message}`
                );
            }
        }

        const shorthand = parser.shorthand();
        if (shorthand !== undefined) {
            if (this.byName.has(shorthand)) {
                throw duplicate(shorthand);
            }
            this.insert(shorthand, index, this.byShorthand);
        }

        const name = parser.name();
        if (Array.from(name).length < MIN_NAME_LENGTH) {
            throw new InvalidCommandParserSpec(
                `invalid command name '${name}': must contain at least ${MIN_NAME_LENGTH} characters`
            );
        }
        if (this.byShorthand.has(name)) {
            throw duplicate(name);
        }
        this.insert(name, index, this.byName);
    }

    private insert(key: string, index: number, map: Map<string, number>): void {
        if (map.has(key)) {
            throw duplicate(key);
        }
        map.set(key, index);
    }
}
