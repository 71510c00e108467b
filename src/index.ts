export type { ApplyOutcome, Command, Description, Example, NamedCommandParser } from './core/command';
export { parseNoArgs } from './core/command';
export { parseArgs } from './core/args';
export { Commander } from './core/commander';
export type { CommanderResult } from './core/commander';
export {
    AccessTerminalError,
    ApplicationError,
    ConfigError,
    InvalidCommandParserSpec,
    LintError,
    ParseCommandError,
    ReplError,
    describeError,
    logError,
} from './core/errors';
export type { ApplyCommandError } from './core/errors';
export * as lint from './core/lint';
export type { Lint, Lintable } from './core/lint';
export { ConsoleLogger, RecordingLogger } from './core/logger';
export type { LogEntry, LogLevel, ReplLogger } from './core/logger';
export { DEFAULT_PROMPTS, Looper, RunFlag } from './core/looper';
export type { LastCommandOutcome, LooperOptions, Prompts } from './core/looper';
export { Terminal } from './core/terminal';
export { CONFIG_FILES, ConfigLoader, ConfigSchema, DEFAULT_CONFIG } from './core/config';
export type { ReplConfig } from './core/config';
export { MockTerminal, lines } from './shell/mock-terminal';
export type { Invocation, LineReader, PrintResult, ReadLineResult, TextWriter } from './shell/mock-terminal';
export { ReadableInput, StreamingTerminal, WritableOutput } from './shell/streaming-terminal';
export type { Input, Output } from './shell/streaming-terminal';
export { InquirerTerminal, inquirerLinePrompt } from './shell/inquirer-terminal';
export type { LinePrompt } from './shell/inquirer-terminal';
export { DEFAULT_HELP_TEMPLATE, Help, HelpParser, helpRows, renderHelp } from './commands/help';
export type { HelpOptions, HelpRow } from './commands/help';
export { Quit, QuitParser } from './commands/quit';
