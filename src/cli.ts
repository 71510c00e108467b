#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { calculatorParsers, runCalculator } from './calculator';
import { ConfigLoader } from './core/config';
import { logError } from './core/errors';
import * as lint from './core/lint';
import { ConsoleLogger, type ReplLogger } from './core/logger';
import { InquirerTerminal } from './shell/inquirer-terminal';
import { StreamingTerminal } from './shell/streaming-terminal';

const PackageSchema = z.object({ version: z.string() });

function getPackageRoot(): string {
    // From dist/cli.js (or src/cli.ts), go up to package root
    return path.join(__dirname, '..');
}

/**
 * Logs the lint verdict of every parser. Returns how many parsers failed.
 */
export function lintReport(parsers: ReadonlyArray<lint.Lintable>, logger: ReplLogger): number {
    let failures = 0;
    for (const parser of parsers) {
        const failed = lint.validate(parser);
        if (failed.length === 0) {
            logger.success(`${parser.name()}: ok`);
        } else {
            failures++;
            logger.error(`${parser.name()}: ${failed.join(', ')}`);
        }
    }
    return failures;
}

export function createProgram(logger: ReplLogger = new ConsoleLogger()): Command {
    const pkg = PackageSchema.parse(fs.readJsonSync(path.join(getPackageRoot(), 'package.json')));
    const program = new Command();

    program
        .name('cmdloop')
        .description('Line-oriented REPL framework with an example calculator')
        .version(pkg.version);

    // ═══════════════════════════════════════════════════════════════════════════
    // CALC COMMAND
    // ═══════════════════════════════════════════════════════════════════════════

    program
        .command('calc', { isDefault: true })
        .description('Run the calculator REPL')
        .option('--plain', 'Read plain lines from stdin instead of interactive prompts')
        .option('--config <dir>', 'Directory containing cmdloop.config.json(c)')
        .action(async (options: { plain?: boolean; config?: string }) => {
            const config = await new ConfigLoader(path.resolve(options.config ?? process.cwd())).load();
            const streaming = options.plain ? StreamingTerminal.stdio() : null;
            try {
                await runCalculator(streaming ?? new InquirerTerminal(), config);
            } catch (err) {
                if (!(err instanceof Error)) {
                    throw err;
                }
                logError(logger, err);
                process.exitCode = 1;
            } finally {
                streaming?.close();
            }
        });

    // ═══════════════════════════════════════════════════════════════════════════
    // LINT COMMAND
    // ═══════════════════════════════════════════════════════════════════════════

    program
        .command('lint')
        .description('Check the calculator command descriptions against the lint rules')
        .action(() => {
            if (lintReport(calculatorParsers(), logger) > 0) {
                process.exitCode = 1;
            }
        });

    return program;
}

if (require.main === module) {
    const logger = new ConsoleLogger();
    createProgram(logger)
        .parseAsync(process.argv)
        .catch((err: unknown) => {
            logError(logger, err instanceof Error ? err : new Error(String(err)));
            process.exitCode = 1;
        });
}
