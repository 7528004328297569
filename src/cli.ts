#!/usr/bin/env node
import { readFileSync } from 'fs';
import * as readline from 'readline';
import chalk from 'chalk';
import { loadConfig } from './config.js';
import { parseCliArgs, runExpression } from './driver.js';
import type { Outcome } from './driver.js';
import { formatCalcError } from './types/errors.js';
import type { CliOptions } from './types/index.js';

const VERSION = '1.0.0';
const HELP = `
exprcalc v${VERSION} - integer expression calculator

Usage:
  exprcalc [options] <expression...>   Evaluate an expression
  exprcalc [options]                   Read the expression from stdin
  exprcalc repl                        Interactive mode

Options:
  --strict, -s   Reject characters that are not part of any token
  --json         Print the result or error as JSON
  --ast          Print the parsed tree as JSON instead of evaluating
  --help, -h     Show this help
  --version, -v  Show version

Environment:
  EXPRCALC_STRICT=1       Same as --strict
  EXPRCALC_FORMAT=json    Same as --json

Examples:
  exprcalc "555/5 + 1 - 100"
  exprcalc --ast "(2 + 3) * 4"
  echo "1 < 2 and 3 >= 3" | exprcalc
`;

function emit(outcome: Outcome): void {
    if (outcome.stream === 'stderr') {
        console.error(chalk.red(outcome.line));
    } else {
        console.log(outcome.line);
    }
}

function main(): void {
    const config = loadConfig();
    if (!config.ok) {
        console.error(chalk.red(formatCalcError(config.error)));
        process.exit(1);
    }

    const parsed = parseCliArgs(process.argv.slice(2));
    if ('error' in parsed) {
        console.error(chalk.red(`Error: ${parsed.error}`));
        console.log(HELP);
        process.exit(1);
    }

    const options: CliOptions = {
        strict: parsed.options.strict ?? config.value.strict,
        format: parsed.options.format ?? config.value.format,
        ast: parsed.options.ast,
    };

    switch (parsed.command) {
        case 'help':
            console.log(HELP);
            return;
        case 'version':
            console.log(VERSION);
            return;
        case 'repl':
            runRepl(options);
            return;
    }

    let expression = parsed.expression;
    if (!expression && !process.stdin.isTTY) {
        expression = readFileSync(0, 'utf-8').trim();
    }
    if (!expression) {
        console.log(HELP);
        return;
    }

    const outcome = runExpression(expression, options);
    emit(outcome);
    process.exitCode = outcome.exitCode;
}

function runRepl(options: CliOptions): void {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'exprcalc> '
    });

    console.log(chalk.bold(`exprcalc REPL v${VERSION}${options.strict ? ' [STRICT]' : ''}`));
    console.log(chalk.gray('Enter an expression, or .ast <expr>, .help, .quit\n'));
    rl.prompt();

    rl.on('line', (line) => {
        const trimmed = line.trim();

        if (trimmed === '.help') {
            console.log('Commands:');
            console.log('  <expr>          Evaluate an expression');
            console.log('  .ast <expr>     Show the parsed tree as JSON');
            console.log('  .quit, .exit, .q  Exit REPL');
            console.log('  .help           Show this help');
        } else if (trimmed.startsWith('.ast ')) {
            emit(runExpression(trimmed.slice(5).trim(), { ...options, ast: true }));
        } else if (trimmed === '.quit' || trimmed === '.exit' || trimmed === '.q') {
            rl.close();
            return;
        } else if (trimmed.startsWith('.')) {
            console.log('Unknown command. Use .ast, .help, or .quit');
        } else if (trimmed) {
            emit(runExpression(trimmed, options));
        }
        rl.prompt();
    });

    rl.on('close', () => process.exit(0));
}

main();
