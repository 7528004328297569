/**
 * Driver
 *
 * Turns one expression into exactly one line of output plus an exit code.
 * Kept free of console and process access so the CLI and REPL share it.
 */

import { parse } from './parser/index.js';
import { evaluate } from './utils/evaluation.js';
import { astToJSON } from './utils/ast/serialize.js';
import { formatCalcError, serializeCalcError } from './types/errors.js';
import type { CalcError } from './types/errors.js';
import type { CliOptions } from './types/options.js';

export interface Outcome {
    stream: 'stdout' | 'stderr';
    line: string;
    exitCode: 0 | 1;
}

export interface ParsedArgs {
    command: 'evaluate' | 'repl' | 'help' | 'version';
    expression: string;
    options: CliOptions;
}

const FLAG = /^--?[a-z]/i;

/**
 * Split argv into flags and expression words. `--` ends flag parsing,
 * and a bare '-' or a word such as '-5' is part of the expression.
 */
export function parseCliArgs(args: readonly string[]): ParsedArgs | { error: string } {
    const options: CliOptions = {};
    const words: string[] = [];
    let command: ParsedArgs['command'] = 'evaluate';
    let flagsDone = false;

    for (const arg of args) {
        if (!flagsDone && arg === '--') {
            flagsDone = true;
            continue;
        }
        if (flagsDone || !FLAG.test(arg)) {
            words.push(arg);
            continue;
        }
        switch (arg) {
            case '--strict':
            case '-s':
                options.strict = true;
                break;
            case '--json':
                options.format = 'json';
                break;
            case '--ast':
                options.ast = true;
                break;
            case '--help':
            case '-h':
                command = 'help';
                break;
            case '--version':
            case '-v':
                if (command !== 'help') command = 'version';
                break;
            default:
                return { error: `Unknown option '${arg}'` };
        }
    }

    if (command === 'evaluate' && words.length === 1 && words[0] === 'repl') {
        command = 'repl';
        words.length = 0;
    }

    return { command, expression: words.join(' '), options };
}

function failure(error: CalcError, options: CliOptions): Outcome {
    if (options.format === 'json') {
        return { stream: 'stdout', line: JSON.stringify({ error: serializeCalcError(error) }), exitCode: 1 };
    }
    return { stream: 'stderr', line: formatCalcError(error), exitCode: 1 };
}

/**
 * Parse and evaluate one expression, or print its tree when `ast` is set
 */
export function runExpression(input: string, options: CliOptions = {}): Outcome {
    const tree = parse(input, { strict: options.strict });
    if (!tree.ok) return failure(tree.error, options);

    if (options.ast) {
        return { stream: 'stdout', line: JSON.stringify(astToJSON(tree.value)), exitCode: 0 };
    }

    const result = evaluate(tree.value);
    if (!result.ok) return failure(result.error, options);

    const value = result.value.toString();
    const line = options.format === 'json' ? JSON.stringify({ result: value }) : value;
    return { stream: 'stdout', line, exitCode: 0 };
}
