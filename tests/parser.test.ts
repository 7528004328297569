/**
 * Parser tests: precedence, associativity and error reporting
 */

import { parse, Tokenizer, Parser } from '../src/parser/index.js';
import type { CalcError, Expression } from '../src/types/index.js';

function tree(input: string): Expression {
    const result = parse(input);
    if (!result.ok) throw new Error(result.error.message);
    return result.value;
}

function syntaxError(input: string): CalcError {
    const result = parse(input);
    if (result.ok) throw new Error(`expected '${input}' to fail`);
    return result.error;
}

const lit = (value: bigint): Expression => ({ type: 'literal', value });

describe('Parser', () => {
    test('parses a single literal', () => {
        expect(tree('42')).toEqual(lit(42n));
    });

    test('works on tokens from a Tokenizer', () => {
        const tokens = new Tokenizer('1+2').tokenize();
        if (!tokens.ok) throw new Error(tokens.error.message);
        const result = new Parser(tokens.value, '1+2').parse();
        expect(result).toEqual({
            ok: true,
            value: { type: 'additive', op: '+', left: lit(1n), right: lit(2n) },
        });
    });

    test('binds multiplication tighter than addition', () => {
        expect(tree('2+3*4')).toEqual({
            type: 'additive',
            op: '+',
            left: lit(2n),
            right: { type: 'multiplicative', op: '*', left: lit(3n), right: lit(4n) },
        });
    });

    test('groups same-level operators to the left', () => {
        expect(tree('10-3-2')).toEqual({
            type: 'additive',
            op: '-',
            left: { type: 'additive', op: '-', left: lit(10n), right: lit(3n) },
            right: lit(2n),
        });
    });

    test('keeps parentheses as a node', () => {
        expect(tree('(2+3)*4')).toEqual({
            type: 'multiplicative',
            op: '*',
            left: {
                type: 'parenthesized',
                inner: { type: 'additive', op: '+', left: lit(2n), right: lit(3n) },
            },
            right: lit(4n),
        });
    });

    test('stores logical operators in lower case', () => {
        const node = tree('1 AND 1');
        expect(node.type === 'logical' && node.op).toBe('and');
    });

    test('places logical below relational below additive', () => {
        expect(tree('1 < 2 xor 3 > 2 + 1')).toEqual({
            type: 'logical',
            op: 'xor',
            left: { type: 'relational', op: '<', left: lit(1n), right: lit(2n) },
            right: {
                type: 'relational',
                op: '>',
                left: lit(3n),
                right: { type: 'additive', op: '+', left: lit(2n), right: lit(1n) },
            },
        });
    });

    test('accepts the largest 64-bit literal', () => {
        expect(tree('9223372036854775807')).toEqual(lit(9223372036854775807n));
    });
});

describe('Parser - Error Handling', () => {
    test('reports an unterminated parenthesis at end of input', () => {
        const error = syntaxError('(1+2');
        expect(error.code).toBe('SYNTAX_ERROR');
        expect(error.message).toBe("Unterminated parenthesis: expected ')'");
        expect(error.span?.start).toBe(4);
        expect(error.suggestion).toBe("Unbalanced parentheses - missing closing ')'");
    });

    test('reports a token where the closing parenthesis belongs', () => {
        expect(syntaxError('(1 2)').message).toBe("Expected ')' but got '2'");
    });

    test('reports a trailing operator', () => {
        const error = syntaxError('1 +');
        expect(error.message).toBe("Expected integer or '(' but got end of input");
        expect(error.suggestion).toBe('Incomplete expression - missing right operand after operator');
    });

    test('has no unary minus', () => {
        const error = syntaxError('-5');
        expect(error.message).toBe("Expected integer or '(' but got '-'");
        expect(error.span?.start).toBe(0);
        expect(error.suggestion).toBe("Unary minus is not supported - write '0 - n' instead");
    });

    test('rejects a lone = as a leftover token', () => {
        const error = syntaxError('1 = 1');
        expect(error.message).toBe("Unexpected token '='");
        expect(error.span).toEqual({ start: 2, end: 3, line: 1, col: 3 });
        expect(error.suggestion).toBe("Use '==' to compare for equality");
    });

    test('rejects two operands without an operator', () => {
        expect(syntaxError('1 2').message).toBe("Unexpected token '2'");
    });

    test('rejects a closing parenthesis in operand position', () => {
        expect(syntaxError(')').message).toBe("Expected integer or '(' but got ')'");
    });

    test('rejects literals beyond the 64-bit range', () => {
        expect(syntaxError('9223372036854775808').message)
            .toBe('Integer literal out of range: 9223372036854775808');
    });

    test('passes lexical errors through', () => {
        const result = parse('');
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe('LEX_ERROR');
    });
});
