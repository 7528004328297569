/**
 * Tokenizer tests
 */

import { Tokenizer } from '../src/parser/index.js';
import type { Token } from '../src/types/index.js';

function tokens(input: string, strict = false): Token[] {
    const result = new Tokenizer(input, { strict }).tokenize();
    if (!result.ok) throw new Error(result.error.message);
    return result.value;
}

describe('Tokenizer', () => {
    test('records type, value and position of each token', () => {
        expect(tokens('1 + 2')).toEqual([
            { type: 'INTEGER', value: '1', position: 0 },
            { type: 'ADDITIVE', value: '+', position: 2 },
            { type: 'INTEGER', value: '2', position: 4 },
            { type: 'EOF', value: '', position: 5 },
        ]);
    });

    test('matches logical keywords in any case', () => {
        const logical = tokens('1 AND 2 Or 3 xOr 4').filter(t => t.type === 'LOGICAL');
        expect(logical.map(t => t.value)).toEqual(['AND', 'Or', 'xOr']);
    });

    test('prefers two-character relational operators', () => {
        const result = tokens('<= >= == != /= < > =');
        expect(result.map(t => t.value)).toEqual(['<=', '>=', '==', '!=', '/=', '<', '>', '=', '']);
        expect(result.slice(0, -1).every(t => t.type === 'RELATIONAL')).toBe(true);
    });

    test('reads /= as one relational token rather than a division', () => {
        expect(tokens('4/=2').map(t => t.type)).toEqual(['INTEGER', 'RELATIONAL', 'INTEGER', 'EOF']);
    });

    test('splits arithmetic operators into additive and multiplicative', () => {
        expect(tokens('1+2-3*4/5').map(t => t.type)).toEqual([
            'INTEGER', 'ADDITIVE', 'INTEGER', 'ADDITIVE', 'INTEGER',
            'MULTIPLICATIVE', 'INTEGER', 'MULTIPLICATIVE', 'INTEGER', 'EOF',
        ]);
    });

    test('takes maximal digit runs', () => {
        expect(tokens('12345(678)').map(t => t.value)).toEqual(['12345', '(', '678', ')', '']);
    });

    test('skips unrecognized characters by default', () => {
        expect(tokens('1@@+2').map(t => t.value)).toEqual(['1', '+', '2', '']);
    });

    describe('strict mode', () => {
        test('accepts whitespace between tokens', () => {
            expect(tokens('  1 +\t2\n', true).map(t => t.value)).toEqual(['1', '+', '2', '']);
        });

        test('rejects an embedded unrecognized character', () => {
            const result = new Tokenizer('1 @@ + 2', { strict: true }).tokenize();
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.code).toBe('LEX_ERROR');
                expect(result.error.message).toBe("Unexpected character '@'");
                expect(result.error.span?.start).toBe(2);
            }
        });

        test('rejects trailing garbage', () => {
            const result = new Tokenizer('1 + 2 #', { strict: true }).tokenize();
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.message).toBe("Unexpected character '#'");
                expect(result.error.span?.start).toBe(6);
            }
        });
    });

    describe('no tokens', () => {
        test.each(['', '   ', '@#$'])('fails on %j', (input) => {
            const result = new Tokenizer(input).tokenize();
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.code).toBe('LEX_ERROR');
                expect(result.error.message).toBe('No tokens found in input');
            }
        });
    });
});
