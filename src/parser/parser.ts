import type { Expression } from '../types/ast.js';
import {
    isAdditiveOperator,
    isLogicalOperator,
    isMultiplicativeOperator,
    isRelationalOperator,
} from '../types/ast.js';
import type { Token, TokenType } from '../types/parser.js';
import { createSyntaxError } from '../types/errors.js';
import { fail, ok } from '../types/result.js';
import type { Result } from '../types/result.js';

const INT64_MAX = (1n << 63n) - 1n;

/**
 * Parser for integer expressions
 *
 * Grammar (lowest to highest precedence, all levels left-associative):
 *   logical  = relation (('and' | 'or' | 'xor') relation)*
 *   relation = term (('<' | '<=' | '>' | '>=' | '==' | '!=' | '/=') term)*
 *   term     = factor (('+' | '-') factor)*
 *   factor   = primary (('*' | '/') primary)*
 *   primary  = INTEGER | '(' logical ')'
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    parse(): Result<Expression> {
        const result = this.parseLogical();
        if (!result.ok) return result;

        if (this.current().type !== 'EOF') {
            return this.unexpected(`Unexpected token '${this.current().value}'`);
        }
        return result;
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        if (token.type !== 'EOF') this.pos++;
        return token;
    }

    /**
     * Consume the current token if it has the given type and a spelling the guard accepts
     */
    private matchOperator<Op extends string>(
        type: TokenType,
        guard: (value: string) => value is Op
    ): Op | undefined {
        const token = this.current();
        if (token.type !== type) return undefined;

        const spelling = type === 'LOGICAL' ? token.value.toLowerCase() : token.value;
        if (!guard(spelling)) return undefined;

        this.advance();
        return spelling;
    }

    private unexpected(message: string): Result<never> {
        const token = this.current();
        return fail(createSyntaxError(message, this.originalInput, token.position, token.value.length));
    }

    private parseLogical(): Result<Expression> {
        const first = this.parseRelation();
        if (!first.ok) return first;
        let left = first.value;

        for (;;) {
            const op = this.matchOperator('LOGICAL', isLogicalOperator);
            if (op === undefined) break;
            const right = this.parseRelation();
            if (!right.ok) return right;
            left = { type: 'logical', op, left, right: right.value };
        }

        return ok(left);
    }

    private parseRelation(): Result<Expression> {
        const first = this.parseTerm();
        if (!first.ok) return first;
        let left = first.value;

        for (;;) {
            const op = this.matchOperator('RELATIONAL', isRelationalOperator);
            if (op === undefined) break;
            const right = this.parseTerm();
            if (!right.ok) return right;
            left = { type: 'relational', op, left, right: right.value };
        }

        return ok(left);
    }

    private parseTerm(): Result<Expression> {
        const first = this.parseFactor();
        if (!first.ok) return first;
        let left = first.value;

        for (;;) {
            const op = this.matchOperator('ADDITIVE', isAdditiveOperator);
            if (op === undefined) break;
            const right = this.parseFactor();
            if (!right.ok) return right;
            left = { type: 'additive', op, left, right: right.value };
        }

        return ok(left);
    }

    private parseFactor(): Result<Expression> {
        const first = this.parsePrimary();
        if (!first.ok) return first;
        let left = first.value;

        for (;;) {
            const op = this.matchOperator('MULTIPLICATIVE', isMultiplicativeOperator);
            if (op === undefined) break;
            const right = this.parsePrimary();
            if (!right.ok) return right;
            left = { type: 'multiplicative', op, left, right: right.value };
        }

        return ok(left);
    }

    private parsePrimary(): Result<Expression> {
        const token = this.current();

        if (token.type === 'INTEGER') {
            const value = BigInt(token.value);
            if (value > INT64_MAX) {
                return this.unexpected(`Integer literal out of range: ${token.value}`);
            }
            this.advance();
            return ok<Expression>({ type: 'literal', value });
        }

        if (token.type === 'LPAREN') {
            this.advance();
            const inner = this.parseLogical();
            if (!inner.ok) return inner;

            const closing = this.current();
            if (closing.type === 'EOF') {
                return this.unexpected("Unterminated parenthesis: expected ')'");
            }
            if (closing.type !== 'RPAREN') {
                return this.unexpected(`Expected ')' but got '${closing.value}'`);
            }
            this.advance();
            return ok<Expression>({ type: 'parenthesized', inner: inner.value });
        }

        const found = token.type === 'EOF' ? 'end of input' : `'${token.value}'`;
        return this.unexpected(`Expected integer or '(' but got ${found}`);
    }
}
