/**
 * Parser Types
 */

export type TokenType =
    | 'LOGICAL'         // and, or, xor (any case)
    | 'RELATIONAL'      // <, <=, >, >=, ==, !=, /=, =
    | 'ADDITIVE'        // +, -
    | 'MULTIPLICATIVE'  // *, /
    | 'INTEGER'         // 0-9 runs
    | 'LPAREN'          // (
    | 'RPAREN'          // )
    | 'EOF';

export interface Token {
    readonly type: TokenType;
    readonly value: string;
    readonly position: number;
}
