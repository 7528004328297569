/**
 * Expression Tree Types
 */

export const LOGICAL_OPERATORS = ['and', 'or', 'xor'] as const;
export const RELATIONAL_OPERATORS = ['<', '<=', '>', '>=', '==', '!=', '/='] as const;
export const ADDITIVE_OPERATORS = ['+', '-'] as const;
export const MULTIPLICATIVE_OPERATORS = ['*', '/'] as const;

export type LogicalOperator = typeof LOGICAL_OPERATORS[number];
export type RelationalOperator = typeof RELATIONAL_OPERATORS[number];
export type AdditiveOperator = typeof ADDITIVE_OPERATORS[number];
export type MultiplicativeOperator = typeof MULTIPLICATIVE_OPERATORS[number];

export type ExpressionType =
    | 'logical'
    | 'relational'
    | 'additive'
    | 'multiplicative'
    | 'literal'
    | 'parenthesized';

interface BinaryNode<T extends ExpressionType, Op extends string> {
    readonly type: T;
    readonly op: Op;
    readonly left: Expression;
    readonly right: Expression;
}

export type LogicalNode = BinaryNode<'logical', LogicalOperator>;
export type RelationalNode = BinaryNode<'relational', RelationalOperator>;
export type AdditiveNode = BinaryNode<'additive', AdditiveOperator>;
export type MultiplicativeNode = BinaryNode<'multiplicative', MultiplicativeOperator>;

export interface LiteralNode {
    readonly type: 'literal';
    readonly value: bigint;
}

export interface ParenthesizedNode {
    readonly type: 'parenthesized';
    readonly inner: Expression;
}

export type BinaryExpression =
    | LogicalNode
    | RelationalNode
    | AdditiveNode
    | MultiplicativeNode;

export type Expression =
    | BinaryExpression
    | LiteralNode
    | ParenthesizedNode;

/** Logical keywords are matched case-insensitively; pass the lower-cased spelling. */
export function isLogicalOperator(value: string): value is LogicalOperator {
    return LOGICAL_OPERATORS.some(op => op === value);
}

export function isRelationalOperator(value: string): value is RelationalOperator {
    return RELATIONAL_OPERATORS.some(op => op === value);
}

export function isAdditiveOperator(value: string): value is AdditiveOperator {
    return ADDITIVE_OPERATORS.some(op => op === value);
}

export function isMultiplicativeOperator(value: string): value is MultiplicativeOperator {
    return MULTIPLICATIVE_OPERATORS.some(op => op === value);
}
