// ─────────────────────────────────────────────────────────────
// Equata  ·  Expression Tree
// Closed tagged union over every node kind the engine knows
// ─────────────────────────────────────────────────────────────

export type ExprNode =
    | LiteralNode
    | VariableNode
    | OperatorNode
    | FractionNode
    | RootNode
    | PowerNode
    | SubscriptNode
    | FunctionNode
    | IntegralNode
    | SumNode
    | ProductNode
    | LimitNode
    | MatrixNode
    | TextRunNode
    | FormatWrapperNode
    | SequenceNode
    | PlaceholderNode;

export type NodeKind = ExprNode['kind'];

// ── Leaves ──────────────────────────────────────────────────

/** A number run (`42`, `3.14`) or a single ordinary letter. */
export interface LiteralNode {
    kind: 'Literal';
    text: string;
}

/** A named symbol such as `\alpha` or `\infty`. */
export interface VariableNode {
    kind: 'Variable';
    name: string;
}

export interface OperatorNode {
    kind: 'Operator';
    symbol: string;
}

export interface PlaceholderNode {
    kind: 'Placeholder';
}

export interface TextRunNode {
    kind: 'TextRun';
    command: string;
    text: string;
}

// ── Structures ──────────────────────────────────────────────

export interface FractionNode {
    kind: 'Fraction';
    command: string;
    numerator: ExprNode;
    denominator: ExprNode;
}

export interface RootNode {
    kind: 'Root';
    radicand: ExprNode;
    index: ExprNode | null;
}

export interface PowerNode {
    kind: 'Power';
    base: ExprNode;
    exponent: ExprNode;
}

export interface SubscriptNode {
    kind: 'Subscript';
    base: ExprNode;
    subscript: ExprNode;
}

export interface FunctionNode {
    kind: 'Function';
    name: string;
    args: ExprNode[];
}

interface BigOperatorFields {
    command: string;
    lower: ExprNode | null;
    upper: ExprNode | null;
    body: ExprNode;
}

export interface IntegralNode extends BigOperatorFields {
    kind: 'Integral';
}

export interface SumNode extends BigOperatorFields {
    kind: 'Sum';
}

export interface ProductNode extends BigOperatorFields {
    kind: 'Product';
}

export interface LimitNode extends BigOperatorFields {
    kind: 'Limit';
}

export type BigOperatorNode = IntegralNode | SumNode | ProductNode | LimitNode;
export type BigOperatorKind = BigOperatorNode['kind'];

export interface MatrixNode {
    kind: 'Matrix';
    environment: string;
    /** Column spec of `array`-like environments, e.g. `cc|c`. */
    columns: string | null;
    rows: ExprNode[][];
}

export type FormatKind = 'style' | 'color' | 'size';

export interface FormatWrapperNode {
    kind: 'FormatWrapper';
    format: FormatKind;
    command: string;
    /** Colour name or code for `color` wrappers, null otherwise. */
    attribute: string | null;
    body: ExprNode;
}

export interface SequenceNode {
    kind: 'Sequence';
    items: ExprNode[];
}

// ── Paths ───────────────────────────────────────────────────

/** Child indices from the root down to a node. */
export type Path = readonly number[];

// ── Smart constructors ──────────────────────────────────────

export const mk = {
    literal: (text: string): LiteralNode => ({ kind: 'Literal', text }),
    variable: (name: string): VariableNode => ({ kind: 'Variable', name }),
    operator: (symbol: string): OperatorNode => ({ kind: 'Operator', symbol }),
    placeholder: (): PlaceholderNode => ({ kind: 'Placeholder' }),
    text: (text: string, command: string = 'text'): TextRunNode => ({ kind: 'TextRun', command, text }),
    frac: (numerator: ExprNode, denominator: ExprNode, command: string = 'frac'): FractionNode =>
        ({ kind: 'Fraction', command, numerator, denominator }),
    root: (radicand: ExprNode, index: ExprNode | null = null): RootNode => ({ kind: 'Root', radicand, index }),
    power: (base: ExprNode, exponent: ExprNode): PowerNode => ({ kind: 'Power', base, exponent }),
    sub: (base: ExprNode, subscript: ExprNode): SubscriptNode => ({ kind: 'Subscript', base, subscript }),
    fn: (name: string, args: ExprNode[] = []): FunctionNode => ({ kind: 'Function', name, args }),
    bigOp: (
        kind: BigOperatorKind, command: string, body: ExprNode,
        lower: ExprNode | null = null, upper: ExprNode | null = null,
    ): BigOperatorNode => ({ kind, command, lower, upper, body }),
    matrix: (rows: ExprNode[][], environment: string = 'matrix', columns: string | null = null): MatrixNode =>
        ({ kind: 'Matrix', environment, columns, rows }),
    format: (format: FormatKind, command: string, body: ExprNode, attribute: string | null = null): FormatWrapperNode =>
        ({ kind: 'FormatWrapper', format, command, attribute, body }),
    seq: (items: ExprNode[]): SequenceNode => ({ kind: 'Sequence', items }),
};

/**
 * Collapse a list of sibling items into one node: nothing becomes an
 * empty slot, a single item stands alone.
 */
export function wrapItems(items: ExprNode[]): ExprNode {
    if (items.length === 0) return mk.placeholder();
    if (items.length === 1) return items[0];
    return mk.seq(items);
}
