// ─────────────────────────────────────────────────────────────
// Equata  ·  Tree Traversal & Copy-on-Write Updates
// ─────────────────────────────────────────────────────────────

import type { ExprNode, Path, BigOperatorNode, MatrixNode } from './ast';

// ── Children in path order ──────────────────────────────────

export function childrenOf(node: ExprNode): ExprNode[] {
    switch (node.kind) {
        case 'Literal':
        case 'Variable':
        case 'Operator':
        case 'Placeholder':
        case 'TextRun':
            return [];
        case 'Fraction':
            return [node.numerator, node.denominator];
        case 'Root':
            return node.index ? [node.radicand, node.index] : [node.radicand];
        case 'Power':
            return [node.base, node.exponent];
        case 'Subscript':
            return [node.base, node.subscript];
        case 'Function':
            return node.args;
        case 'Integral':
        case 'Sum':
        case 'Product':
        case 'Limit':
            return [node.lower, node.upper, node.body].filter((n): n is ExprNode => n !== null);
        case 'Matrix':
            return node.rows.flat();
        case 'FormatWrapper':
            return [node.body];
        case 'Sequence':
            return node.items;
    }
}

type BigOperatorSlot = 'lower' | 'upper' | 'body';

function bigOperatorSlots(node: BigOperatorNode): BigOperatorSlot[] {
    const slots: BigOperatorSlot[] = [];
    if (node.lower) slots.push('lower');
    if (node.upper) slots.push('upper');
    slots.push('body');
    return slots;
}

// ── Single-level replacement (returns a new node) ───────────

export function withChild(node: ExprNode, index: number, child: ExprNode): ExprNode | null {
    const count = childrenOf(node).length;
    if (!Number.isInteger(index) || index < 0 || index >= count) return null;

    switch (node.kind) {
        case 'Literal':
        case 'Variable':
        case 'Operator':
        case 'Placeholder':
        case 'TextRun':
            return null;
        case 'Fraction':
            return index === 0 ? { ...node, numerator: child } : { ...node, denominator: child };
        case 'Root':
            return index === 0 ? { ...node, radicand: child } : { ...node, index: child };
        case 'Power':
            return index === 0 ? { ...node, base: child } : { ...node, exponent: child };
        case 'Subscript':
            return index === 0 ? { ...node, base: child } : { ...node, subscript: child };
        case 'Function':
            return { ...node, args: replaced(node.args, index, child) };
        case 'Integral':
        case 'Sum':
        case 'Product':
        case 'Limit': {
            switch (bigOperatorSlots(node)[index]) {
                case 'lower': return { ...node, lower: child };
                case 'upper': return { ...node, upper: child };
                default: return { ...node, body: child };
            }
        }
        case 'Matrix': {
            const cols = node.rows[0]?.length ?? 0;
            const r = Math.floor(index / cols);
            const c = index % cols;
            return { ...node, rows: node.rows.map((row, i) => (i === r ? replaced(row, c, child) : row)) };
        }
        case 'FormatWrapper':
            return { ...node, body: child };
        case 'Sequence':
            return { ...node, items: replaced(node.items, index, child) };
    }
}

function replaced<T>(list: T[], index: number, value: T): T[] {
    return list.map((item, i) => (i === index ? value : item));
}

// ── Path operations ─────────────────────────────────────────

export function nodeAt(root: ExprNode, path: Path): ExprNode | null {
    let current: ExprNode = root;
    for (const index of path) {
        const next: ExprNode | undefined = childrenOf(current)[index];
        if (!next) return null;
        current = next;
    }
    return current;
}

/**
 * Substitute the node at `path`, rebuilding only the ancestors on that
 * path. Every other subtree is shared with the input tree.
 */
export function replaceAt(root: ExprNode, path: Path, replacement: ExprNode): ExprNode | null {
    if (path.length === 0) return replacement;
    const [head, ...rest] = path;
    const child = childrenOf(root)[head];
    if (!child) return null;
    const updated = replaceAt(child, rest, replacement);
    if (!updated) return null;
    return withChild(root, head, updated);
}

export function pathsEqual(a: Path, b: Path): boolean {
    return a.length === b.length && a.every((v, i) => v === b[i]);
}

/** Document order: ancestors sort before their descendants. */
export function comparePaths(a: Path, b: Path): number {
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
        if (a[i] !== b[i]) return a[i] - b[i];
    }
    return a.length - b.length;
}

// ── Metrics ─────────────────────────────────────────────────

/**
 * Maximum number of structural ancestors on any root-to-leaf path.
 * Sequences and leaves never count.
 */
export function structuralDepth(node: ExprNode): number {
    const children = childrenOf(node);
    let deepest = 0;
    for (const child of children) {
        deepest = Math.max(deepest, structuralDepth(child));
    }
    return isStructural(node) ? deepest + 1 : deepest;
}

export function isStructural(node: ExprNode): boolean {
    switch (node.kind) {
        case 'Sequence':
        case 'Literal':
        case 'Variable':
        case 'Operator':
        case 'Placeholder':
        case 'TextRun':
            return false;
        case 'Function':
            return node.args.length > 0;
        default:
            return true;
    }
}

export function countNodes(node: ExprNode): number {
    return childrenOf(node).reduce((sum, child) => sum + countNodes(child), 1);
}

/** Every Matrix node in the tree, outermost first. */
export function collectMatrices(node: ExprNode): MatrixNode[] {
    const found: MatrixNode[] = [];
    const visit = (n: ExprNode): void => {
        if (n.kind === 'Matrix') found.push(n);
        childrenOf(n).forEach(visit);
    };
    visit(node);
    return found;
}

// ── Structural equality ─────────────────────────────────────

export function treesEqual(a: ExprNode, b: ExprNode): boolean {
    if (a.kind !== b.kind) return false;
    if (payloadKey(a) !== payloadKey(b)) return false;
    const ca = childrenOf(a);
    const cb = childrenOf(b);
    if (ca.length !== cb.length) return false;
    return ca.every((child, i) => treesEqual(child, cb[i]));
}

function payloadKey(node: ExprNode): string {
    switch (node.kind) {
        case 'Literal': return node.text;
        case 'Variable': return node.name;
        case 'Operator': return node.symbol;
        case 'TextRun': return `${node.command}|${node.text}`;
        case 'Fraction': return node.command;
        case 'Root': return node.index ? 'indexed' : 'plain';
        case 'Function': return node.name;
        case 'Integral':
        case 'Sum':
        case 'Product':
        case 'Limit':
            return `${node.command}|${node.lower ? 'l' : ''}${node.upper ? 'u' : ''}`;
        case 'Matrix':
            return `${node.environment}|${node.columns ?? ''}|${node.rows.length}x${node.rows[0]?.length ?? 0}`;
        case 'FormatWrapper': return `${node.format}|${node.command}|${node.attribute ?? ''}`;
        case 'Power':
        case 'Subscript':
        case 'Sequence':
        case 'Placeholder':
            return '';
    }
}
