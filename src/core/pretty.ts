// ─────────────────────────────────────────────────────────────
// Equata  ·  Tree Describer
// S-expression view of a tree, for logs, notices and tests
// ─────────────────────────────────────────────────────────────

import type { ExprNode } from './ast';

export function describeTree(node: ExprNode): string {
    switch (node.kind) {
        case 'Literal': return node.text;
        case 'Variable': return node.name;
        case 'Operator': return `'${node.symbol}'`;
        case 'Placeholder': return '□';

        case 'TextRun':
            return `(${node.command} ${JSON.stringify(node.text)})`;

        case 'Fraction':
            return `(${node.command} ${describeTree(node.numerator)} ${describeTree(node.denominator)})`;

        case 'Root':
            return node.index
                ? `(root[${describeTree(node.index)}] ${describeTree(node.radicand)})`
                : `(root ${describeTree(node.radicand)})`;

        case 'Power':
            return `(^ ${describeTree(node.base)} ${describeTree(node.exponent)})`;

        case 'Subscript':
            return `(_ ${describeTree(node.base)} ${describeTree(node.subscript)})`;

        case 'Function':
            return node.args.length === 0
                ? `(\\${node.name})`
                : `(\\${node.name} ${node.args.map(describeTree).join(' ')})`;

        case 'Integral':
        case 'Sum':
        case 'Product':
        case 'Limit': {
            const limits = [
                node.lower ? `_${describeTree(node.lower)}` : '',
                node.upper ? `^${describeTree(node.upper)}` : '',
            ].join('');
            return `(${node.kind}${limits} ${describeTree(node.body)})`;
        }

        case 'Matrix':
            return `(${node.environment} ${node.rows.map(row => `[${row.map(describeTree).join(' ')}]`).join(' ')})`;

        case 'FormatWrapper':
            return node.attribute !== null
                ? `(${node.command}:${node.attribute} ${describeTree(node.body)})`
                : `(${node.command} ${describeTree(node.body)})`;

        case 'Sequence':
            return `[${node.items.map(describeTree).join(' ')}]`;
    }
}
