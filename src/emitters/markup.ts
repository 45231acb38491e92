// ─────────────────────────────────────────────────────────────
// Equata  ·  Expression Tree → Markup
// Canonical output: every argument braced, no redundant groups.
// parseMarkup(serialize(t)) rebuilds a tree equal to t.
// ─────────────────────────────────────────────────────────────

import type { ExprNode, MatrixNode } from '../core/ast';
import { COLOR_SWITCHES } from '../parser/commands';

export function serialize(node: ExprNode): string {
    return inner(node);
}

// ── Contexts ────────────────────────────────────────────────

/** Contents of a slot that is already delimited (argument, cell, top level). */
function inner(node: ExprNode): string {
    switch (node.kind) {
        case 'Placeholder': return '';
        case 'Sequence': return joinItems(node.items);
        default: return emit(node);
    }
}

function braced(node: ExprNode): string {
    return `{${inner(node)}}`;
}

/** A node standing as one item among siblings. */
function item(node: ExprNode): string {
    switch (node.kind) {
        case 'Placeholder': return '{}';
        case 'Sequence': return braced(node);
        default: return emit(node);
    }
}

const ENDS_WITH_COMMAND = /\\[a-zA-Z]+$/;
const STARTS_WITH_LETTER = /^[a-zA-Z]/;
const ENDS_NUMERIC = /[0-9.]$/;
const STARTS_WITH_DIGIT = /^[0-9]/;

function joinItems(items: ExprNode[]): string {
    const pieces = items.map(item);

    // A bare command would take the following group as its argument
    for (let i = 0; i + 1 < items.length; i++) {
        if (items[i].kind === 'Function' && pieces[i + 1].startsWith('{')) {
            pieces[i] = `{${pieces[i]}}`;
        }
    }

    let out = '';
    for (let piece of pieces) {
        // `1` then `2` would rescan as the number `12`
        if (STARTS_WITH_DIGIT.test(piece) && ENDS_NUMERIC.test(out)) piece = `{${piece}}`;
        if (ENDS_WITH_COMMAND.test(out) && STARTS_WITH_LETTER.test(piece)) out += ' ';
        out += piece;
    }
    return out;
}

// ── Nodes ───────────────────────────────────────────────────

function emit(node: ExprNode): string {
    switch (node.kind) {
        case 'Literal': return node.text;
        case 'Variable': return node.name;
        case 'Operator': return node.symbol;
        case 'Placeholder': return '{}';
        case 'Sequence': return joinItems(node.items);

        case 'TextRun':
            return `\\${node.command}{${node.text}}`;

        case 'Fraction':
            return `\\${node.command}${braced(node.numerator)}${braced(node.denominator)}`;

        case 'Root': {
            if (!node.index) return `\\sqrt${braced(node.radicand)}`;
            const index = inner(node.index);
            // `]` inside the index would close the option early
            const option = index.includes(']') ? `{${index}}` : index;
            return `\\sqrt[${option}]${braced(node.radicand)}`;
        }

        case 'Power':
            return `${base(node.base)}^${braced(node.exponent)}`;

        case 'Subscript':
            return `${base(node.base)}_${braced(node.subscript)}`;

        case 'Function':
            return `\\${node.name}${node.args.map(braced).join('')}`;

        case 'Integral':
        case 'Sum':
        case 'Product':
        case 'Limit': {
            let out = `\\${node.command}`;
            if (node.lower) out += `_${braced(node.lower)}`;
            if (node.upper) out += `^${braced(node.upper)}`;
            return out + braced(node.body);
        }

        case 'Matrix':
            return emitMatrix(node);

        case 'FormatWrapper':
            switch (node.format) {
                case 'style': return `\\${node.command}${braced(node.body)}`;
                case 'color':
                    if (COLOR_SWITCHES.has(node.command)) return `{\\${node.command}{${node.attribute ?? ''}}${inner(node.body)}}`;
                    return `\\${node.command}{${node.attribute ?? ''}}${braced(node.body)}`;
                case 'size': return `{\\${node.command} ${inner(node.body)}}`;
            }
    }
}

function base(node: ExprNode): string {
    return node.kind === 'Sequence' || node.kind === 'Placeholder' ? braced(node) : emit(node);
}

function emitMatrix(node: MatrixNode): string {
    const last = node.rows.length - 1;
    let firstCell = '';

    const rows = node.rows.map((row, r) => {
        // A lone empty cell in the final row needs a mark, or the row is dropped on reparse
        if (r === last && last > 0 && row.length === 1 && row[0].kind === 'Placeholder') return '{}';
        const cells = row.map(cell);
        // `\\[` reads as row spacing
        if (r > 0 && cells[0]?.startsWith('[')) cells[0] = `{${cells[0]}}`;
        if (r === 0) firstCell = cells[0] ?? '';
        return cells.join(' & ');
    });

    let columns = node.columns !== null ? `{${node.columns}}` : '';
    // Otherwise a leading group in the first cell is read as the column spec
    if (node.environment === 'array' && node.columns === null && firstCell.startsWith('{')) columns = '{}';

    return `\\begin{${node.environment}}${columns}${rows.join(' \\\\ ')}\\end{${node.environment}}`;
}

/** Cell separators inside a cell only survive inside braces. */
function cell(node: ExprNode): string {
    const separator = (n: ExprNode): boolean => n.kind === 'Operator' && (n.symbol === '&' || n.symbol === '\\\\');
    const exposed = node.kind === 'Sequence' ? node.items.some(separator) : separator(node);
    return exposed ? braced(node) : inner(node);
}
