// ─────────────────────────────────────────────────────────────
// Equata  ·  Markup Serializer Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { serialize } from '../emitters/markup';
import { parseMarkup } from '../parser/builder';
import { mk } from '../core/ast';
import { treesEqual } from '../core/tree';

const a = mk.literal('a');
const b = mk.literal('b');
const x = mk.literal('x');

describe('serialize', () => {
    it('writes a fraction with braced arguments', () => {
        expect(serialize(mk.frac(a, b))).toBe('\\frac{a}{b}');
    });

    it('writes empty slots as empty groups', () => {
        expect(serialize(mk.placeholder())).toBe('');
        expect(serialize(mk.frac(mk.placeholder(), mk.placeholder()))).toBe('\\frac{}{}');
        expect(serialize(mk.seq([a, mk.placeholder()]))).toBe('a{}');
    });

    it('braces a number that follows a number', () => {
        expect(serialize(mk.seq([mk.literal('1'), mk.literal('2')]))).toBe('1{2}');
    });

    it('separates a command from a following letter', () => {
        expect(serialize(mk.seq([mk.variable('\\alpha'), x]))).toBe('\\alpha x');
        expect(serialize(mk.seq([mk.operator('\\to'), mk.literal('0')]))).toBe('\\to0');
    });

    it('braces a bare function that precedes a group', () => {
        expect(serialize(mk.seq([mk.fn('foo'), mk.seq([a, b])]))).toBe('{\\foo}{ab}');
    });

    it('braces compound script bases', () => {
        expect(serialize(mk.power(mk.seq([a, b]), mk.literal('2')))).toBe('{ab}^{2}');
        expect(serialize(mk.sub(mk.placeholder(), mk.placeholder()))).toBe('{}_{}');
    });

    it('writes big operators with braced limits and body', () => {
        const integral = mk.bigOp('Integral', 'int', mk.seq([x, mk.operator('\\,'), mk.literal('d'), x]), mk.literal('0'), mk.literal('1'));
        expect(serialize(mk.seq([integral, mk.operator('='), mk.literal('1')]))).toBe('\\int_{0}^{1}{x\\,dx}=1');
    });

    it('writes format wrappers', () => {
        expect(serialize(mk.format('color', 'textcolor', x, 'red'))).toBe('\\textcolor{red}{x}');
        expect(serialize(mk.format('size', 'large', mk.seq([x, mk.operator('+'), mk.literal('1')])))).toBe('{\\large x+1}');
        expect(serialize(mk.format('color', 'color', mk.seq([x, mk.literal('y')]), 'red'))).toBe('{\\color{red}xy}');
    });

    it('braces a root index containing ]', () => {
        expect(serialize(mk.root(x, mk.operator(']')))).toBe('\\sqrt[{]}]{x}');
    });

    it('writes matrices row by row', () => {
        const m = mk.matrix([[a, b], [mk.literal('c'), mk.literal('d')]], 'pmatrix');
        expect(serialize(m)).toBe('\\begin{pmatrix}a & b \\\\ c & d\\end{pmatrix}');
    });

    it('marks an empty last row and a leading bracket', () => {
        expect(serialize(mk.matrix([[a], [mk.placeholder()]]))).toBe('\\begin{matrix}a \\\\ {}\\end{matrix}');
        expect(serialize(mk.matrix([[a], [mk.operator('[')]]))).toBe('\\begin{matrix}a \\\\ {[}\\end{matrix}');
    });

    it('braces a cell that holds separators', () => {
        const cell = mk.seq([a, mk.operator('&'), b]);
        expect(serialize(mk.matrix([[cell, mk.literal('c')]]))).toBe('\\begin{matrix}{a&b} & c\\end{matrix}');
        expect(serialize(mk.matrix([[mk.operator('\\\\')]]))).toBe('\\begin{matrix}{\\\\}\\end{matrix}');
    });

    it('marks an array without columns whose first cell opens a group', () => {
        const m = mk.matrix([[mk.format('size', 'large', x)]], 'array');
        expect(serialize(m)).toBe('\\begin{array}{}{\\large x}\\end{array}');
        expect(serialize(mk.matrix([[x]], 'array'))).toBe('\\begin{array}x\\end{array}');
    });
});

describe('Round trip', () => {
    const fixtures = [
        '\\frac{a}{b}',
        'x^{2}+y_{i}',
        'x^23',
        '1.5x',
        '\\alpha x',
        '\\sqrt[3]{x+1}',
        '\\int_0^1 x\\,dx = 1',
        '\\sum_{i=1}^{n} i^2',
        '\\lim_{x \\to 0} \\frac{\\sin x}{x}',
        '\\begin{pmatrix}a & b\\\\c & d\\end{pmatrix}',
        '\\begin{array}{cc}1 & 2\\end{array}',
        '\\begin{matrix}a\\\\{}\\end{matrix}',
        '\\text{if } x > 0',
        '\\textcolor{red}{x} + \\mathbf{v}',
        '{\\large x} y',
        '\\begin{array} \\large x\\end{array}',
        '\\begin{matrix}{a & b} & c\\end{matrix}',
        '\\color{red}xy',
        'a{\\color{blue} b c} d',
        'a{bc}d',
        '\\foo{x}{y} z',
        '\\left( x \\right)',
        '{}^{}',
        '\\frac{}{}',
    ];

    it.each(fixtures)('reparses %s to the same tree', markup => {
        const first = parseMarkup(markup);
        expect(first.ok).toBe(true);
        const second = parseMarkup(serialize(first.tree));
        expect(second.ok).toBe(true);
        expect(treesEqual(second.tree, first.tree)).toBe(true);
        expect(second.tree).toEqual(first.tree);
    });

    it('is stable after one pass', () => {
        const once = serialize(parseMarkup('\\sum_{i=1}^{n} i^2').tree);
        expect(once).toBe('\\sum_{i=1}^{n}{i^{2}}');
        expect(serialize(parseMarkup(once).tree)).toBe(once);
    });
});
