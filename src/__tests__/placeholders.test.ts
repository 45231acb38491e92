// ─────────────────────────────────────────────────────────────
// Equata  ·  Placeholder Navigation Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import {
    enumeratePlaceholders, nextPlaceholder, previousPlaceholder, fillPlaceholder, PlaceholderNavigator,
} from '../engine/placeholders';
import { parseMarkup } from '../parser/builder';
import { mk, type ExprNode, type Path } from '../core/ast';
import { structuralDepth } from '../core/tree';

const limits = { maxNestingDepth: 50 };

function slotsOf(markup: string): Path[] {
    return enumeratePlaceholders(parseMarkup(markup).tree);
}

describe('enumeratePlaceholders', () => {
    it('lists slots depth-first, left to right', () => {
        expect(slotsOf('\\frac{}{}')).toEqual([[0], [1]]);
        expect(slotsOf('\\int_{}^{}{}')).toEqual([[0], [1], [2]]);
        expect(slotsOf('\\frac{\\sqrt{}}{}')).toEqual([[0, 0], [1]]);
        expect(slotsOf('\\begin{pmatrix} & \\\\ & \\end{pmatrix}')).toEqual([[0], [1], [2], [3]]);
    });

    it('treats an empty root as one slot', () => {
        expect(enumeratePlaceholders(mk.placeholder())).toEqual([[]]);
    });

    it('finds nothing in a complete formula', () => {
        expect(slotsOf('x+1')).toEqual([]);
    });
});

describe('nextPlaceholder / previousPlaceholder', () => {
    const paths = [[0], [1]];

    it('wraps around in both directions', () => {
        expect(nextPlaceholder(paths, [1])).toEqual([0]);
        expect(previousPlaceholder(paths, [0])).toEqual([1]);
    });

    it('starts from the ends when there is no current slot', () => {
        expect(nextPlaceholder(paths, null)).toEqual([0]);
        expect(previousPlaceholder(paths, null)).toEqual([1]);
        expect(previousPlaceholder(paths, [9])).toEqual([1]);
    });

    it('leaves the cursor alone when there are no slots', () => {
        expect(nextPlaceholder([], null)).toBeNull();
        expect(nextPlaceholder([], [0])).toEqual([0]);
        expect(previousPlaceholder([], [0])).toEqual([0]);
    });

    it('visits every slot exactly once per cycle', () => {
        const all = slotsOf('\\begin{pmatrix} & \\\\ & \\end{pmatrix}');
        for (const start of all) {
            const seen: Path[] = [];
            let current: Path | null = start;
            for (let i = 0; i < all.length; i++) {
                current = nextPlaceholder(all, current);
                if (current) seen.push(current);
            }
            expect(current).toEqual(start);
            expect([...seen].sort()).toEqual([...all].sort());
        }
    });
});

describe('fillPlaceholder', () => {
    const empty = mk.frac(mk.placeholder(), mk.placeholder());

    it('returns a new tree and leaves the input untouched', () => {
        const result = fillPlaceholder(empty, [0], mk.literal('x'), limits);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value).toEqual(mk.frac(mk.literal('x'), mk.placeholder()));
        expect(empty).toEqual(mk.frac(mk.placeholder(), mk.placeholder()));
        expect(result.value.kind === 'Fraction' && result.value.denominator).toBe(empty.denominator);
    });

    it('fills an empty root', () => {
        expect(fillPlaceholder(mk.placeholder(), [], empty, limits)).toEqual({ ok: true, value: empty });
    });

    it('refuses filled slots and missing paths', () => {
        const filled = mk.frac(mk.literal('x'), mk.placeholder());
        expect(fillPlaceholder(filled, [0], mk.literal('y'), limits)).toEqual({
            ok: false, error: { code: 'NotAPlaceholder', path: [0] },
        });
        expect(fillPlaceholder(filled, [5], mk.literal('y'), limits)).toEqual({
            ok: false, error: { code: 'InvalidPath', path: [5] },
        });
    });

    it('refuses a fill that would exceed the depth limit', () => {
        let tree: ExprNode = mk.frac(mk.placeholder(), mk.literal('1'));
        for (let i = 0; i < 49; i++) tree = mk.frac(tree, mk.literal('1'));
        expect(structuralDepth(tree)).toBe(50);

        const slot = Array.from({ length: 50 }, () => 0);
        expect(fillPlaceholder(tree, slot, mk.frac(mk.literal('a'), mk.literal('b')), limits)).toEqual({
            ok: false, error: { code: 'TooDeep', depth: 51, limit: 50 },
        });

        const flat = fillPlaceholder(tree, slot, mk.literal('a'), limits);
        expect(flat.ok && structuralDepth(flat.value)).toBe(50);
    });
});

describe('PlaceholderNavigator', () => {
    const nav = new PlaceholderNavigator(parseMarkup('\\frac{\\sqrt{}}{} + \\sqrt{}').tree);

    it('counts and orders slots', () => {
        expect(nav.count).toBe(3);
        expect(nav.first()).toEqual([0, 0, 0]);
        expect(nav.next([0, 0, 0])).toEqual([0, 1]);
        expect(nav.previous([0, 0, 0])).toEqual([2, 0]);
    });

    it('finds the first slot under a prefix', () => {
        expect(nav.firstWithin([0])).toEqual([0, 0, 0]);
        expect(nav.firstWithin([2])).toEqual([2, 0]);
        expect(nav.firstWithin([1])).toBeNull();
        expect(nav.firstWithin([])).toEqual([0, 0, 0]);
    });
});
