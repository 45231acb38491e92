// ─────────────────────────────────────────────────────────────
// Equata  ·  Scanner Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { scan, commandNames } from '../parser/scanner';

const types = (markup: string) => scan(markup).map(t => t.type);

describe('scan', () => {
    it('splits a fraction into command, groups and literals', () => {
        expect(scan('\\frac{a}{b}')).toEqual([
            { type: 'Command', text: 'frac', position: 0 },
            { type: 'OpenGroup', text: '{', position: 5 },
            { type: 'Literal', text: 'a', position: 6 },
            { type: 'CloseGroup', text: '}', position: 7 },
            { type: 'OpenGroup', text: '{', position: 8 },
            { type: 'Literal', text: 'b', position: 9 },
            { type: 'CloseGroup', text: '}', position: 10 },
        ]);
    });

    it('recognises script markers', () => {
        expect(types('x^2_i')).toEqual(['Literal', 'SuperscriptMarker', 'Literal', 'SubscriptMarker', 'Literal']);
    });

    it('keeps runs of ordinary characters together', () => {
        expect(scan('a+b=12')).toEqual([{ type: 'Literal', text: 'a+b=12', position: 0 }]);
    });

    it('emits environment delimiters and separators', () => {
        expect(types('\\begin{pmatrix}a&b\\\\c\\end{pmatrix}')).toEqual([
            'EnvironmentBegin', 'Literal', 'ColumnSeparator', 'Literal', 'RowSeparator', 'Literal', 'EnvironmentEnd',
        ]);
        const [begin] = scan('\\begin {bmatrix}');
        expect(begin).toEqual({ type: 'EnvironmentBegin', text: 'bmatrix', position: 0 });
    });

    it('reads \\begin without a name as a plain command', () => {
        expect(scan('\\begin x')[0]).toEqual({ type: 'Command', text: 'begin', position: 0 });
    });

    it('normalises whitespace between the backslash and the name', () => {
        expect(scan('\\ input{f}')[0]).toEqual({ type: 'Command', text: 'input', position: 0 });
    });

    it('normalises a comment between the backslash and the name', () => {
        expect(scan('\\%hidden\ninput')[0]).toEqual({ type: 'Command', text: 'input', position: 0 });
    });

    it('treats a backslash before a symbol as a control symbol', () => {
        expect(scan('\\,')).toEqual([{ type: 'Command', text: ',', position: 0 }]);
        expect(scan('50\\%')[1]).toEqual({ type: 'Command', text: '%', position: 2 });
    });

    it('drops comments and keeps whitespace as space tokens', () => {
        expect(scan('a % note\nb')).toEqual([
            { type: 'Literal', text: 'a', position: 0 },
            { type: 'Space', text: ' ', position: 1 },
            { type: 'Space', text: '\n', position: 8 },
            { type: 'Literal', text: 'b', position: 9 },
        ]);
    });

    it('gives a trailing lone backslash an empty name', () => {
        expect(scan('x\\')[1]).toEqual({ type: 'Command', text: '', position: 1 });
    });

    it('does not reject unbalanced input', () => {
        expect(types('{a')).toEqual(['OpenGroup', 'Literal']);
        expect(types('}}')).toEqual(['CloseGroup', 'CloseGroup']);
    });
});

describe('commandNames', () => {
    it('lists alphabetic command identifiers only', () => {
        expect(commandNames(scan('\\frac{\\alpha}{\\,x}'))).toEqual(['frac', 'alpha']);
    });
});
