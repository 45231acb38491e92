// ─────────────────────────────────────────────────────────────
// Equata  ·  Command Catalog
// Maps a command name onto the node kind that parses it
// ─────────────────────────────────────────────────────────────

import type { BigOperatorKind } from '../core/ast';
import catalog from './commands.json';

export type CommandClass =
    | { type: 'fraction' }
    | { type: 'root' }
    | { type: 'bigOperator'; kind: BigOperatorKind }
    | { type: 'text' }
    | { type: 'style' }
    | { type: 'color' }
    | { type: 'colorSwitch' }
    | { type: 'size' }
    | { type: 'delimiter' }
    | { type: 'symbol' }
    | { type: 'operator' }
    | { type: 'function' };

const FRACTIONS = new Set(['frac', 'dfrac', 'tfrac']);

const BIG_OPERATORS = new Map<string, BigOperatorKind>([
    ['int', 'Integral'], ['iint', 'Integral'], ['iiint', 'Integral'], ['oint', 'Integral'],
    ['sum', 'Sum'],
    ['prod', 'Product'], ['coprod', 'Product'],
    ['lim', 'Limit'], ['limsup', 'Limit'], ['liminf', 'Limit'],
]);

const SYMBOLS = new Set(catalog.symbols);
const OPERATORS = new Set(catalog.operators);
const TEXT = new Set(catalog.text);
const STYLES = new Set(catalog.styles);
const COLORS = new Set(catalog.colors);
export const COLOR_SWITCHES: ReadonlySet<string> = new Set(catalog.colorSwitches);
export const SIZES: ReadonlySet<string> = new Set(catalog.sizes);

/** Relation symbols and commands that end the operand of a big operator. */
export const RELATIONS: ReadonlySet<string> = new Set(catalog.relations);

export function classifyCommand(name: string): CommandClass {
    if (FRACTIONS.has(name)) return { type: 'fraction' };
    if (name === 'sqrt') return { type: 'root' };
    const big = BIG_OPERATORS.get(name);
    if (big) return { type: 'bigOperator', kind: big };
    if (TEXT.has(name)) return { type: 'text' };
    if (STYLES.has(name)) return { type: 'style' };
    if (COLORS.has(name)) return { type: 'color' };
    if (COLOR_SWITCHES.has(name)) return { type: 'colorSwitch' };
    if (SIZES.has(name)) return { type: 'size' };
    if (name === 'left' || name === 'right') return { type: 'delimiter' };
    if (SYMBOLS.has(name)) return { type: 'symbol' };
    if (OPERATORS.has(name) || !/^[a-zA-Z]/.test(name)) return { type: 'operator' };
    return { type: 'function' };
}
