// ─────────────────────────────────────────────────────────────
// Equata  ·  Configuration Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { resolveConfig, DEFAULT_CONFIG } from '../core/config';

describe('resolveConfig', () => {
    it('returns the defaults when nothing is overridden', () => {
        const config = resolveConfig();
        expect(config.maxLength).toBe(10_000);
        expect(config.maxNestingDepth).toBe(50);
        expect(config.maxRows).toBe(100);
        expect(config.maxCols).toBe(100);
        expect(config.textualDebounceMs).toBe(300);
        expect(config.structuralDebounceMs).toBe(150);
        expect(config.allowedCommands).toBe(DEFAULT_CONFIG.allowedCommands);
    });

    it('ships disjoint allow and deny lists', () => {
        expect(DEFAULT_CONFIG.allowedCommands.has('frac')).toBe(true);
        expect(DEFAULT_CONFIG.deniedCommands.has('input')).toBe(true);
        expect([...DEFAULT_CONFIG.deniedCommands].filter(n => DEFAULT_CONFIG.allowedCommands.has(n))).toEqual([]);
        expect(DEFAULT_CONFIG.allowedEnvironments.has('pmatrix')).toBe(true);
    });

    it('applies overrides', () => {
        expect(resolveConfig({ maxNestingDepth: 10 }).maxNestingDepth).toBe(10);
    });

    it('rejects negative and non-finite numbers', () => {
        expect(() => resolveConfig({ maxLength: -1 })).toThrow(
            'Invalid configuration: maxLength must be a non-negative number (got -1)',
        );
        expect(() => resolveConfig({ historyLimit: Number.NaN })).toThrow(/historyLimit/);
    });

    it('rejects zero limits', () => {
        expect(() => resolveConfig({ maxRows: 0 })).toThrow('Invalid configuration: maxRows must be at least 1');
    });

    it('allows zero debounce and history', () => {
        expect(resolveConfig({ textualDebounceMs: 0, historyLimit: 0 }).historyLimit).toBe(0);
    });

    it('rejects a command that is both allowed and denied', () => {
        expect(() => resolveConfig({ allowedCommands: new Set(['frac', 'input']) })).toThrow(
            'Invalid configuration: commands both allowed and denied: input',
        );
    });
});
