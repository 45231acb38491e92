// ─────────────────────────────────────────────────────────────
// Equata  ·  Unsafe Content Patterns
// Raw-text matchers run before any parsing. Every detector is
// also a removal rule, so sanitized output never matches one.
// ─────────────────────────────────────────────────────────────

import type { UnsafePatternClass } from '../core/errors';

interface PatternRule {
    pattern: UnsafePatternClass;
    /** Tried in order; the first ones remove larger spans. */
    matchers: RegExp[];
}

/** `\name` not followed by further letters, plus optional `[...]` and `{...}` arguments. */
function command(names: string[], withArgs: boolean): RegExp {
    const args = withArgs ? String.raw`(?:\s*\[[^\[\]{}]*\])?(?:\s*\{[^{}]*\})?` : '';
    return new RegExp(String.raw`\\(?:${names.join('|')})(?![a-zA-Z])${args}`, 'i');
}

const EVENT_HANDLERS = [
    'error', 'load', 'click', 'dblclick', 'mouseover', 'mouseout', 'mouseenter', 'mouseleave',
    'mousedown', 'mouseup', 'focus', 'blur', 'change', 'input', 'submit', 'keydown', 'keyup', 'keypress',
    'animationstart', 'toggle',
];

export const PATTERN_RULES: readonly PatternRule[] = [
    {
        pattern: 'script',
        matchers: [
            /<\s*script\b[^>]*>[\s\S]*?<\s*\/\s*script\s*>/i,
            /<\s*\/?\s*script\b[^<>]*>?/i,
        ],
    },
    {
        pattern: 'markup-tag',
        matchers: [
            /<\/?(?:iframe|object|embed|svg|img|style|link|meta|base|form|frame|frameset)\b[^<>]*>?/i,
            /<\/?(?!script\b)[a-zA-Z][a-zA-Z0-9-]*(?:\s[^<>]*)?\/?>/i,
        ],
    },
    {
        pattern: 'event-handler',
        matchers: [
            new RegExp(String.raw`\bon(?:${EVENT_HANDLERS.join('|')})\s*=\s*(?:"[^"]*"|'[^']*')?`, 'i'),
        ],
    },
    {
        pattern: 'protocol-scheme',
        matchers: [
            /\b(?:javascript|vbscript)\s*:/i,
            /\bdata\s*:\s*text\/html/i,
        ],
    },
    {
        pattern: 'file-access',
        matchers: [
            command(['input', 'include', 'includeonly', 'verbatiminput', 'lstinputlisting', 'openin', 'includegraphics'], true),
        ],
    },
    {
        pattern: 'shell-escape',
        matchers: [
            command(['write18', 'immediate', 'write', 'openout'], true),
        ],
    },
    {
        pattern: 'macro-definition',
        matchers: [
            command([
                'def', 'gdef', 'edef', 'xdef', 'let', 'futurelet',
                'newcommand', 'renewcommand', 'providecommand', 'newenvironment', 'renewenvironment',
                'DeclareMathOperator', 'catcode', 'makeatletter', 'makeatother', 'csname', 'endcsname', 'expandafter',
            ], false),
        ],
    },
    {
        pattern: 'package-loading',
        matchers: [
            command(['usepackage', 'RequirePackage', 'documentclass', 'require'], true),
        ],
    },
];

/** Pattern classes present in the markup, in rule order. */
export function detectUnsafe(markup: string): UnsafePatternClass[] {
    return PATTERN_RULES
        .filter(rule => rule.matchers.some(m => m.test(markup)))
        .map(rule => rule.pattern);
}

const REMOVERS: RegExp[] = PATTERN_RULES.flatMap(rule =>
    rule.matchers.map(m => new RegExp(m.source, m.flags.includes('g') ? m.flags : `${m.flags}g`)),
);

/**
 * Deletes every unsafe match until nothing changes. Deleting an
 * argument leaves its slot as an empty group, e.g.
 * `\frac{\input{x}}{2}` becomes `\frac{}{2}`.
 */
export function sanitize(markup: string): string {
    let current = markup;
    for (;;) {
        let next = current;
        for (const remover of REMOVERS) {
            next = next.replace(remover, '');
        }
        if (next === current) return current;
        current = next;
    }
}
