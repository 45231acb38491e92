// ─────────────────────────────────────────────────────────────
// Equata  ·  KaTeX Preview Bridge
// The typesetter only reports success (with HTML) or failure
// ─────────────────────────────────────────────────────────────

import katex from 'katex';

export type RenderOutcome =
    | { ok: true; html: string }
    | { ok: false; message: string };

export type Renderer = (markup: string) => RenderOutcome;

export interface RenderOptions {
    displayMode: boolean;
    /** Cap on macro expansion, passed through to KaTeX. */
    maxExpand: number;
}

const DEFAULT_OPTIONS: RenderOptions = {
    displayMode: true,
    maxExpand: 1000,
};

export function renderMarkup(markup: string, options: Partial<RenderOptions> = {}): RenderOutcome {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    try {
        const html = katex.renderToString(markup, {
            throwOnError: true,
            displayMode: opts.displayMode,
            maxExpand: opts.maxExpand,
            trust: false,
            strict: 'ignore',
        });
        return { ok: true, html };
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        console.warn(`[Render] Invalid formula: ${message}`);
        return { ok: false, message };
    }
}

export function createKatexRenderer(options: Partial<RenderOptions> = {}): Renderer {
    return markup => renderMarkup(markup, options);
}
