// ─────────────────────────────────────────────────────────────
// Equata  ·  Token Scanner
// Single left-to-right pass, never backtracks
// ─────────────────────────────────────────────────────────────

export type TokenType =
    | 'Command'
    | 'OpenGroup' | 'CloseGroup'
    | 'OpenOption' | 'CloseOption'
    | 'SubscriptMarker' | 'SuperscriptMarker'
    | 'EnvironmentBegin' | 'EnvironmentEnd'
    | 'RowSeparator' | 'ColumnSeparator'
    | 'Space'
    | 'Literal';

export interface Token {
    type: TokenType;
    /** Command identifier without the backslash, environment name, or raw text. */
    text: string;
    position: number;
}

const SINGLE: Record<string, TokenType> = {
    '{': 'OpenGroup', '}': 'CloseGroup',
    '[': 'OpenOption', ']': 'CloseOption',
    '_': 'SubscriptMarker', '^': 'SuperscriptMarker',
    '&': 'ColumnSeparator',
};

const isLetter = (ch: string): boolean => /[a-zA-Z]/.test(ch);
const isSpace = (ch: string): boolean => /\s/.test(ch);

/** Characters that end a literal run. */
const BREAKS = new Set(['\\', '{', '}', '[', ']', '_', '^', '&', '%']);

export function scan(markup: string): Token[] {
    const tokens: Token[] = [];
    const n = markup.length;
    let i = 0;

    // Skips whitespace and `%` comments; used between a backslash and its name
    const skipInsignificant = (from: number): number => {
        let j = from;
        while (j < n) {
            if (isSpace(markup[j])) { j++; continue; }
            if (markup[j] === '%') {
                while (j < n && markup[j] !== '\n') j++;
                continue;
            }
            break;
        }
        return j;
    };

    while (i < n) {
        const ch = markup[i];

        if (isSpace(ch)) {
            const start = i;
            while (i < n && isSpace(markup[i])) i++;
            tokens.push({ type: 'Space', text: markup.slice(start, i), position: start });
            continue;
        }

        if (ch === '%') {
            while (i < n && markup[i] !== '\n') i++;
            continue;
        }

        if (ch === '\\') {
            const start = i;
            const next = markup[i + 1];

            if (next === '\\') {
                tokens.push({ type: 'RowSeparator', text: '\\\\', position: start });
                i += 2;
                continue;
            }

            // `\ name` and `\%comment\n name` normalize to `\name`
            const nameStart = next !== undefined && (isSpace(next) || next === '%') ? skipInsignificant(i + 1) : i + 1;
            if (nameStart < n && isLetter(markup[nameStart])) {
                let j = nameStart;
                while (j < n && isLetter(markup[j])) j++;
                const name = markup.slice(nameStart, j);
                i = j;

                if (name === 'begin' || name === 'end') {
                    const env = readEnvironmentName(markup, j);
                    if (env) {
                        tokens.push({ type: name === 'begin' ? 'EnvironmentBegin' : 'EnvironmentEnd', text: env.name, position: start });
                        i = env.end;
                        continue;
                    }
                }
                tokens.push({ type: 'Command', text: name, position: start });
                continue;
            }

            // Control symbol: `\,` `\{` `\ ` ... (a lone trailing backslash yields an empty name)
            if (next === undefined) {
                tokens.push({ type: 'Command', text: '', position: start });
                i += 1;
            } else {
                tokens.push({ type: 'Command', text: next, position: start });
                i += 2;
            }
            continue;
        }

        const single = SINGLE[ch];
        if (single) {
            tokens.push({ type: single, text: ch, position: i });
            i++;
            continue;
        }

        const start = i;
        while (i < n && !BREAKS.has(markup[i]) && !isSpace(markup[i])) i++;
        tokens.push({ type: 'Literal', text: markup.slice(start, i), position: start });
    }

    return tokens;
}

/** Reads `{name}` (whitespace allowed before the brace) for `\begin`/`\end`. */
function readEnvironmentName(markup: string, from: number): { name: string; end: number } | null {
    let j = from;
    while (j < markup.length && isSpace(markup[j])) j++;
    if (markup[j] !== '{') return null;
    const match = /^\{\s*([a-zA-Z]+\*?)\s*\}/.exec(markup.slice(j, j + 64));
    if (!match) return null;
    return { name: match[1], end: j + match[0].length };
}

/** Every command identifier in the markup, in order of appearance. */
export function commandNames(tokens: Token[]): string[] {
    return tokens.filter(t => t.type === 'Command' && isLetter(t.text.charAt(0))).map(t => t.text);
}
