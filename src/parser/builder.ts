// ─────────────────────────────────────────────────────────────
// Equata  ·  Tokens → Expression Tree
// Recursive descent, one sub-parser per node kind. Never throws:
// structural problems are reported next to a best-effort tree.
// ─────────────────────────────────────────────────────────────

import type { ExprNode, BigOperatorKind } from '../core/ast';
import { mk, wrapItems } from '../core/ast';
import type { ParseError } from '../core/errors';
import { scan, type Token, type TokenType } from './scanner';
import { classifyCommand, RELATIONS } from './commands';

export type BuildResult =
    | { ok: true; tree: ExprNode }
    | { ok: false; tree: ExprNode; errors: ParseError[] };

export interface BuildOptions {
    /** Recursion guard for groups and command arguments. */
    maxDepth?: number;
}

export const DEFAULT_BUILD_DEPTH = 256;

// ── Stop conditions ─────────────────────────────────────────

interface Stop {
    closers: ReadonlySet<TokenType>;
    /** Also stop before a relation (operand of a big operator). */
    relation: boolean;
}

const TOP: Stop = { closers: new Set(), relation: false };
const GROUP: Stop = { closers: new Set(['CloseGroup', 'EnvironmentEnd']), relation: false };
const OPTION: Stop = { closers: new Set(['CloseOption', 'CloseGroup', 'EnvironmentEnd']), relation: false };
const CELL: Stop = {
    closers: new Set(['ColumnSeparator', 'RowSeparator', 'CloseGroup', 'EnvironmentEnd']),
    relation: false,
};

/** Tokens that can never start an argument. */
const NOT_AN_ARGUMENT = new Set<TokenType>([
    'CloseGroup', 'EnvironmentEnd', 'ColumnSeparator', 'RowSeparator', 'SubscriptMarker', 'SuperscriptMarker',
]);

const ATOM = /\d+(?:\.\d+)?|\p{L}|./gsu;
const NUMBER = /^\d+(?:\.\d+)?$/;
const LETTER = /^\p{L}$/u;

function splitAtoms(token: Token): Token[] {
    const atoms: Token[] = [];
    for (const match of token.text.matchAll(ATOM)) {
        atoms.push({ type: 'Literal', text: match[0], position: token.position + (match.index ?? 0) });
    }
    return atoms;
}

export function rawText(token: Token): string {
    switch (token.type) {
        case 'Command': return `\\${token.text}`;
        case 'EnvironmentBegin': return `\\begin{${token.text}}`;
        case 'EnvironmentEnd': return `\\end{${token.text}}`;
        default: return token.text;
    }
}

// ── Parser state ────────────────────────────────────────────

class TreeBuilder {
    private units: Token[];
    private pos = 0;
    private depth = 0;
    private errors: ParseError[] = [];
    private nestingReported = false;

    constructor(tokens: Token[], private readonly maxDepth: number) {
        this.units = tokens.flatMap(t => (t.type === 'Literal' ? splitAtoms(t) : [t]));
    }

    run(): BuildResult {
        const tree = wrapItems(this.parseItems(TOP));
        return this.errors.length === 0
            ? { ok: true, tree }
            : { ok: false, tree, errors: this.errors };
    }

    // ── Cursor helpers ───────────────────────────────────

    private peek(): Token | undefined {
        return this.units[this.pos];
    }

    private advance(): Token | undefined {
        const tok = this.units[this.pos];
        this.pos++;
        return tok;
    }

    private skipSpaces(): void {
        while (this.peek()?.type === 'Space') this.pos++;
    }

    private fail(error: ParseError): void {
        this.errors.push(error);
    }

    private isRelation(tok: Token): boolean {
        return (tok.type === 'Literal' || tok.type === 'Command') && RELATIONS.has(tok.text);
    }

    private reportNesting(position: number): void {
        // One report per build; the rest of a runaway input adds nothing
        if (this.nestingReported) return;
        this.nestingReported = true;
        this.fail({
            code: 'NestingLimit', position, limit: this.maxDepth,
            message: `Nesting deeper than ${this.maxDepth} levels at position ${position}`,
        });
    }

    /**
     * Runs `body` one level deeper, or reports the nesting limit and
     * returns an empty slot once the guard is reached.
     */
    private descend(position: number, body: () => ExprNode): ExprNode {
        if (this.depth >= this.maxDepth) {
            this.reportNesting(position);
            return mk.placeholder();
        }
        this.depth++;
        try {
            return body();
        } finally {
            this.depth--;
        }
    }

    // ── Sequences ────────────────────────────────────────

    private parseItems(stop: Stop): ExprNode[] {
        const items: ExprNode[] = [];

        while (this.pos < this.units.length) {
            const tok = this.units[this.pos];
            if (stop.closers.has(tok.type)) break;
            if (stop.relation && this.isRelation(tok)) break;

            if (tok.type === 'CloseGroup' || tok.type === 'EnvironmentEnd') {
                this.fail({
                    code: 'UnbalancedGroup', position: tok.position,
                    message: `Unmatched ${rawText(tok)} at position ${tok.position}`,
                });
                this.pos++;
                continue;
            }

            this.parseItem(items, stop);
        }

        return items;
    }

    private parseItem(items: ExprNode[], stop: Stop): void {
        const tok = this.advance();
        if (!tok) return;

        switch (tok.type) {
            case 'Space':
                return;
            case 'Literal':
                items.push(literalNode(tok.text));
                return;
            case 'OpenGroup': {
                const inner = this.parseGroupBody(tok);
                if (inner.length === 0) items.push(mk.placeholder());
                else items.push(wrapItems(inner));
                return;
            }
            case 'OpenOption':
            case 'CloseOption':
            case 'ColumnSeparator':
                items.push(mk.operator(tok.text));
                return;
            case 'RowSeparator':
                items.push(mk.operator('\\\\'));
                return;
            case 'SubscriptMarker':
            case 'SuperscriptMarker': {
                const base = items.pop() ?? mk.placeholder();
                const script = this.parseArgument(tok, tok.text);
                items.push(tok.type === 'SuperscriptMarker' ? mk.power(base, script) : mk.sub(base, script));
                return;
            }
            case 'EnvironmentBegin':
                items.push(this.parseEnvironment(tok));
                return;
            case 'Command':
                items.push(this.parseCommand(tok, stop));
                return;
            case 'CloseGroup':
            case 'EnvironmentEnd':
                // parseItems reports these before dispatching
                return;
        }
    }

    /** Contents of a `{...}` group whose opening brace was just consumed. */
    private parseGroupBody(open: Token): ExprNode[] {
        let items: ExprNode[] = [];
        if (this.depth >= this.maxDepth) {
            this.reportNesting(open.position);
            this.skipBalancedGroup();
        } else {
            this.depth++;
            items = this.parseItems(GROUP);
            this.depth--;
        }

        if (this.peek()?.type === 'CloseGroup') {
            this.pos++;
        } else {
            this.fail({
                code: 'UnbalancedGroup', position: open.position,
                message: `Unclosed { at position ${open.position}`,
            });
        }
        return items;
    }

    /** Skips to just before the `}` matching an already consumed `{`. */
    private skipBalancedGroup(): void {
        let level = 0;
        while (this.pos < this.units.length) {
            const type = this.units[this.pos].type;
            if (type === 'OpenGroup') level++;
            if (type === 'CloseGroup') {
                if (level === 0) return;
                level--;
            }
            this.pos++;
        }
    }

    // ── Arguments ────────────────────────────────────────

    /**
     * A required argument: a brace group, or else one atom. Missing
     * arguments are reported and stand in as empty slots.
     */
    private parseArgument(owner: Token, command: string): ExprNode {
        this.skipSpaces();
        const tok = this.peek();

        if (!tok || NOT_AN_ARGUMENT.has(tok.type)) {
            this.fail({
                code: 'ArityMismatch', position: owner.position, command,
                message: `Missing argument for ${command === '^' || command === '_' ? command : `\\${command}`} at position ${owner.position}`,
            });
            return mk.placeholder();
        }

        if (tok.type === 'OpenGroup') {
            this.pos++;
            return wrapItems(this.parseGroupBody(tok));
        }

        if (tok.type === 'Literal') {
            return literalNode(this.takeSingleAtom().text);
        }

        return this.descend(tok.position, () => {
            const single: ExprNode[] = [];
            this.parseItem(single, GROUP);
            return wrapItems(single);
        });
    }

    /** Consumes one character of a number run, leaving the rest in place. */
    private takeSingleAtom(): Token {
        const tok = this.units[this.pos];
        if (tok.text.length <= 1 || !NUMBER.test(tok.text)) {
            this.pos++;
            return tok;
        }
        const rest: Token = { type: 'Literal', text: tok.text.slice(1), position: tok.position + 1 };
        this.units.splice(this.pos, 1, ...splitAtoms(rest));
        return { type: 'Literal', text: tok.text[0], position: tok.position };
    }

    /** Raw text of a `{...}` group, braces of nested groups included. */
    private parseRawGroup(owner: Token): string | null {
        this.skipSpaces();
        const open = this.peek();
        if (open?.type !== 'OpenGroup') {
            if (open?.type === 'Literal') return this.takeSingleAtom().text;
            this.fail({
                code: 'ArityMismatch', position: owner.position, command: owner.text,
                message: `Missing argument for \\${owner.text} at position ${owner.position}`,
            });
            return null;
        }
        this.pos++;

        let text = '';
        let level = 0;
        while (this.pos < this.units.length) {
            const tok = this.units[this.pos];
            if (tok.type === 'CloseGroup') {
                if (level === 0) {
                    this.pos++;
                    return text;
                }
                level--;
            } else if (tok.type === 'OpenGroup') {
                level++;
            }
            text += rawText(tok);
            this.pos++;
        }

        this.fail({
            code: 'UnbalancedGroup', position: open.position,
            message: `Unclosed { at position ${open.position}`,
        });
        return text;
    }

    // ── Commands ─────────────────────────────────────────

    private parseCommand(tok: Token, stop: Stop): ExprNode {
        const name = tok.text;
        const cls = classifyCommand(name);

        switch (cls.type) {
            case 'fraction': {
                const numerator = this.parseArgument(tok, name);
                const denominator = this.parseArgument(tok, name);
                return mk.frac(numerator, denominator, name);
            }

            case 'root': {
                this.skipSpaces();
                let index: ExprNode | null = null;
                const open = this.peek();
                if (open?.type === 'OpenOption') {
                    this.pos++;
                    index = this.descend(open.position, () => wrapItems(this.parseItems(OPTION)));
                    if (this.peek()?.type === 'CloseOption') {
                        this.pos++;
                    } else {
                        this.fail({
                            code: 'UnbalancedGroup', position: open.position,
                            message: `Unclosed [ at position ${open.position}`,
                        });
                    }
                }
                return mk.root(this.parseArgument(tok, name), index);
            }

            case 'bigOperator':
                return this.parseBigOperator(tok, cls.kind, stop);

            case 'text':
                return mk.text(this.parseRawGroup(tok) ?? '', name);

            case 'style':
                return mk.format('style', name, this.parseArgument(tok, name));

            case 'color': {
                const color = this.parseRawGroup(tok) ?? '';
                return mk.format('color', name, this.parseArgument(tok, name), color.trim());
            }

            // Switches scope over the rest of their group
            case 'colorSwitch': {
                const color = this.parseRawGroup(tok) ?? '';
                const rest = this.descend(tok.position, () => wrapItems(this.parseItems(stop)));
                return mk.format('color', name, rest, color.trim());
            }

            case 'size':
                return mk.format('size', name, this.descend(tok.position, () => wrapItems(this.parseItems(stop))));

            case 'delimiter': {
                this.skipSpaces();
                const delim = this.peek();
                if (!delim || NOT_AN_ARGUMENT.has(delim.type) || delim.type === 'OpenGroup') {
                    this.fail({
                        code: 'ArityMismatch', position: tok.position, command: name,
                        message: `Missing delimiter after \\${name} at position ${tok.position}`,
                    });
                    return mk.operator(`\\${name}`);
                }
                const text = delim.type === 'Literal' ? this.takeSingleAtom().text : rawText(this.units[this.pos++]);
                return mk.operator(`\\${name}${text}`);
            }

            case 'symbol':
                return mk.variable(`\\${name}`);

            case 'operator':
                return mk.operator(`\\${name}`);

            case 'function': {
                if (name === 'begin' || name === 'end') {
                    this.fail({
                        code: 'ArityMismatch', position: tok.position, command: name,
                        message: `\\${name} without an environment name at position ${tok.position}`,
                    });
                }
                const args: ExprNode[] = [];
                this.skipSpaces();
                while (this.peek()?.type === 'OpenGroup') {
                    const open = this.units[this.pos++];
                    args.push(wrapItems(this.parseGroupBody(open)));
                    this.skipSpaces();
                }
                return mk.fn(name, args);
            }
        }
    }

    private parseBigOperator(tok: Token, kind: BigOperatorKind, stop: Stop): ExprNode {
        let lower: ExprNode | null = null;
        let upper: ExprNode | null = null;

        for (;;) {
            this.skipSpaces();
            const next = this.peek();
            if (next?.type === 'SubscriptMarker' && lower === null) {
                this.pos++;
                lower = this.parseArgument(next, '_');
            } else if (next?.type === 'SuperscriptMarker' && upper === null) {
                this.pos++;
                upper = this.parseArgument(next, '^');
            } else if (next?.type === 'Command' && (next.text === 'limits' || next.text === 'nolimits')) {
                this.pos++;
            } else {
                break;
            }
        }

        this.skipSpaces();
        const open = this.peek();
        let body: ExprNode;
        if (open?.type === 'OpenGroup') {
            this.pos++;
            body = wrapItems(this.parseGroupBody(open));
        } else if (!open || stop.closers.has(open.type) || open.type === 'CloseGroup' || open.type === 'EnvironmentEnd') {
            this.fail({
                code: 'ArityMismatch', position: tok.position, command: tok.text,
                message: `Missing argument for \\${tok.text} at position ${tok.position}`,
            });
            body = mk.placeholder();
        } else {
            body = this.descend(tok.position, () => wrapItems(this.parseItems({ ...stop, relation: true })));
        }

        return mk.bigOp(kind, tok.text, body, lower, upper);
    }

    // ── Environments ─────────────────────────────────────

    private parseEnvironment(begin: Token): ExprNode {
        return this.descend(begin.position, () => this.parseEnvironmentBody(begin));
    }

    private parseEnvironmentBody(begin: Token): ExprNode {
        const env = begin.text;
        let columns: string | null = null;
        if (env === 'array') {
            this.skipSpaces();
            // `{}` reads as no column spec
            if (this.peek()?.type === 'OpenGroup') columns = this.parseRawGroup(begin) || null;
        }

        const rows: ExprNode[][] = [];
        let row: ExprNode[] = [];
        let lastCellEmpty = false;

        for (;;) {
            const start = this.pos;
            const cell = this.parseItems(CELL);
            lastCellEmpty = !this.units.slice(start, this.pos).some(t => t.type !== 'Space');
            row.push(wrapItems(cell));

            const tok = this.peek();
            if (tok?.type === 'ColumnSeparator') {
                this.pos++;
                continue;
            }
            if (tok?.type === 'RowSeparator') {
                this.pos++;
                this.skipRowSpacing();
                rows.push(row);
                row = [];
                continue;
            }
            if (tok?.type === 'EnvironmentEnd') {
                this.pos++;
                if (tok.text !== env) {
                    this.fail({
                        code: 'UnbalancedGroup', position: tok.position,
                        message: `\\end{${tok.text}} closes \\begin{${env}} at position ${tok.position}`,
                    });
                }
            } else {
                this.fail({
                    code: 'UnbalancedGroup', position: begin.position,
                    message: `Unclosed \\begin{${env}} at position ${begin.position}`,
                });
            }
            break;
        }

        // `a \\ b \\` ends with an empty row that is not part of the grid
        if (!(rows.length > 0 && row.length === 1 && lastCellEmpty)) rows.push(row);

        const cols = rows.reduce((max, r) => Math.max(max, r.length), 0);
        if (rows.some(r => r.length !== cols)) {
            this.fail({
                code: 'ArityMismatch', position: begin.position, command: env,
                message: `Rows of \\begin{${env}} have different lengths at position ${begin.position}`,
            });
            for (const r of rows) {
                while (r.length < cols) r.push(mk.placeholder());
            }
        }

        return mk.matrix(rows, env, columns);
    }

    /** Drops the optional `[2pt]` after a row separator. */
    private skipRowSpacing(): void {
        this.skipSpaces();
        if (this.peek()?.type !== 'OpenOption') return;
        let j = this.pos + 1;
        while (j < this.units.length && this.units[j].type !== 'CloseOption') {
            if (this.units[j].type === 'RowSeparator' || this.units[j].type === 'EnvironmentEnd') return;
            j++;
        }
        if (j < this.units.length) this.pos = j + 1;
    }
}

function literalNode(text: string): ExprNode {
    if (NUMBER.test(text) || LETTER.test(text)) return mk.literal(text);
    return mk.operator(text);
}

// ── Public API ──────────────────────────────────────────────

export function build(tokens: Token[], options: BuildOptions = {}): BuildResult {
    const builder = new TreeBuilder(tokens, options.maxDepth ?? DEFAULT_BUILD_DEPTH);
    return builder.run();
}

export function parseMarkup(markup: string, options: BuildOptions = {}): BuildResult {
    return build(scan(markup), options);
}
