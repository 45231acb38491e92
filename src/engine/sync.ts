// ─────────────────────────────────────────────────────────────
// Equata  ·  Sync Coordinator
// Owns the canonical tree and keeps it, the markup text and the
// preview in step. Edits run one at a time; whichever edit
// completes last wins outright.
// ─────────────────────────────────────────────────────────────

import type { ExprNode, Path } from '../core/ast';
import { mk } from '../core/ast';
import type { EngineConfig } from '../core/config';
import {
    type Result, type EditError, type ParseError, type ValidationError,
    ok, err, describeEditError, describeValidationError,
} from '../core/errors';
import { nodeAt, replaceAt, structuralDepth, pathsEqual, comparePaths, treesEqual } from '../core/tree';
import { serialize } from '../emitters/markup';
import { MarkupValidator, type ValidationResult } from '../security/validator';
import { fillPlaceholder, PlaceholderNavigator } from './placeholders';
import { EditHistory } from './history';
import { TemplateCatalog, type TemplateDefinition } from './templates';
import { DebounceTimer, systemScheduler, type Scheduler } from './timer';
import type { Renderer, RenderOutcome } from '../bridge/katex-renderer';

// ── Types ───────────────────────────────────────────────────

export type EditSource = 'Structural' | 'Textual';

export type SyncState =
    | { phase: 'Idle' }
    | { phase: 'Editing'; source: EditSource }
    | { phase: 'Reconciling'; source: EditSource };

export type Notice =
    | { kind: 'edit'; error: EditError; message: string }
    | { kind: 'validation'; source: EditSource; errors: ValidationError[]; message: string }
    | { kind: 'parse'; errors: ParseError[]; partial: ExprNode; message: string }
    | { kind: 'render'; message: string };

export type EditOutcome =
    | { status: 'applied'; tree: ExprNode }
    | { status: 'rejected'; notice: Notice }
    | { status: 'queued' };

export interface SyncEvents {
    state: SyncState;
    tree: ExprNode;
    /** Canonical markup for the text view, after a structural edit. */
    markup: string;
    preview: RenderOutcome;
    notice: Notice;
}

type Listeners = { [K in keyof SyncEvents]: Set<(payload: SyncEvents[K]) => void> };

export interface CompletedEdit {
    source: EditSource;
    at: number;
}

export interface SyncOptions {
    config?: Partial<EngineConfig>;
    initialMarkup?: string;
    templates?: readonly TemplateDefinition[];
    scheduler?: Scheduler;
    renderer?: Renderer | null;
}

interface StructuralChange {
    tree: ExprNode;
    focus: Path | null;
    /** Undo and redo move between roots that were already accepted. */
    fromHistory: boolean;
}

const editNotice = (error: EditError): Notice => ({ kind: 'edit', error, message: describeEditError(error) });

const validationNotice = (source: EditSource, errors: ValidationError[]): Notice => ({
    kind: 'validation', source, errors,
    message: errors.map(describeValidationError).join('; '),
});

const parseNotice = (errors: ParseError[], partial: ExprNode): Notice => ({
    kind: 'parse', errors, partial,
    message: `Formula could not be parsed: ${errors.map(e => e.message).join('; ')}`,
});

// ── Coordinator ─────────────────────────────────────────────

export class SyncCoordinator {
    readonly config: EngineConfig;
    readonly validator: MarkupValidator;
    readonly templates: TemplateCatalog;

    private root: ExprNode;
    private canonicalMarkup: string;
    private current: SyncState = { phase: 'Idle' };
    private activePath: Path | null;
    private pendingText: string | null = null;
    private lastCompleted: CompletedEdit | null = null;

    private busy = false;
    private readonly queue: Array<() => void> = [];
    private readonly history: EditHistory;
    private readonly textTimer: DebounceTimer;
    private readonly publishTimer: DebounceTimer;
    private readonly scheduler: Scheduler;
    private readonly renderer: Renderer | null;
    private readonly listeners: Listeners = {
        state: new Set(),
        tree: new Set(),
        markup: new Set(),
        preview: new Set(),
        notice: new Set(),
    };

    constructor(options: SyncOptions = {}) {
        this.validator = new MarkupValidator(options.config);
        this.config = this.validator.config;
        this.templates = new TemplateCatalog(this.validator, options.templates);
        this.scheduler = options.scheduler ?? systemScheduler;
        this.renderer = options.renderer ?? null;
        this.history = new EditHistory(this.config.historyLimit);
        this.textTimer = new DebounceTimer(this.config.textualDebounceMs, this.scheduler);
        this.publishTimer = new DebounceTimer(this.config.structuralDebounceMs, this.scheduler);

        this.root = this.load(options.initialMarkup ?? '');
        this.canonicalMarkup = serialize(this.root);
        this.activePath = new PlaceholderNavigator(this.root).first();
    }

    private load(markup: string): ExprNode {
        if (markup === '') return mk.placeholder();
        const report = this.validator.inspect(markup);
        if (report.errors.length === 0 && report.parsed?.ok) return report.parsed.tree;
        const reasons = report.errors.length > 0
            ? report.errors.map(describeValidationError).join('; ')
            : 'unbalanced markup';
        console.warn(`[Sync] Initial markup rejected (${reasons}), starting empty`);
        return mk.placeholder();
    }

    // ── Read-only views ──────────────────────────────────

    get tree(): ExprNode {
        return this.root;
    }

    get markup(): string {
        return this.canonicalMarkup;
    }

    get state(): SyncState {
        return this.current;
    }

    get cursor(): Path | null {
        return this.activePath;
    }

    get placeholders(): Path[] {
        return new PlaceholderNavigator(this.root).paths;
    }

    get lastEdit(): CompletedEdit | null {
        return this.lastCompleted;
    }

    get canUndo(): boolean {
        return this.history.canUndo;
    }

    get canRedo(): boolean {
        return this.history.canRedo;
    }

    // ── Events ───────────────────────────────────────────

    on<K extends keyof SyncEvents>(event: K, listener: (payload: SyncEvents[K]) => void): () => void {
        this.listeners[event].add(listener);
        return () => {
            this.listeners[event].delete(listener);
        };
    }

    private emit<K extends keyof SyncEvents>(event: K, payload: SyncEvents[K]): void {
        for (const listener of [...this.listeners[event]]) {
            try {
                listener(payload);
            } catch (e) {
                console.error(`[Sync] "${event}" listener failed:`, e);
            }
        }
    }

    // ── Structural edits ─────────────────────────────────

    insertTemplate(id: string, at?: Path): EditOutcome {
        return this.structural(root => {
            const template = this.templates.get(id);
            if (!template) return err(editNotice({ code: 'UnknownTemplate', id }));
            return this.insert(root, template, at);
        });
    }

    insertMarkup(markup: string, at?: Path): EditOutcome {
        return this.structural(root => {
            const report = this.validator.inspect(markup);
            if (report.errors.length > 0 || !report.parsed) return err(validationNotice('Structural', report.errors));
            if (!report.parsed.ok) return err(parseNotice(report.parsed.errors, report.parsed.tree));
            return this.insert(root, report.parsed.tree, at);
        });
    }

    fill(path: Path, replacement: ExprNode): EditOutcome {
        return this.structural(root => {
            const filled = fillPlaceholder(root, path, replacement, this.config);
            if (!filled.ok) return err(editNotice(filled.error));
            return ok({ tree: filled.value, focus: focusAfter(filled.value, path), fromHistory: false });
        });
    }

    replace(path: Path, replacement: ExprNode): EditOutcome {
        return this.structural(root => {
            const updated = replaceAt(root, path, replacement);
            if (!updated) return err(editNotice({ code: 'InvalidPath', path }));
            const depth = structuralDepth(updated);
            if (depth > this.config.maxNestingDepth) {
                return err(editNotice({ code: 'TooDeep', depth, limit: this.config.maxNestingDepth }));
            }
            return ok({ tree: updated, focus: focusAfter(updated, path), fromHistory: false });
        });
    }

    undo(): EditOutcome {
        return this.structural(root => {
            const previous = this.history.undo(root);
            if (!previous) return err(editNotice({ code: 'NothingToUndo' }));
            return ok({ tree: previous, focus: this.keptCursor(previous), fromHistory: true });
        });
    }

    redo(): EditOutcome {
        return this.structural(root => {
            const next = this.history.redo(root);
            if (!next) return err(editNotice({ code: 'NothingToRedo' }));
            return ok({ tree: next, focus: this.keptCursor(next), fromHistory: true });
        });
    }

    /**
     * Put `subtree` into the slot at `at` (or under the cursor); with no
     * slot to fill it is appended after the current content.
     */
    private insert(root: ExprNode, subtree: ExprNode, at?: Path): Result<StructuralChange, Notice> {
        const target = at ?? this.activePath;
        if (target) {
            const node = nodeAt(root, target);
            if (node?.kind === 'Placeholder') {
                const filled = fillPlaceholder(root, target, subtree, this.config);
                if (!filled.ok) return err(editNotice(filled.error));
                return ok({ tree: filled.value, focus: focusAfter(filled.value, target), fromHistory: false });
            }
            if (at) return err(editNotice(node ? { code: 'NotAPlaceholder', path: at } : { code: 'InvalidPath', path: at }));
        }

        let tree: ExprNode;
        let within: Path;
        if (root.kind === 'Placeholder') {
            tree = subtree;
            within = [];
        } else if (root.kind === 'Sequence') {
            tree = mk.seq([...root.items, subtree]);
            within = [root.items.length];
        } else {
            tree = mk.seq([root, subtree]);
            within = [1];
        }

        const depth = structuralDepth(tree);
        if (depth > this.config.maxNestingDepth) {
            return err(editNotice({ code: 'TooDeep', depth, limit: this.config.maxNestingDepth }));
        }
        return ok({ tree, focus: focusAfter(tree, within), fromHistory: false });
    }

    private structural(apply: (root: ExprNode) => Result<StructuralChange, Notice>): EditOutcome {
        return this.run(() => {
            this.setState({ phase: 'Editing', source: 'Structural' });

            const change = apply(this.root);
            if (!change.ok) return this.reject(change.error);

            const { tree, focus, fromHistory } = change.value;
            const markup = serialize(tree);
            if (!fromHistory) {
                const checked = this.validator.validate(markup);
                if (!checked.ok) return this.reject(validationNotice('Structural', checked.errors));
                this.history.record(this.root);
            }

            this.commit(tree, markup, 'Structural');
            this.activePath = focus;
            this.publishTimer.schedule(() => this.publish());
            this.settle();
            return { status: 'applied', tree };
        });
    }

    // ── Textual edits ────────────────────────────────────

    /** Record typed markup; it is reparsed once typing pauses. */
    type(markup: string): void {
        this.pendingText = markup;
        if (!this.busy) this.setState({ phase: 'Editing', source: 'Textual' });
        this.textTimer.schedule(() => {
            this.reparse();
        });
    }

    get pendingMarkup(): string | null {
        return this.pendingText;
    }

    private reparse(): EditOutcome {
        const text = this.pendingText;
        this.pendingText = null;
        if (text === null) return { status: 'queued' };

        return this.run(() => {
            this.setState({ phase: 'Editing', source: 'Textual' });

            const report = this.validator.inspect(text);
            if (report.errors.length > 0 || !report.parsed) {
                return this.reject(validationNotice('Textual', report.errors));
            }
            if (!report.parsed.ok) {
                return this.reject(parseNotice(report.parsed.errors, report.parsed.tree));
            }

            const tree = report.parsed.tree;
            if (!treesEqual(tree, this.root)) this.history.record(this.root);
            // A structural publish still waiting has lost to this edit
            this.publishTimer.cancel();
            this.commit(tree, serialize(tree), 'Textual');
            this.activePath = this.keptCursor(tree);
            this.renderPreview();
            this.settle();
            return { status: 'applied', tree };
        });
    }

    // ── Cursor ───────────────────────────────────────────

    focus(path: Path): boolean {
        if (nodeAt(this.root, path)?.kind !== 'Placeholder') return false;
        this.activePath = path;
        return true;
    }

    focusNext(): Path | null {
        this.activePath = new PlaceholderNavigator(this.root).next(this.activePath);
        return this.activePath;
    }

    focusPrevious(): Path | null {
        this.activePath = new PlaceholderNavigator(this.root).previous(this.activePath);
        return this.activePath;
    }

    private keptCursor(tree: ExprNode): Path | null {
        const nav = new PlaceholderNavigator(tree);
        const cursor = this.activePath;
        if (cursor && nav.paths.some(p => pathsEqual(p, cursor))) return cursor;
        return nav.first();
    }

    // ── Persistence & lifecycle ──────────────────────────

    /** The only markup that may be stored: validated and sanitized. */
    exportMarkup(): ValidationResult {
        return this.validator.validate(this.canonicalMarkup);
    }

    /** Run any pending reparse and publish now instead of after their delay. */
    flush(): void {
        this.textTimer.flush();
        this.publishTimer.flush();
    }

    dispose(): void {
        this.textTimer.cancel();
        this.publishTimer.cancel();
        this.queue.length = 0;
        for (const set of Object.values(this.listeners)) set.clear();
    }

    // ── Cycle plumbing ───────────────────────────────────

    /** One edit at a time; edits requested mid-cycle wait their turn. */
    private run(edit: () => EditOutcome): EditOutcome {
        if (this.busy) {
            this.queue.push(() => {
                edit();
            });
            return { status: 'queued' };
        }

        const outcome = this.locked(edit);
        let next = this.queue.shift();
        while (next) {
            this.locked(next);
            next = this.queue.shift();
        }
        return outcome;
    }

    private locked<T>(body: () => T): T {
        this.busy = true;
        try {
            return body();
        } finally {
            this.busy = false;
        }
    }

    private commit(tree: ExprNode, markup: string, source: EditSource): void {
        this.root = tree;
        this.canonicalMarkup = markup;
        this.lastCompleted = { source, at: this.scheduler.now() };
        this.setState({ phase: 'Reconciling', source });
        this.emit('tree', tree);
    }

    private publish(): void {
        // The text view is about to be overwritten, so typed text still waiting is stale
        if (this.textTimer.pending) {
            this.textTimer.cancel();
            this.pendingText = null;
            if (!this.busy) this.setState({ phase: 'Idle' });
        }
        this.emit('markup', this.canonicalMarkup);
        this.renderPreview();
    }

    private renderPreview(): void {
        if (!this.renderer) return;
        const outcome = this.renderer(this.canonicalMarkup);
        this.emit('preview', outcome);
        if (!outcome.ok) this.emit('notice', { kind: 'render', message: outcome.message });
    }

    private reject(notice: Notice): EditOutcome {
        console.warn(`[Sync] Edit rejected: ${notice.message}`);
        this.emit('notice', notice);
        this.settle();
        return { status: 'rejected', notice };
    }

    private settle(): void {
        this.setState(this.textTimer.pending ? { phase: 'Editing', source: 'Textual' } : { phase: 'Idle' });
    }

    private setState(state: SyncState): void {
        this.current = state;
        this.emit('state', state);
    }
}

/** The first slot inside `path`, else the next one after it, else the first. */
function focusAfter(tree: ExprNode, path: Path): Path | null {
    const nav = new PlaceholderNavigator(tree);
    return nav.firstWithin(path)
        ?? nav.paths.find(p => comparePaths(p, path) > 0)
        ?? nav.first();
}
