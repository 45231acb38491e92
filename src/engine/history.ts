// ─────────────────────────────────────────────────────────────
// Equata  ·  Edit History
// Trees are immutable, so undo keeps prior roots and nothing else
// ─────────────────────────────────────────────────────────────

import type { ExprNode } from '../core/ast';

export class EditHistory {
    private past: ExprNode[] = [];
    private future: ExprNode[] = [];

    constructor(private readonly limit: number) {}

    /** Remember `previous` before it is replaced. A new edit drops the redo branch. */
    record(previous: ExprNode): void {
        if (this.limit === 0) return;
        this.past.push(previous);
        if (this.past.length > this.limit) this.past.shift();
        this.future = [];
    }

    undo(current: ExprNode): ExprNode | null {
        const previous = this.past.pop();
        if (!previous) return null;
        this.future.push(current);
        return previous;
    }

    redo(current: ExprNode): ExprNode | null {
        const next = this.future.pop();
        if (!next) return null;
        this.past.push(current);
        return next;
    }

    get canUndo(): boolean {
        return this.past.length > 0;
    }

    get canRedo(): boolean {
        return this.future.length > 0;
    }
}
