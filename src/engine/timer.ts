// ─────────────────────────────────────────────────────────────
// Equata  ·  Debounce Timers
// ─────────────────────────────────────────────────────────────

export interface Scheduler {
    /** Runs `callback` after `ms`; the returned function cancels it. */
    schedule(callback: () => void, ms: number): () => void;
    now(): number;
}

export const systemScheduler: Scheduler = {
    schedule: (callback, ms) => {
        const handle = setTimeout(callback, ms);
        return () => clearTimeout(handle);
    },
    now: () => Date.now(),
};

/** One pending callback at a time; scheduling again restarts the wait. */
export class DebounceTimer {
    private cancelPending: (() => void) | null = null;
    private pendingCallback: (() => void) | null = null;

    constructor(readonly delayMs: number, private readonly scheduler: Scheduler = systemScheduler) {}

    schedule(callback: () => void): void {
        this.cancel();
        this.pendingCallback = callback;
        this.cancelPending = this.scheduler.schedule(() => this.fire(), this.delayMs);
    }

    cancel(): void {
        this.cancelPending?.();
        this.cancelPending = null;
        this.pendingCallback = null;
    }

    /** Runs the pending callback now, if any. */
    flush(): void {
        if (this.pendingCallback) {
            this.cancelPending?.();
            this.fire();
        }
    }

    get pending(): boolean {
        return this.pendingCallback !== null;
    }

    private fire(): void {
        const callback = this.pendingCallback;
        this.cancelPending = null;
        this.pendingCallback = null;
        callback?.();
    }
}
