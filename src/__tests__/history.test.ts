// ─────────────────────────────────────────────────────────────
// Equata  ·  Edit History & Timer Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect, vi } from 'vitest';
import { EditHistory } from '../engine/history';
import { DebounceTimer, type Scheduler } from '../engine/timer';
import { mk } from '../core/ast';

const t1 = mk.literal('1');
const t2 = mk.literal('2');
const t3 = mk.literal('3');

describe('EditHistory', () => {
    it('walks back and forth between recorded roots', () => {
        const history = new EditHistory(10);
        history.record(t1);
        history.record(t2);
        expect(history.undo(t3)).toBe(t2);
        expect(history.undo(t2)).toBe(t1);
        expect(history.undo(t1)).toBeNull();
        expect(history.redo(t1)).toBe(t2);
        expect(history.redo(t2)).toBe(t3);
        expect(history.redo(t3)).toBeNull();
    });

    it('drops the redo branch on a new edit', () => {
        const history = new EditHistory(10);
        history.record(t1);
        history.undo(t2);
        expect(history.canRedo).toBe(true);
        history.record(t1);
        expect(history.canRedo).toBe(false);
    });

    it('forgets the oldest entries past its limit', () => {
        const history = new EditHistory(2);
        history.record(t1);
        history.record(t2);
        history.record(t3);
        expect(history.undo(t3)).toBe(t3);
        expect(history.undo(t3)).toBe(t2);
        expect(history.canUndo).toBe(false);
    });

    it('records nothing with a zero limit', () => {
        const history = new EditHistory(0);
        history.record(t1);
        expect(history.canUndo).toBe(false);
    });
});

/** Manual clock: callbacks run only when the test advances time. */
function manualScheduler() {
    let now = 0;
    let queue: Array<{ at: number; callback: () => void }> = [];
    const scheduler: Scheduler = {
        schedule(callback, ms) {
            const entry = { at: now + ms, callback };
            queue.push(entry);
            return () => {
                queue = queue.filter(e => e !== entry);
            };
        },
        now: () => now,
    };
    const advance = (ms: number): void => {
        now += ms;
        const due = queue.filter(e => e.at <= now);
        queue = queue.filter(e => e.at > now);
        due.forEach(e => e.callback());
    };
    return { scheduler, advance };
}

describe('DebounceTimer', () => {
    it('runs the latest callback once the delay passes', () => {
        const { scheduler, advance } = manualScheduler();
        const timer = new DebounceTimer(100, scheduler);
        const first = vi.fn();
        const second = vi.fn();
        timer.schedule(first);
        advance(60);
        timer.schedule(second);
        advance(60);
        expect(second).not.toHaveBeenCalled();
        advance(40);
        expect(first).not.toHaveBeenCalled();
        expect(second).toHaveBeenCalledTimes(1);
        expect(timer.pending).toBe(false);
    });

    it('cancels and flushes', () => {
        const { scheduler, advance } = manualScheduler();
        const timer = new DebounceTimer(100, scheduler);
        const callback = vi.fn();

        timer.schedule(callback);
        timer.cancel();
        advance(200);
        expect(callback).not.toHaveBeenCalled();

        timer.schedule(callback);
        expect(timer.pending).toBe(true);
        timer.flush();
        expect(callback).toHaveBeenCalledTimes(1);
        advance(200);
        expect(callback).toHaveBeenCalledTimes(1);
    });
});
