// ─────────────────────────────────────────────────────────────
// Equata  ·  Placeholder Navigation & Filling
// ─────────────────────────────────────────────────────────────

import type { ExprNode, Path } from '../core/ast';
import { type Result, type EditError, ok, err } from '../core/errors';
import { childrenOf, nodeAt, replaceAt, pathsEqual, structuralDepth } from '../core/tree';

/** Paths of every empty slot, depth-first and left to right (tab order). */
export function enumeratePlaceholders(root: ExprNode): Path[] {
    const found: Path[] = [];
    const visit = (node: ExprNode, path: number[]): void => {
        if (node.kind === 'Placeholder') {
            found.push(path);
            return;
        }
        childrenOf(node).forEach((child, i) => visit(child, [...path, i]));
    };
    visit(root, []);
    return found;
}

function indexOfPath(paths: readonly Path[], current: Path | null): number {
    if (current === null) return -1;
    return paths.findIndex(p => pathsEqual(p, current));
}

/** Following slot, wrapping at the end. An empty list leaves `current` as is. */
export function nextPlaceholder(paths: readonly Path[], current: Path | null): Path | null {
    if (paths.length === 0) return current;
    const i = indexOfPath(paths, current);
    return paths[(i + 1) % paths.length];
}

export function previousPlaceholder(paths: readonly Path[], current: Path | null): Path | null {
    if (paths.length === 0) return current;
    const i = indexOfPath(paths, current);
    return i < 0 ? paths[paths.length - 1] : paths[(i - 1 + paths.length) % paths.length];
}

export interface FillLimits {
    maxNestingDepth: number;
}

/**
 * Substitute the empty slot at `path`. The input tree is never touched;
 * on success a new root shares every subtree off the path.
 */
export function fillPlaceholder(
    root: ExprNode,
    path: Path,
    replacement: ExprNode,
    limits: FillLimits,
): Result<ExprNode, EditError> {
    const target = nodeAt(root, path);
    if (!target) return err({ code: 'InvalidPath', path });
    if (target.kind !== 'Placeholder') return err({ code: 'NotAPlaceholder', path });

    const updated = replaceAt(root, path, replacement);
    if (!updated) return err({ code: 'InvalidPath', path });

    const depth = structuralDepth(updated);
    if (depth > limits.maxNestingDepth) {
        return err({ code: 'TooDeep', depth, limit: limits.maxNestingDepth });
    }
    return ok(updated);
}

/** Tab-order cursor over one tree's empty slots. */
export class PlaceholderNavigator {
    readonly paths: Path[];

    constructor(root: ExprNode) {
        this.paths = enumeratePlaceholders(root);
    }

    get count(): number {
        return this.paths.length;
    }

    first(): Path | null {
        return this.paths[0] ?? null;
    }

    next(current: Path | null): Path | null {
        return nextPlaceholder(this.paths, current);
    }

    previous(current: Path | null): Path | null {
        return previousPlaceholder(this.paths, current);
    }

    /** First slot at or below `prefix`, e.g. inside a freshly inserted subtree. */
    firstWithin(prefix: Path): Path | null {
        return this.paths.find(p => prefix.every((v, i) => p[i] === v)) ?? null;
    }
}
