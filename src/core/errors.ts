// ─────────────────────────────────────────────────────────────
// Equata  ·  Results & Error Taxonomy
// ─────────────────────────────────────────────────────────────

import type { Path } from './ast';

export type Result<T, E> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

// ── Parse-time (recoverable: a partial tree comes with them) ─

export type ParseError =
    | { code: 'UnbalancedGroup'; position: number; message: string }
    | { code: 'ArityMismatch'; position: number; command: string; message: string }
    | { code: 'NestingLimit'; position: number; limit: number; message: string };

// ── Validation-time (the offending input is rejected) ───────

export type UnsafePatternClass =
    | 'script'
    | 'markup-tag'
    | 'event-handler'
    | 'protocol-scheme'
    | 'file-access'
    | 'shell-escape'
    | 'macro-definition'
    | 'package-loading';

export type ValidationError =
    | { code: 'TooLong'; length: number; limit: number }
    | { code: 'UnsafeContent'; pattern: UnsafePatternClass }
    | { code: 'DisallowedCommand'; name: string }
    | { code: 'DisallowedEnvironment'; name: string }
    | { code: 'TooDeep'; depth: number; limit: number }
    | { code: 'MatrixTooLarge'; rows: number; cols: number; maxRows: number; maxCols: number };

// ── Edit-time (the coordinator keeps the prior tree) ────────

export type EditError =
    | { code: 'InvalidPath'; path: Path }
    | { code: 'NotAPlaceholder'; path: Path }
    | { code: 'TooDeep'; depth: number; limit: number }
    | { code: 'UnknownTemplate'; id: string }
    | { code: 'NothingToUndo' }
    | { code: 'NothingToRedo' };

// ── Human-readable messages ─────────────────────────────────

export function describeValidationError(e: ValidationError): string {
    switch (e.code) {
        case 'TooLong':
            return `Formula too long (max ${e.limit.toLocaleString('en-US')} characters, got ${e.length.toLocaleString('en-US')})`;
        case 'UnsafeContent':
            return `Formula contains unsafe content (${e.pattern})`;
        case 'DisallowedCommand':
            return `Command not allowed: \\${e.name}`;
        case 'DisallowedEnvironment':
            return `Environment not allowed: ${e.name}`;
        case 'TooDeep':
            return `Formula too deeply nested (max ${e.limit} levels, got ${e.depth})`;
        case 'MatrixTooLarge':
            return `Matrix too large (max ${e.maxRows}×${e.maxCols}, got ${e.rows}×${e.cols})`;
    }
}

export function describeEditError(e: EditError): string {
    switch (e.code) {
        case 'InvalidPath':
            return `No node at path [${e.path.join(', ')}]`;
        case 'NotAPlaceholder':
            return `Node at path [${e.path.join(', ')}] is not an empty slot`;
        case 'TooDeep':
            return `Edit would nest the formula ${e.depth} levels deep (max ${e.limit})`;
        case 'UnknownTemplate':
            return `Unknown template: ${e.id}`;
        case 'NothingToUndo':
            return 'Nothing to undo';
        case 'NothingToRedo':
            return 'Nothing to redo';
    }
}
