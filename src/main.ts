// ─────────────────────────────────────────────────────────────
// Equata  ·  Entry Point
// ─────────────────────────────────────────────────────────────

import { SyncCoordinator, type SyncOptions } from './engine/sync';
import { createKatexRenderer } from './bridge/katex-renderer';

export interface MathEditorOptions extends SyncOptions {
    /** Typeset previews in display style (default) or inline. */
    displayMode?: boolean;
}

/**
 * Create an independent editor. The caller keeps the returned handle;
 * nothing is registered globally.
 */
export function createMathEditor(options: MathEditorOptions = {}): SyncCoordinator {
    const { displayMode = true, ...sync } = options;
    const renderer = sync.renderer === undefined ? createKatexRenderer({ displayMode }) : sync.renderer;
    return new SyncCoordinator({ ...sync, renderer });
}

export { SyncCoordinator } from './engine/sync';
export type { SyncOptions, SyncState, SyncEvents, Notice, EditOutcome, EditSource, CompletedEdit } from './engine/sync';

export type { ExprNode, NodeKind, Path, FormatKind, BigOperatorKind } from './core/ast';
export { mk, wrapItems } from './core/ast';
export { nodeAt, replaceAt, treesEqual, structuralDepth } from './core/tree';
export { describeTree } from './core/pretty';
export type { EngineConfig } from './core/config';
export { DEFAULT_CONFIG, resolveConfig } from './core/config';
export type { Result, ParseError, ValidationError, EditError, UnsafePatternClass } from './core/errors';
export { describeValidationError, describeEditError } from './core/errors';

export { scan } from './parser/scanner';
export type { Token, TokenType } from './parser/scanner';
export { build, parseMarkup } from './parser/builder';
export type { BuildResult, BuildOptions } from './parser/builder';
export { serialize } from './emitters/markup';

export { MarkupValidator, validateMarkup } from './security/validator';
export type { ValidationResult, ValidationReport } from './security/validator';
export { sanitize } from './security/patterns';

export {
    enumeratePlaceholders, nextPlaceholder, previousPlaceholder, fillPlaceholder, PlaceholderNavigator,
} from './engine/placeholders';
export { DEFAULT_TEMPLATES, TemplateCatalog } from './engine/templates';
export type { TemplateDefinition } from './engine/templates';
export { renderMarkup, createKatexRenderer } from './bridge/katex-renderer';
export type { RenderOutcome, Renderer } from './bridge/katex-renderer';
