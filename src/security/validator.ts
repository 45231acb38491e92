// ─────────────────────────────────────────────────────────────
// Equata  ·  Complexity & Security Validator
// Gates every markup string before it is parsed into the
// canonical tree or handed to persistence.
// ─────────────────────────────────────────────────────────────

import type { ValidationError } from '../core/errors';
import { type EngineConfig, resolveConfig } from '../core/config';
import { scan, commandNames } from '../parser/scanner';
import { build, type BuildResult } from '../parser/builder';
import { structuralDepth, collectMatrices } from '../core/tree';
import { detectUnsafe, sanitize } from './patterns';

export type ValidationResult =
    | { ok: true; value: string }
    | { ok: false; errors: ValidationError[]; sanitized: string };

export interface ValidationReport {
    errors: ValidationError[];
    sanitized: string;
    /** The parse used for the depth and matrix checks; null when the input was too long to parse. */
    parsed: BuildResult | null;
}

export class MarkupValidator {
    readonly config: EngineConfig;

    constructor(config: Partial<EngineConfig> = {}) {
        this.config = resolveConfig(config);
    }

    validate(markup: string): ValidationResult {
        const { errors, sanitized } = this.inspect(markup);
        return errors.length === 0
            ? { ok: true, value: sanitized }
            : { ok: false, errors, sanitized };
    }

    /** Runs every check and keeps the parse, so callers need not build twice. */
    inspect(markup: string): ValidationReport {
        const cfg = this.config;
        const errors: ValidationError[] = [];

        const tooLong = markup.length > cfg.maxLength;
        if (tooLong) {
            errors.push({ code: 'TooLong', length: markup.length, limit: cfg.maxLength });
        }

        for (const pattern of detectUnsafe(markup)) {
            errors.push({ code: 'UnsafeContent', pattern });
        }

        const tokens = scan(markup);

        for (const name of new Set(commandNames(tokens))) {
            if (cfg.deniedCommands.has(name) || !cfg.allowedCommands.has(name)) {
                errors.push({ code: 'DisallowedCommand', name });
            }
        }

        const environments = new Set(tokens.filter(t => t.type === 'EnvironmentBegin').map(t => t.text));
        for (const name of environments) {
            if (!cfg.allowedEnvironments.has(name)) {
                errors.push({ code: 'DisallowedEnvironment', name });
            }
        }

        // Oversized input is never parsed
        let parsed: BuildResult | null = null;
        if (!tooLong) {
            parsed = build(tokens);
            errors.push(...this.checkTree(parsed));
        }

        return { errors, sanitized: sanitize(markup), parsed };
    }

    private checkTree(parsed: BuildResult): ValidationError[] {
        const cfg = this.config;
        const errors: ValidationError[] = [];

        const guard = parsed.ok ? undefined : parsed.errors.find(e => e.code === 'NestingLimit');
        const depth = structuralDepth(parsed.tree);
        if (guard && guard.code === 'NestingLimit') {
            errors.push({ code: 'TooDeep', depth: Math.max(depth, guard.limit), limit: cfg.maxNestingDepth });
        } else if (depth > cfg.maxNestingDepth) {
            errors.push({ code: 'TooDeep', depth, limit: cfg.maxNestingDepth });
        }

        for (const matrix of collectMatrices(parsed.tree)) {
            const rows = matrix.rows.length;
            const cols = matrix.rows[0]?.length ?? 0;
            if (rows > cfg.maxRows || cols > cfg.maxCols) {
                errors.push({ code: 'MatrixTooLarge', rows, cols, maxRows: cfg.maxRows, maxCols: cfg.maxCols });
            }
        }

        return errors;
    }
}

export function validateMarkup(markup: string, config: Partial<EngineConfig> = {}): ValidationResult {
    return new MarkupValidator(config).validate(markup);
}
