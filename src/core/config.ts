// ─────────────────────────────────────────────────────────────
// Equata  ·  Engine Configuration
// ─────────────────────────────────────────────────────────────

import allowlist from '../security/allowlist.json';

export interface EngineConfig {
    maxLength: number;
    maxNestingDepth: number;
    maxRows: number;
    maxCols: number;
    allowedCommands: ReadonlySet<string>;
    deniedCommands: ReadonlySet<string>;
    allowedEnvironments: ReadonlySet<string>;
    /** Quiet period before typed markup is reparsed. */
    textualDebounceMs: number;
    /** Quiet period before a structural edit is published to the text view. */
    structuralDebounceMs: number;
    historyLimit: number;
}

export const DEFAULT_CONFIG: EngineConfig = {
    maxLength: 10_000,
    maxNestingDepth: 50,
    maxRows: 100,
    maxCols: 100,
    allowedCommands: new Set(allowlist.allowed),
    deniedCommands: new Set(allowlist.denied),
    allowedEnvironments: new Set(allowlist.environments),
    textualDebounceMs: 300,
    structuralDebounceMs: 150,
    historyLimit: 50,
};

const NUMERIC_KEYS = [
    'maxLength', 'maxNestingDepth', 'maxRows', 'maxCols',
    'textualDebounceMs', 'structuralDebounceMs', 'historyLimit',
] as const;

/**
 * Merge overrides onto the defaults and reject inconsistent settings.
 * Throws: a bad configuration is a programming error, not user input.
 */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
    const config = { ...DEFAULT_CONFIG, ...overrides };

    for (const key of NUMERIC_KEYS) {
        const value = config[key];
        if (!Number.isFinite(value) || value < 0) {
            throw new Error(`Invalid configuration: ${key} must be a non-negative number (got ${value})`);
        }
    }
    for (const key of ['maxLength', 'maxNestingDepth', 'maxRows', 'maxCols'] as const) {
        if (config[key] < 1) {
            throw new Error(`Invalid configuration: ${key} must be at least 1`);
        }
    }

    const overlap = [...config.deniedCommands].filter(name => config.allowedCommands.has(name));
    if (overlap.length > 0) {
        throw new Error(`Invalid configuration: commands both allowed and denied: ${overlap.join(', ')}`);
    }

    return config;
}
