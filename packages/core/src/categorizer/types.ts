/**
 * Internal types for categorizer module.
 */

import type {
    PatternRule,
    ExactRule,
    ResolutionOutcome,
    ResolutionSource,
    StoreChange,
} from '../types/index.js';

/**
 * Pattern rule with its regex compiled once at load time.
 * `raw` is the rule exactly as read, written back unchanged on save.
 * A malformed entry keeps only its pattern text and never matches.
 */
export interface CompiledPattern {
    rule: PatternRule;
    raw: unknown;
    regex: RegExp | null;
    error?: string;
    malformed?: boolean;
}

/**
 * Exact rule plus the merchant key as it is persisted.
 */
export interface ExactEntry {
    merchant: string;
    rule: ExactRule;
}

/**
 * In-memory rule store and taxonomy.
 * Passed by reference into resolve() and applyOutcome(); the only mutable state of a run.
 */
export interface RuleStore {
    rulesVersion: number;
    patterns: CompiledPattern[];
    /** Keyed by ruleKey(merchant). */
    exact: Map<string, ExactEntry>;
    categories: string[];
    groups: Map<string, string[]>;
    /** False when no group file was loaded; new categories then never need a group. */
    groupsTracked: boolean;
    /** Unknown top-level keys of rules.json, kept for round-tripping. */
    extras: Record<string, unknown>;
}

/**
 * Already-loaded inputs for createRuleStore(). Anything missing means empty.
 */
export interface RuleStoreInput {
    /** Parsed rules.json content, validated against RulesFileSchema. */
    rules?: unknown;
    categories?: readonly string[];
    groups?: ReadonlyMap<string, readonly string[]> | null;
}

/**
 * Result of pattern matching against a single rule.
 */
export interface MatchResult {
    matched: boolean;
    warning?: string;
}

/**
 * Result of applyOutcome(). `store` is the same object that was passed in.
 */
export interface ApplyResult {
    store: RuleStore;
    changes: StoreChange[];
}

/**
 * Statistics from batch resolution.
 */
export interface ResolutionStats {
    total: number;
    bySource: Record<ResolutionSource, number>;
    needsReview: number;
}

export interface ResolveAllResult {
    outcomes: ResolutionOutcome[];
    warnings: string[];
    changes: StoreChange[];
    stats: ResolutionStats;
}
