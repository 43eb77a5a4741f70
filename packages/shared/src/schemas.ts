/**
 * Zod schemas for payee-match data structures.
 *
 * IMPORTANT: Amounts are stored as decimal strings, never native numbers.
 * Convert to Decimal at computation boundaries.
 */

import { z } from 'zod';
import { AUTOCOMPLETE_DEFAULTS, RULES_VERSION } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Single regex flag a pattern rule may declare.
 */
export const PatternFlagSchema = z.enum(['i', 'm', 's', 'x']);

export type PatternFlag = z.infer<typeof PatternFlagSchema>;

/**
 * Flags as persisted: either a compact string ("im") or a list (["i", "m"]).
 */
export const PatternFlagsSchema = z.union([
    z.string().regex(/^[imsx]*$/, 'Flags may only contain i, m, s, x'),
    z.array(PatternFlagSchema),
]);

export type PatternFlags = z.infer<typeof PatternFlagsSchema>;

// ============================================================================
// Rule Schemas
// ============================================================================

/**
 * Regex pattern rule. Evaluated in list order; first match wins.
 * Unknown keys are kept so a save writes the rule back as it was read.
 */
export const PatternRuleSchema = z
    .object({
        pattern: z.string().min(1),
        flags: PatternFlagsSchema.optional(),
        normalized: z.string().min(1),
        category: z.string().min(1),
    })
    .passthrough();

export type PatternRule = z.infer<typeof PatternRuleSchema>;
export type PatternRuleInput = z.input<typeof PatternRuleSchema>;

/**
 * Exact merchant rule. A null category marks a stub.
 */
export const ExactRuleSchema = z
    .object({
        category: z.string().trim().min(1).nullable().default(null),
    })
    .passthrough();

export type ExactRule = z.infer<typeof ExactRuleSchema>;

/**
 * Persisted rules.json document.
 * Pattern entries are checked one at a time against {@link PatternRuleSchema}
 * when the store is built, so one bad entry does not reject the file.
 */
export const RulesFileSchema = z
    .object({
        rules_version: z.number().int().min(1).default(RULES_VERSION),
        patterns: z.array(z.unknown()).default([]),
        exact: z.record(z.string(), ExactRuleSchema).default({}),
    })
    .passthrough();

export type RulesFile = z.infer<typeof RulesFileSchema>;
export type RulesFileInput = z.input<typeof RulesFileSchema>;

// ============================================================================
// Transaction Input
// ============================================================================

/**
 * One activity row as handed to the core by the CSV layer.
 */
export const TransactionRowSchema = z.object({
    raw_merchant: z.string().trim().min(1),
    amount: decimalString,
    date: z.string(),
    csv_category: z.string().nullable(),
    notes: z.string().nullable(),
});

export type TransactionRow = z.infer<typeof TransactionRowSchema>;

// ============================================================================
// Resolution Schemas
// ============================================================================

export const ResolutionSourceSchema = z.enum([
    'csv-provided',
    'pattern-match',
    'exact-match',
    'fallback-uncategorized',
    'user-decision',
]);

export type ResolutionSource = z.infer<typeof ResolutionSourceSchema>;

/**
 * What resolve() decided for a single merchant occurrence.
 */
export const ResolutionOutcomeSchema = z.object({
    raw_merchant: z.string(),
    canonical_payee: z.string(),
    category: z.string().nullable(),
    source: ResolutionSourceSchema,
    is_new_stub: z.boolean(),
    needs_review: z.boolean(),
});

export type ResolutionOutcome = z.infer<typeof ResolutionOutcomeSchema>;

/**
 * Resolution output - wraps outcome with warnings.
 * Per architectural constraint: no console.* in core.
 */
export const ResolutionOutputSchema = z.object({
    outcome: ResolutionOutcomeSchema,
    warnings: z.array(z.string()),
});

export type ResolutionOutput = z.infer<typeof ResolutionOutputSchema>;

/**
 * Store mutation descriptor returned by applyOutcome().
 */
export const StoreChangeSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('category-added'),
        category: z.string(),
        needs_group: z.boolean(),
    }),
    z.object({
        type: z.literal('stub-created'),
        merchant: z.string(),
    }),
    z.object({
        type: z.literal('rule-set'),
        merchant: z.string(),
        category: z.string(),
    }),
    z.object({
        type: z.literal('rule-overwritten'),
        merchant: z.string(),
        previous_category: z.string(),
        category: z.string(),
    }),
]);

export type StoreChange = z.infer<typeof StoreChangeSchema>;

/**
 * Aggregated review row for merchants still lacking a category.
 */
export const ReviewEntrySchema = z.object({
    merchant: z.string(),
    current_category: z.string().nullable(),
    count_in_run: z.number().int().min(1),
});

export type ReviewEntry = z.infer<typeof ReviewEntrySchema>;

/**
 * Store consistency check result.
 */
export const StoreValidationResultSchema = z.object({
    valid: z.boolean(),
    issues: z.array(z.string()),
});

export type StoreValidationResult = z.infer<typeof StoreValidationResultSchema>;

/**
 * Pattern validation result (add-pattern).
 */
export const PatternValidationResultSchema = z.object({
    valid: z.boolean(),
    errors: z.array(z.string()),
    warnings: z.array(z.string()),
    matchCount: z.number().int().optional(),
    matchPercent: z.number().optional(),
});

export type PatternValidationResult = z.infer<typeof PatternValidationResultSchema>;

/**
 * Pattern collision check result.
 */
export const CollisionResultSchema = z.object({
    hasCollision: z.boolean(),
    collidingPatterns: z.array(z.string()),
});

export type CollisionResult = z.infer<typeof CollisionResultSchema>;

// ============================================================================
// Settings Schema
// ============================================================================

/**
 * Workspace settings (config/settings.yaml). Every key is optional.
 */
export const SettingsSchema = z.object({
    autocomplete: z
        .object({
            prefix_cap: z.number().int().min(1).default(AUTOCOMPLETE_DEFAULTS.PREFIX_CAP),
            fuzzy_max_distance: z.number().int().min(0).default(AUTOCOMPLETE_DEFAULTS.FUZZY_MAX_DISTANCE),
            fuzzy_min_candidates: z.number().int().min(0).default(AUTOCOMPLETE_DEFAULTS.FUZZY_MIN_CANDIDATES),
            alias_penalty: z.number().min(0).default(AUTOCOMPLETE_DEFAULTS.ALIAS_PENALTY),
            limit: z.number().int().min(1).default(AUTOCOMPLETE_DEFAULTS.DISPLAY_LIMIT),
        })
        .default({}),
    aliases: z.record(z.string(), z.array(z.string())).default({}),
    default_group: z.string().trim().min(1).optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ============================================================================
// Run Manifest Schema
// ============================================================================

/**
 * Run manifest written next to the review report.
 */
export const RunManifestSchema = z.object({
    activity_file: z.string(),
    activity_hash: z.string(),
    run_timestamp: z.string(),
    row_count: z.number().int().min(0),
    by_source: z.object({
        'csv-provided': z.number().int().min(0),
        'pattern-match': z.number().int().min(0),
        'exact-match': z.number().int().min(0),
        'fallback-uncategorized': z.number().int().min(0),
        'user-decision': z.number().int().min(0),
    }),
    review_count: z.number().int().min(0),
    rules_fingerprint_before: z.string(),
    rules_fingerprint_after: z.string(),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
