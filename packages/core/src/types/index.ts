/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    PatternFlag,
    PatternFlags,
    PatternRule,
    PatternRuleInput,
    ExactRule,
    RulesFile,
    RulesFileInput,
    TransactionRow,
    ResolutionSource,
    ResolutionOutcome,
    ResolutionOutput,
    StoreChange,
    ReviewEntry,
    StoreValidationResult,
    PatternValidationResult,
    CollisionResult,
} from '@payee-match/shared';

export {
    RulesFileSchema,
    PatternRuleSchema,
    ExactRuleSchema,
    UNCATEGORIZED_CATEGORY,
    UNGROUPED_GROUP,
    RULES_VERSION,
    DEFAULT_PATTERN_FLAGS,
    AUTOCOMPLETE_SCORES,
    AUTOCOMPLETE_DEFAULTS,
    PATTERN_VALIDATION,
} from '@payee-match/shared';
