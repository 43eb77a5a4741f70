// Schemas
export {
    PatternFlagSchema,
    PatternFlagsSchema,
    PatternRuleSchema,
    ExactRuleSchema,
    RulesFileSchema,
    TransactionRowSchema,
    ResolutionSourceSchema,
    ResolutionOutcomeSchema,
    ResolutionOutputSchema,
    StoreChangeSchema,
    ReviewEntrySchema,
    StoreValidationResultSchema,
    PatternValidationResultSchema,
    CollisionResultSchema,
    SettingsSchema,
    RunManifestSchema,
} from './schemas.js';

// Types
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
    Settings,
    RunManifest,
} from './schemas.js';

// Constants
export {
    UNCATEGORIZED_CATEGORY,
    UNGROUPED_GROUP,
    RULES_VERSION,
    DEFAULT_PATTERN_FLAGS,
    AUTOCOMPLETE_SCORES,
    AUTOCOMPLETE_DEFAULTS,
    REVIEW_COLUMNS,
    PATTERN_VALIDATION,
} from './constants.js';
