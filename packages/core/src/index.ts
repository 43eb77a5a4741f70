// Types (re-exported from shared)
export type {
    PatternFlag,
    PatternFlags,
    PatternRule,
    ExactRule,
    RulesFile,
    TransactionRow,
    ResolutionSource,
    ResolutionOutcome,
    ResolutionOutput,
    StoreChange,
    ReviewEntry,
    StoreValidationResult,
    PatternValidationResult,
    CollisionResult,
} from './types/index.js';

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
} from './types/index.js';

// Utils
export { normalize, ruleKey, slugify, compareText, isUncategorized } from './utils/index.js';

// Categorizer
export {
    createRuleStore,
    findExactRule,
    setExactRule,
    findCategory,
    findGroupOf,
    parseFlags,
    stripExtended,
    compilePattern,
    matchesPattern,
    isValidPattern,
    resolve,
    resolveAll,
    applyOutcome,
    applyDecision,
    assignGroup,
    categoriesNeedingGroup,
    addPatternRule,
    aggregateReview,
    toRulesFile,
    serializeRules,
    serializeCategories,
    serializeGroups,
    fingerprintStore,
    parseCategories,
    parseGroups,
    validateStore,
    validatePattern,
    checkPatternCollision,
} from './categorizer/index.js';
export type {
    CompiledPattern,
    ExactEntry,
    RuleStore,
    RuleStoreInput,
    MatchResult,
    ApplyResult,
    ResolutionStats,
    ResolveAllResult,
    PersistedRules,
} from './categorizer/index.js';

// Autocomplete
export { buildItems, createItem, buildIndex, query, isSubsequence, damerauLevenshtein } from './autocomplete/index.js';
export type {
    AutocompleteItem,
    AutocompleteIndex,
    MatchTarget,
    IndexEntry,
    BuildIndexOptions,
    QueryOptions,
    RankedItem,
} from './autocomplete/index.js';
