/**
 * Categorizer module: merchant resolution and rule learning.
 */

export { createRuleStore, findExactRule, setExactRule, findCategory, findGroupOf } from './store.js';
export { parseFlags, stripExtended, compilePattern } from './flags.js';
export { matchesPattern, isValidPattern } from './match.js';
export { resolve, resolveAll } from './resolve.js';
export { applyOutcome, applyDecision, assignGroup, categoriesNeedingGroup, addPatternRule } from './mutate.js';
export { aggregateReview } from './review.js';
export { toRulesFile, serializeRules, serializeCategories, serializeGroups, fingerprintStore } from './serialize.js';
export { parseCategories, parseGroups } from './taxonomy.js';
export { validateStore, validatePattern, checkPatternCollision } from './validate.js';
export type {
    CompiledPattern,
    ExactEntry,
    RuleStore,
    RuleStoreInput,
    MatchResult,
    ApplyResult,
    ResolutionStats,
    ResolveAllResult,
} from './types.js';
export type { PersistedRules } from './serialize.js';
