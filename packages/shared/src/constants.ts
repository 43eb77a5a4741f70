/**
 * Constants for payee-match.
 */

/**
 * Sentinel category for merchants no rule knows about yet.
 * Stored as a null exact rule, never added to the category list.
 */
export const UNCATEGORIZED_CATEGORY = 'Uncategorized';

/**
 * Bucket for categories listed before any header in the groups file.
 */
export const UNGROUPED_GROUP = 'Ungrouped';

/**
 * Current rules.json format version.
 */
export const RULES_VERSION = 1;

/**
 * Flags applied to a pattern rule that declares none.
 * Pattern matching has always been case-insensitive by default.
 */
export const DEFAULT_PATTERN_FLAGS = 'i';

/**
 * Pattern breadth thresholds for add-pattern.
 * A pattern matching more than 20% of known merchants AND more than 3 is too broad.
 */
export const PATTERN_VALIDATION = {
    MAX_MATCH_PERCENT: 0.2,
    MAX_MATCHES_FOR_BROAD: 3,
} as const;

/**
 * Autocomplete score components.
 */
export const AUTOCOMPLETE_SCORES = {
    EXACT_MATCH: 1000,
    TOKEN_PREFIX: 200,
    WHOLE_TOKEN: 80,
    SUBSTRING: 60,
    TOKENS_IN_ORDER: 80,
    STARTS_WITH: 120,
    LENGTH_PENALTY_PER_CHAR: 0.5,
    FUZZY_BASE: 50,
    FUZZY_STEP: 10,
} as const;

/**
 * Autocomplete tuning defaults.
 */
export const AUTOCOMPLETE_DEFAULTS = {
    PREFIX_CAP: 6,
    FUZZY_MAX_DISTANCE: 2,
    FUZZY_MIN_CANDIDATES: 3,
    ALIAS_PENALTY: 10,
    DISPLAY_LIMIT: 10,
} as const;

/**
 * Column headers of the review report.
 */
export const REVIEW_COLUMNS = ['Merchant', 'CurrentCategory', 'CountInThisRun'] as const;
