/**
 * Store and pattern validation.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { PATTERN_VALIDATION } from '../types/index.js';
import { isUncategorized } from '../utils/sentinel.js';
import type {
    CollisionResult,
    PatternFlags,
    PatternValidationResult,
    StoreValidationResult,
} from '../types/index.js';
import { compilePattern, parseFlags } from './flags.js';
import { findCategory } from './store.js';
import type { RuleStore } from './types.js';

/**
 * Check the store for consistency problems.
 *
 * Checks:
 * - each category is in exactly one group (only when groups are tracked)
 * - no empty groups, no unknown group members
 * - exact and pattern rules point at known categories
 * - every pattern compiles
 */
export function validateStore(store: RuleStore): StoreValidationResult {
    const issues: string[] = [];
    const known = (category: string) =>
        isUncategorized(category) || findCategory(store, category) !== undefined;

    if (store.groupsTracked) {
        for (const category of store.categories) {
            const owners = [...store.groups]
                .filter(([, members]) => members.includes(category))
                .map(([group]) => group);
            if (owners.length === 0) {
                issues.push(`Category "${category}" is not assigned to a group`);
            } else if (owners.length > 1) {
                issues.push(`Category "${category}" is in more than one group: ${owners.join(', ')}`);
            }
        }
    }

    for (const [group, members] of store.groups) {
        if (members.length === 0) {
            issues.push(`Group "${group}" has no categories`);
        }
        for (const member of members) {
            if (!findCategory(store, member)) {
                issues.push(`Group "${group}" lists unknown category "${member}"`);
            }
        }
    }

    for (const { merchant, rule } of store.exact.values()) {
        if (rule.category !== null && !known(rule.category)) {
            issues.push(`Exact rule "${merchant}" uses unknown category "${rule.category}"`);
        }
    }

    for (const { rule, regex, error, malformed } of store.patterns) {
        if (malformed) {
            issues.push(`Pattern rule "${rule.pattern}" is malformed: ${error ?? 'unknown error'}`);
            continue;
        }
        if (!regex) {
            issues.push(`Pattern "${rule.pattern}" does not compile: ${error ?? 'unknown error'}`);
        }
        if (!known(rule.category)) {
            issues.push(`Pattern "${rule.pattern}" uses unknown category "${rule.category}"`);
        }
    }

    return { valid: issues.length === 0, issues };
}

/**
 * Validate a pattern before adding it as a rule.
 *
 * Breadth check: matching >20% of the sample AND >3 merchants is too broad.
 *
 * @param pattern - Regex source
 * @param flags - Declared flags (default case-insensitive)
 * @param sampleMerchants - Merchants to measure breadth against, usually the known exact keys
 * @returns Validation result with errors and warnings
 */
export function validatePattern(
    pattern: string,
    flags?: PatternFlags,
    sampleMerchants?: readonly string[]
): PatternValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!pattern || pattern.trim() === '') {
        errors.push('Pattern cannot be empty');
        return { valid: false, errors, warnings };
    }

    const compiled = compilePattern({ pattern, flags, normalized: pattern, category: pattern });
    if (!compiled.regex) {
        errors.push(`Invalid regex syntax: "${pattern}" (${compiled.error ?? 'unknown error'})`);
        return { valid: false, errors, warnings };
    }

    if (!sampleMerchants || sampleMerchants.length === 0) {
        return { valid: true, errors, warnings };
    }

    const regex = compiled.regex;
    const matchCount = sampleMerchants.filter((m) => regex.test(m)).length;
    const matchPercent = matchCount / sampleMerchants.length;

    if (
        matchPercent > PATTERN_VALIDATION.MAX_MATCH_PERCENT &&
        matchCount > PATTERN_VALIDATION.MAX_MATCHES_FOR_BROAD
    ) {
        warnings.push(
            `Pattern "${pattern}" is too broad: matches ${matchCount} known merchants ` +
            `(${(matchPercent * 100).toFixed(1)}% > ${PATTERN_VALIDATION.MAX_MATCH_PERCENT * 100}%)`
        );
    }

    return { valid: true, errors, warnings, matchCount, matchPercent };
}

/**
 * Check if a new pattern duplicates an existing pattern rule.
 * Same source and same effective flags is a collision.
 */
export function checkPatternCollision(
    pattern: string,
    flags: PatternFlags | undefined,
    store: RuleStore
): CollisionResult {
    const wanted = [...parseFlags(flags)].sort().join('');
    const collidingPatterns = store.patterns
        .filter(
            ({ rule, malformed }) =>
                !malformed && rule.pattern === pattern && [...parseFlags(rule.flags)].sort().join('') === wanted
        )
        .map(({ rule }) => rule.pattern);

    return {
        hasCollision: collidingPatterns.length > 0,
        collidingPatterns,
    };
}
