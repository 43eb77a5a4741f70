/**
 * Rule store construction and lookups.
 *
 * The store is built from already-loaded data (no file system access here).
 * Duplicate exact keys are a broken invariant and fail at construction,
 * never during resolution.
 */

import { PatternRuleSchema, RulesFileSchema, UNCATEGORIZED_CATEGORY } from '../types/index.js';
import type { ExactRule } from '../types/index.js';
import { normalize, ruleKey } from '../utils/normalize.js';
import { compilePattern } from './flags.js';
import type { CompiledPattern, ExactEntry, RuleStore, RuleStoreInput } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Compile one pattern entry as read from disk.
 * Older files name the payee `canonical`; it stands in for a missing `normalized`.
 * An entry that still fails validation is kept for saving but never matches.
 */
function loadPatternEntry(raw: unknown): CompiledPattern {
    const candidate =
        isRecord(raw) && raw.normalized === undefined && typeof raw.canonical === 'string'
            ? { ...raw, normalized: raw.canonical }
            : raw;

    const result = PatternRuleSchema.safeParse(candidate);
    if (result.success) {
        return compilePattern(result.data, raw);
    }

    const error = result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
    const pattern = isRecord(raw) && typeof raw.pattern === 'string' ? raw.pattern : '';
    return {
        rule: { pattern, normalized: pattern, category: UNCATEGORIZED_CATEGORY },
        raw,
        regex: null,
        error,
        malformed: true,
    };
}

/**
 * Build a rule store from loaded rules, category list and group mapping.
 *
 * @param input - Loaded data; missing parts are treated as empty
 * @returns New rule store
 * @throws Error when the rules file fails schema validation or two exact keys differ only by case
 */
export function createRuleStore(input: RuleStoreInput = {}): RuleStore {
    const file = RulesFileSchema.parse(input.rules ?? {});
    const { rules_version, patterns, exact, ...extras } = file;

    const exactMap = new Map<string, ExactEntry>();
    for (const [merchant, rule] of Object.entries(exact)) {
        const key = ruleKey(merchant);
        const existing = exactMap.get(key);
        if (existing) {
            throw new Error(
                `Duplicate exact rule: "${merchant}" collides with "${existing.merchant}" ` +
                '(exact rule keys are case-insensitive)'
            );
        }
        exactMap.set(key, { merchant, rule });
    }

    const categories: string[] = [];
    for (const name of input.categories ?? []) {
        const category = name.trim();
        if (category && !categories.some((c) => ruleKey(c) === ruleKey(category))) {
            categories.push(category);
        }
    }

    const groups = new Map<string, string[]>();
    for (const [group, members] of input.groups ?? []) {
        groups.set(group, [...members]);
    }

    return {
        rulesVersion: rules_version,
        patterns: patterns.map(loadPatternEntry),
        exact: exactMap,
        categories,
        groups,
        groupsTracked: input.groups != null,
        extras,
    };
}

/**
 * Find the exact rule for a merchant.
 * Tries the merchant as given, then its normalized form (stubs are keyed by normalized payee).
 */
export function findExactRule(store: RuleStore, merchant: string): ExactEntry | undefined {
    return store.exact.get(ruleKey(merchant)) ?? store.exact.get(ruleKey(normalize(merchant)));
}

/**
 * Insert or replace an exact rule, keeping the persisted key and any extra fields
 * of an existing entry.
 */
export function setExactRule(store: RuleStore, merchant: string, category: string | null): ExactEntry {
    const existing = findExactRule(store, merchant);
    const rule: ExactRule = { ...existing?.rule, category };
    const entry: ExactEntry = { merchant: existing?.merchant ?? merchant, rule };
    store.exact.set(ruleKey(entry.merchant), entry);
    return entry;
}

/**
 * Find a category by case-insensitive name.
 */
export function findCategory(store: RuleStore, category: string): string | undefined {
    const key = ruleKey(category);
    return store.categories.find((c) => ruleKey(c) === key);
}

/**
 * Group a category belongs to, if any.
 */
export function findGroupOf(store: RuleStore, category: string): string | undefined {
    for (const [group, members] of store.groups) {
        if (members.includes(category)) return group;
    }
    return undefined;
}
