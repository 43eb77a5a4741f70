/**
 * Rule mutation: learning from resolution outcomes.
 *
 * Every effect is idempotent. Applying the same outcome twice leaves the store
 * as it was after the first application and reports no further changes.
 */

import type { PatternRule, ResolutionOutcome, StoreChange } from '../types/index.js';
import { compilePattern } from './flags.js';
import { findCategory, findExactRule, findGroupOf, setExactRule } from './store.js';
import type { ApplyResult, CompiledPattern, RuleStore } from './types.js';
import { isUncategorized } from '../utils/sentinel.js';

function ensureCategory(store: RuleStore, category: string, changes: StoreChange[]): void {
    if (isUncategorized(category) || findCategory(store, category)) return;
    store.categories.push(category);
    changes.push({
        type: 'category-added',
        category,
        needs_group: store.groupsTracked && !findGroupOf(store, category),
    });
}

function ensureStub(store: RuleStore, merchant: string, changes: StoreChange[]): void {
    if (findExactRule(store, merchant)) return;
    setExactRule(store, merchant, null);
    changes.push({ type: 'stub-created', merchant });
}

function upsertRule(store: RuleStore, merchant: string, category: string, changes: StoreChange[]): void {
    const existing = findExactRule(store, merchant);
    const previous = existing?.rule.category ?? null;
    if (previous === category) return;

    const entry = setExactRule(store, merchant, category);
    if (previous === null) {
        changes.push({ type: 'rule-set', merchant: entry.merchant, category });
    } else {
        changes.push({
            type: 'rule-overwritten',
            merchant: entry.merchant,
            previous_category: previous,
            category,
        });
    }
}

/**
 * Apply a resolution outcome to the store.
 *
 * - New categories (never the Uncategorized sentinel) join the category list.
 * - New stubs are inserted with a null category; existing rules are never downgraded.
 * - CSV and user decisions set the exact rule, overwriting stubs. Replacing a
 *   different category is reported as `rule-overwritten`.
 *
 * @param outcome - Outcome from resolve() or applyDecision()
 * @param store - Store to mutate in place
 * @returns The same store plus the changes made
 */
export function applyOutcome(outcome: ResolutionOutcome, store: RuleStore): ApplyResult {
    const changes: StoreChange[] = [];
    const assigned =
        outcome.category !== null && !isUncategorized(outcome.category) ? outcome.category : null;

    if (assigned) {
        ensureCategory(store, assigned, changes);
    }

    if (outcome.source === 'csv-provided' || outcome.source === 'user-decision') {
        if (assigned) {
            upsertRule(store, outcome.canonical_payee, assigned, changes);
        } else {
            ensureStub(store, outcome.canonical_payee, changes);
        }
    } else if (outcome.is_new_stub) {
        ensureStub(store, outcome.canonical_payee, changes);
    }

    return { store, changes };
}

/**
 * Put a category into exactly one group, creating the group when needed.
 * The category is added to the category list if it is not there yet.
 * A group left without members is removed.
 */
export function assignGroup(store: RuleStore, category: string, group: string): void {
    const name = findCategory(store, category) ?? category;
    if (!findCategory(store, name)) {
        store.categories.push(name);
    }

    for (const [other, members] of store.groups) {
        if (other === group || !members.includes(name)) continue;
        const remaining = members.filter((m) => m !== name);
        if (remaining.length > 0) {
            store.groups.set(other, remaining);
        } else {
            store.groups.delete(other);
        }
    }

    const members = store.groups.get(group) ?? [];
    if (!members.includes(name)) {
        members.push(name);
    }
    store.groups.set(group, members);
    store.groupsTracked = true;
}

/**
 * Append a pattern rule. Existing rules keep their order, so the new rule
 * only applies where no earlier pattern matches. An unknown category is
 * added to the category list.
 *
 * @returns The compiled rule (check `regex` for a compile error) and store changes
 */
export function addPatternRule(
    store: RuleStore,
    rule: PatternRule
): { compiled: CompiledPattern; changes: StoreChange[] } {
    const changes: StoreChange[] = [];
    ensureCategory(store, rule.category, changes);
    const compiled = compilePattern(rule);
    store.patterns.push(compiled);
    return { compiled, changes };
}

/**
 * Categories that belong to no group, in list order.
 */
export function categoriesNeedingGroup(store: RuleStore): string[] {
    return store.categories.filter((c) => !findGroupOf(store, c));
}

/**
 * Record a human decision for an outcome at the review boundary.
 * An empty category leaves the merchant undecided.
 *
 * @returns New outcome with source `user-decision`; the input is not modified
 */
export function applyDecision(outcome: ResolutionOutcome, category: string | null): ResolutionOutcome {
    const chosen = category?.trim() || null;
    return {
        ...outcome,
        category: chosen,
        source: 'user-decision',
        is_new_stub: false,
        needs_review: chosen === null || isUncategorized(chosen),
    };
}
