/**
 * Merchant resolution with a fixed precedence (first applicable wins):
 * 1. Category supplied by the CSV row
 * 2. Pattern rules, in list order
 * 3. Exact rule with a category
 * 4. Exact stub (known merchant, no category yet)
 * 5. Unseen merchant: Uncategorized, new stub
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import { normalize } from '../utils/normalize.js';
import { isUncategorized } from '../utils/sentinel.js';
import { UNCATEGORIZED_CATEGORY } from '../types/index.js';
import type { ResolutionOutcome, ResolutionOutput, StoreChange, TransactionRow } from '../types/index.js';
import { matchesPattern } from './match.js';
import { findExactRule } from './store.js';
import { applyOutcome } from './mutate.js';
import type { ResolutionStats, ResolveAllResult, RuleStore } from './types.js';

/**
 * Resolve a raw merchant to a canonical payee and category.
 *
 * Does not modify the store; pass the outcome to applyOutcome() for that.
 *
 * @param rawMerchant - Merchant text from the statement
 * @param csvCategory - Category already present on the CSV row, if any
 * @param store - Rule store to consult
 * @returns ResolutionOutput with outcome and any warnings
 */
export function resolve(
    rawMerchant: string,
    csvCategory: string | null,
    store: RuleStore
): ResolutionOutput {
    const warnings: string[] = [];
    const raw = rawMerchant.trim();
    const csv = csvCategory?.trim();

    const outcome = (fields: Omit<ResolutionOutcome, 'raw_merchant'>): ResolutionOutput => ({
        outcome: { raw_merchant: raw, ...fields },
        warnings,
    });

    // 1. CSV-provided category always wins
    if (csv) {
        return outcome({
            canonical_payee: raw,
            category: csv,
            source: 'csv-provided',
            is_new_stub: false,
            needs_review: isUncategorized(csv),
        });
    }

    // 2. Pattern rules, first match wins
    for (const compiled of store.patterns) {
        const { matched, warning } = matchesPattern(raw, compiled);
        if (warning) {
            warnings.push(warning);
        }
        if (matched) {
            return outcome({
                canonical_payee: compiled.rule.normalized,
                category: compiled.rule.category,
                source: 'pattern-match',
                is_new_stub: false,
                needs_review: isUncategorized(compiled.rule.category),
            });
        }
    }

    const entry = findExactRule(store, raw);
    const normalized = normalize(raw) || raw;

    // 3. Exact rule with a category
    if (entry && entry.rule.category !== null) {
        return outcome({
            canonical_payee: entry.merchant,
            category: entry.rule.category,
            source: 'exact-match',
            is_new_stub: false,
            needs_review: isUncategorized(entry.rule.category),
        });
    }

    // 4. Known stub, still undecided
    if (entry) {
        return outcome({
            canonical_payee: normalized,
            category: null,
            source: 'exact-match',
            is_new_stub: false,
            needs_review: true,
        });
    }

    // 5. Unseen merchant
    return outcome({
        canonical_payee: normalized,
        category: UNCATEGORIZED_CATEGORY,
        source: 'fallback-uncategorized',
        is_new_stub: true,
        needs_review: true,
    });
}

/**
 * Resolve and apply a batch of rows, in input order.
 *
 * Order matters: a CSV category seen later for the same merchant overrides
 * what earlier rows resolved to.
 *
 * @param rows - Activity rows from the CSV layer
 * @param store - Rule store, mutated as rows are applied
 * @returns Outcomes, de-duplicated warnings, store changes and stats
 */
export function resolveAll(rows: readonly TransactionRow[], store: RuleStore): ResolveAllResult {
    const outcomes: ResolutionOutcome[] = [];
    const allWarnings: string[] = [];
    const changes: StoreChange[] = [];
    const stats: ResolutionStats = {
        total: rows.length,
        bySource: {
            'csv-provided': 0,
            'pattern-match': 0,
            'exact-match': 0,
            'fallback-uncategorized': 0,
            'user-decision': 0,
        },
        needsReview: 0,
    };

    for (const row of rows) {
        const { outcome, warnings } = resolve(row.raw_merchant, row.csv_category, store);
        outcomes.push(outcome);

        for (const w of warnings) {
            if (!allWarnings.includes(w)) {
                allWarnings.push(w);
            }
        }

        changes.push(...applyOutcome(outcome, store).changes);

        stats.bySource[outcome.source]++;
        if (outcome.needs_review) {
            stats.needsReview++;
        }
    }

    return { outcomes, warnings: allWarnings, changes, stats };
}
