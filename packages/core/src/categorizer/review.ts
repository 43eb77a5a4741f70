/**
 * Review aggregation: which merchants still need a human decision.
 */

import type { ResolutionOutcome, ReviewEntry } from '../types/index.js';
import { compareText } from '../utils/normalize.js';
import { isUncategorized } from '../utils/sentinel.js';

/**
 * Group undecided outcomes by canonical payee.
 *
 * Kept: outcomes with a null or Uncategorized category (any case). Grouping is
 * case-sensitive; `current_category` comes from the first occurrence.
 * Ordered by count descending, then payee.
 *
 * @example
 * // 3× "SAFEWAY #1138" resolving to payee "safeway #1138"
 * aggregateReview(outcomes) // [{ merchant: 'safeway #1138', current_category: 'Uncategorized', count_in_run: 3 }]
 */
export function aggregateReview(outcomes: readonly ResolutionOutcome[]): ReviewEntry[] {
    const byPayee = new Map<string, ReviewEntry>();

    for (const outcome of outcomes) {
        if (outcome.category !== null && !isUncategorized(outcome.category)) continue;

        const entry = byPayee.get(outcome.canonical_payee);
        if (entry) {
            entry.count_in_run++;
        } else {
            byPayee.set(outcome.canonical_payee, {
                merchant: outcome.canonical_payee,
                current_category: outcome.category,
                count_in_run: 1,
            });
        }
    }

    return [...byPayee.values()].sort(
        (a, b) => b.count_in_run - a.count_in_run || compareText(a.merchant, b.merchant)
    );
}
