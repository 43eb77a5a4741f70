import type { Workbook } from 'exceljs';
import type { ResolutionOutcome, ReviewEntry, TransactionRow } from '@payee-match/shared';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatCurrencyColumn } from './utils.js';

/**
 * Review workbook.
 *
 * - "Review": one row per payee that still needs a category, in review order.
 * - "Resolved": every activity row with the payee and category it resolved to.
 *
 * `rows` and `outcomes` are parallel arrays.
 */
export function generateReviewExcel(
    entries: readonly ReviewEntry[],
    rows: readonly TransactionRow[],
    outcomes: readonly ResolutionOutcome[]
): Workbook {
    const workbook = createWorkbook();

    const review = workbook.addWorksheet('Review');
    review.columns = [
        { header: 'Merchant', key: 'merchant' },
        { header: 'CurrentCategory', key: 'current_category' },
        { header: 'CountInThisRun', key: 'count_in_run' },
    ];
    for (const entry of entries) {
        review.addRow({
            merchant: entry.merchant,
            current_category: entry.current_category ?? '',
            count_in_run: entry.count_in_run,
        });
    }
    formatHeaderRow(review);
    autoFitColumns(review);

    const resolved = workbook.addWorksheet('Resolved');
    resolved.columns = [
        { header: 'date', key: 'date' },
        { header: 'raw_merchant', key: 'raw_merchant' },
        { header: 'payee', key: 'payee' },
        { header: 'category', key: 'category' },
        { header: 'source', key: 'source' },
        { header: 'amount', key: 'amount' },
    ];
    outcomes.forEach((outcome, i) => {
        const row = rows[i];
        resolved.addRow({
            date: row?.date ?? '',
            raw_merchant: outcome.raw_merchant,
            payee: outcome.canonical_payee,
            category: outcome.category ?? '',
            source: outcome.source,
            amount: row ? Number(row.amount) : null,
        });
    });
    formatHeaderRow(resolved);
    formatCurrencyColumn(resolved, 'amount');
    autoFitColumns(resolved);

    return workbook;
}
