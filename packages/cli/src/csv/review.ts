import * as XLSX from 'xlsx';
import { REVIEW_COLUMNS, type ReviewEntry } from '@payee-match/shared';

/**
 * Review report as CSV text, header first, one row per payee.
 * An empty current category is written as an empty field.
 */
export function formatReviewCsv(entries: readonly ReviewEntry[]): string {
    const rows: Array<Array<string | number>> = [
        [...REVIEW_COLUMNS],
        ...entries.map((e) => [e.merchant, e.current_category ?? '', e.count_in_run]),
    ];
    const sheet = XLSX.utils.aoa_to_sheet(rows);
    return XLSX.utils.sheet_to_csv(sheet).replace(/\n*$/, '\n');
}
