/**
 * Activity CSV reader.
 *
 * Columns are found by header name, case-insensitively:
 * - merchant: Description | Merchant | Payee (required)
 * - amount: Amount (required)
 * - date: Date | Transaction Date
 * - category: Category
 * - notes: Notes
 *
 * Amounts go through Decimal and are kept as decimal strings.
 */

import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import { Decimal } from 'decimal.js';
import { TransactionRowSchema, type TransactionRow } from '@payee-match/shared';

const COLUMN_NAMES = {
    merchant: ['description', 'merchant', 'payee'],
    amount: ['amount'],
    date: ['date', 'transaction date'],
    category: ['category'],
    notes: ['notes'],
} as const;

type ColumnKey = keyof typeof COLUMN_NAMES;

export type ColumnMap = Record<ColumnKey, string | null>;

export interface ActivityResult {
    rows: TransactionRow[];
    warnings: string[];
    skippedRows: number;
    columns: ColumnMap;
}

/**
 * Map logical columns to the headers present in the file.
 * Earlier names in each list win when several are present.
 */
export function detectColumns(headers: readonly string[]): ColumnMap {
    const find = (key: ColumnKey): string | null => {
        for (const name of COLUMN_NAMES[key]) {
            const header = headers.find((h) => h.trim().toLowerCase() === name);
            if (header !== undefined) return header;
        }
        return null;
    };

    return {
        merchant: find('merchant'),
        amount: find('amount'),
        date: find('date'),
        category: find('category'),
        notes: find('notes'),
    };
}

function cellText(value: unknown): string {
    if (value === null || value === undefined) return '';
    return String(value);
}

function optionalText(row: Record<string, unknown>, column: string | null): string | null {
    if (!column) return null;
    const text = cellText(row[column]).trim();
    return text === '' ? null : text;
}

/**
 * Parse an amount cell: commas and currency signs are stripped,
 * accounting parentheses mean negative.
 */
export function parseAmount(raw: string): Decimal {
    let text = raw.trim().replace(/[,$\s]/g, '');
    const negative = /^\(.*\)$/.test(text);
    if (negative) text = text.slice(1, -1);
    const amount = new Decimal(text);
    return negative ? amount.negated() : amount;
}

/**
 * Parse activity CSV text into transaction rows.
 *
 * @param content - CSV file contents
 * @returns Rows in file order, warnings and the skip count
 * @throws Error when the merchant or amount column is missing
 */
export function parseActivity(content: string): ActivityResult {
    const workbook = XLSX.read(content.replace(/^\uFEFF/, ''), { type: 'string', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const records = sheet ? XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' }) : [];

    const headers = records.length > 0 ? Object.keys(records[0]) : [];
    const columns = detectColumns(headers);
    const warnings: string[] = [];
    const rows: TransactionRow[] = [];

    if (records.length === 0) {
        return { rows, warnings, skippedRows: 0, columns };
    }

    if (!columns.merchant || !columns.amount) {
        const missing: string[] = [];
        if (!columns.merchant) missing.push('Description|Merchant|Payee');
        if (!columns.amount) missing.push('Amount');
        throw new Error(
            `Activity file: Missing required columns: ${missing.join(', ')}. ` +
            `Found: ${headers.join(', ')}`
        );
    }

    let withoutMerchant = 0;
    let skippedRows = 0;

    for (const record of records) {
        const merchant = cellText(record[columns.merchant]).trim();
        if (!merchant) {
            withoutMerchant++;
            skippedRows++;
            continue;
        }

        const rawAmount = cellText(record[columns.amount]);
        let amount: Decimal;
        try {
            amount = parseAmount(rawAmount);
        } catch {
            warnings.push(`Invalid amount "${rawAmount}" for "${merchant}", skipping`);
            skippedRows++;
            continue;
        }

        const parsed = TransactionRowSchema.safeParse({
            raw_merchant: merchant,
            amount: amount.toFixed(),
            date: optionalText(record, columns.date) ?? '',
            csv_category: optionalText(record, columns.category),
            notes: optionalText(record, columns.notes),
        });

        if (parsed.success) {
            rows.push(parsed.data);
        } else {
            warnings.push(`Schema validation failed for "${merchant}": ${parsed.error.issues[0]?.message ?? 'invalid row'}`);
            skippedRows++;
        }
    }

    if (withoutMerchant > 0) {
        warnings.push(`Skipped ${withoutMerchant} rows without a merchant`);
    }

    return { rows, warnings, skippedRows, columns };
}

/**
 * Read and parse an activity CSV file.
 */
export async function readActivityFile(filePath: string): Promise<ActivityResult> {
    return parseActivity(await readFile(filePath, 'utf8'));
}
