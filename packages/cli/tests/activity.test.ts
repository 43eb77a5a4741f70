import { describe, it, expect } from 'vitest';
import { detectColumns, parseActivity, parseAmount } from '../src/csv/activity.js';

describe('detectColumns', () => {
    it('matches headers case-insensitively, earlier names first', () => {
        expect(detectColumns(['Transaction Date', 'Payee', 'AMOUNT', 'Merchant', 'Memo'])).toEqual({
            merchant: 'Merchant',
            amount: 'AMOUNT',
            date: 'Transaction Date',
            category: null,
            notes: null,
        });
    });
});

describe('parseAmount', () => {
    it('strips separators and currency signs', () => {
        expect(parseAmount('$1,200.00').toFixed()).toBe('1200');
        expect(parseAmount(' -4.25 ').toFixed()).toBe('-4.25');
    });

    it('reads accounting parentheses as negative', () => {
        expect(parseAmount('(12.00)').toFixed()).toBe('-12');
    });

    it('throws on non-numeric text', () => {
        expect(() => parseAmount('abc')).toThrow();
    });
});

describe('parseActivity', () => {
    it('reads rows in file order', () => {
        const csv = [
            'Date,Description,Amount,Category',
            '2026-01-03,SAFEWAY #1138,"-1,234.50",',
            '2026-01-04,Blue Bottle,-4.25,Coffee',
        ].join('\n');

        const result = parseActivity(csv);

        expect(result.rows).toEqual([
            { raw_merchant: 'SAFEWAY #1138', amount: '-1234.5', date: '2026-01-03', csv_category: null, notes: null },
            { raw_merchant: 'Blue Bottle', amount: '-4.25', date: '2026-01-04', csv_category: 'Coffee', notes: null },
        ]);
        expect(result.warnings).toEqual([]);
        expect(result.skippedRows).toBe(0);
    });

    it('ignores a byte order mark', () => {
        const result = parseActivity('\uFEFFMerchant,Amount\nUber,-9.00\n');
        expect(result.columns.merchant).toBe('Merchant');
        expect(result.rows.map((r) => r.raw_merchant)).toEqual(['Uber']);
    });

    it('reads notes and alternate headers', () => {
        const result = parseActivity('Transaction Date,Payee,Amount,Notes\n01/05/2026,Lyft,-15.00,airport\n');
        expect(result.rows).toEqual([
            { raw_merchant: 'Lyft', amount: '-15', date: '01/05/2026', csv_category: null, notes: 'airport' },
        ]);
    });

    it('skips rows without a merchant and counts them', () => {
        const result = parseActivity('Description,Amount\nUber,-9.00\n,5.00\n,6.00\n');
        expect(result.rows).toHaveLength(1);
        expect(result.skippedRows).toBe(2);
        expect(result.warnings).toEqual(['Skipped 2 rows without a merchant']);
    });

    it('skips rows with an invalid amount', () => {
        const result = parseActivity('Description,Amount\nUber,abc\nLyft,-3.00\n');
        expect(result.rows.map((r) => r.raw_merchant)).toEqual(['Lyft']);
        expect(result.warnings).toEqual(['Invalid amount "abc" for "Uber", skipping']);
        expect(result.skippedRows).toBe(1);
    });

    it('throws when a required column is missing', () => {
        expect(() => parseActivity('Description,Total\nUber,-9.00\n')).toThrow(
            'Activity file: Missing required columns: Amount. Found: Description, Total'
        );
    });

    it('returns nothing for a header-only file', () => {
        const result = parseActivity('Description,Amount\n');
        expect(result.rows).toEqual([]);
        expect(result.skippedRows).toBe(0);
    });
});
