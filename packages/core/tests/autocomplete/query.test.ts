import { describe, it, expect } from 'vitest';
import { query, isSubsequence } from '../../src/autocomplete/query.js';
import { buildIndex } from '../../src/autocomplete/build-index.js';
import { buildItems } from '../../src/autocomplete/items.js';
import type { RankedItem } from '../../src/autocomplete/types.js';

function indexOf(labels: string[], aliases: Record<string, string[]> = {}) {
    return buildIndex(buildItems(labels, aliases));
}

function summary(results: RankedItem[]): Array<[string, number]> {
    return results.map((r) => [r.item.label, r.score]);
}

describe('isSubsequence', () => {
    it('ignores spaces in the target', () => {
        expect(isSubsequence('gse', 'gas and electric')).toBe(true);
        expect(isSubsequence('gasel', 'gas and electric')).toBe(true);
        expect(isSubsequence('xyz', 'gas and electric')).toBe(false);
    });
});

describe('query', () => {
    describe('ranking', () => {
        it('ranks a multi-token prefix match above a shorter label', () => {
            const index = indexOf(['Gas', 'Gas & Electric', 'Electronics', 'Groceries']);
            const results = query('gas elec', index);

            expect(summary(results)).toEqual([
                ['Gas & Electric', 556],
                ['Gas', 282.5],
                ['Electronics', 198.5],
            ]);
            expect(results[0].prefixCoverage).toBe(2);
        });

        it('ranks the exact label first', () => {
            const index = indexOf(['Art', 'Arts & Crafts', 'Groceries', 'Travel']);
            expect(summary(query('art', index))).toEqual([
                ['Art', 1590],
                ['Arts & Crafts', 494],
            ]);
        });

        it('finds a misspelled query through the fuzzy pass', () => {
            const index = indexOf(['Social Securty', 'Groceries', 'Gas', 'Entertainment']);
            expect(summary(query('securty', index))).toEqual([['Social Securty', 466.5]]);
        });

        it('uses edit distance to label tokens', () => {
            const index = indexOf(['Social Security', 'Groceries']);
            expect(summary(query('secruty', index))).toEqual([['Social Security', 26]]);
        });

        it('returns nothing when the fuzzy pass is disabled', () => {
            const index = indexOf(['Social Security', 'Groceries']);
            expect(query('secruty', index, { fuzzyMaxDistance: 0 })).toEqual([]);
        });

        it('returns nothing when no candidate is close enough', () => {
            const index = indexOf(['Gas', 'Groceries']);
            expect(query('zzzzzz', index)).toEqual([]);
        });
    });

    describe('aliases', () => {
        it('matches through an alias with a penalty', () => {
            const index = indexOf(['Gas', 'Gas & Electric', 'Groceries'], { 'Gas & Electric': ['power'] });
            const results = query('power', index);
            expect(summary(results)).toEqual([['Gas & Electric', 1580]]);
            expect(results[0].prefixCoverage).toBe(1);
        });

        it('keeps label matches above equal alias matches', () => {
            const index = indexOf(['Power', 'Utilities'], { Utilities: ['power'] });
            expect(summary(query('power', index))).toEqual([
                ['Power', 1590],
                ['Utilities', 1580],
            ]);
        });

        it('applies a custom alias penalty', () => {
            const index = indexOf(['Power', 'Utilities'], { Utilities: ['power'] });
            expect(summary(query('power', index, { aliasPenalty: 0 }))).toEqual([
                ['Power', 1590],
                ['Utilities', 1590],
            ]);
        });
    });

    describe('ordering', () => {
        it('breaks score ties by label norm length, then label, then id', () => {
            const index = indexOf(['Bb', 'bb', 'Ba', 'Bc'], {});
            const results = query('b', index, { fuzzyMaxDistance: 0 });
            expect(results.map((r) => r.item.id)).toEqual(['ba', 'bb', 'bb-2', 'bc']);
        });

        it('is deterministic', () => {
            const index = indexOf(['Gas', 'Gas & Electric', 'Electronics', 'Groceries', 'Games']);
            expect(query('ga', index)).toEqual(query('ga', index));
        });
    });

    describe('empty query', () => {
        const index = indexOf(['travel', 'Coffee', 'Bakery']);

        it('returns all items alphabetically, unscored', () => {
            expect(summary(query('', index))).toEqual([
                ['Bakery', 0],
                ['Coffee', 0],
                ['travel', 0],
            ]);
        });

        it('treats punctuation-only input as empty', () => {
            expect(query(' -- ', index).map((r) => r.item.label)).toEqual(['Bakery', 'Coffee', 'travel']);
        });

        it('returns the caller defaults when given', () => {
            const defaults = [index.items[0]];
            expect(summary(query('', index, { defaults }))).toEqual([['travel', 0]]);
        });
    });

    it('applies the limit last', () => {
        const index = indexOf(['Gas', 'Gas & Electric', 'Electronics', 'Groceries']);
        expect(summary(query('gas elec', index, { limit: 2 }))).toEqual([
            ['Gas & Electric', 556],
            ['Gas', 282.5],
        ]);
        expect(query('', index, { limit: 1 })).toHaveLength(1);
    });
});
