import { describe, it, expect } from 'vitest';
import {
    serializeRules,
    serializeCategories,
    serializeGroups,
    fingerprintStore,
} from '../../src/categorizer/serialize.js';
import { createRuleStore, setExactRule } from '../../src/categorizer/store.js';

describe('serializeRules', () => {
    it('writes exact keys sorted case-insensitively regardless of insertion order', () => {
        const store = createRuleStore();
        setExactRule(store, 'zeta', null);
        setExactRule(store, 'Alpha', 'Coffee');
        setExactRule(store, 'beta', null);

        const parsed: unknown = JSON.parse(serializeRules(store));
        expect(parsed).toEqual({
            rules_version: 1,
            patterns: [],
            exact: { Alpha: { category: 'Coffee' }, beta: { category: null }, zeta: { category: null } },
        });
        const out = serializeRules(store);
        expect(out.indexOf('"Alpha"')).toBeLessThan(out.indexOf('"beta"'));
        expect(out.indexOf('"beta"')).toBeLessThan(out.indexOf('"zeta"'));
    });

    it('sorts integer-like merchant keys with the rest', () => {
        const store = createRuleStore({
            rules: {
                exact: {
                    Zeta: { category: null },
                    '76': { category: 'Gas' },
                    '7-Eleven': { category: null },
                    '100': { category: 'Dining' },
                },
            },
        });

        const out = serializeRules(store);
        const keys = [...out.matchAll(/^ {4}"([^"]+)": \{/gm)].map((m) => m[1]);
        expect(keys).toEqual(['100', '7-Eleven', '76', 'Zeta']);
        expect(out).toContain(
            '  "exact": {\n    "100": {\n      "category": "Dining"\n    },\n    "7-Eleven": {\n      "category": null\n    },'
        );
        expect(JSON.parse(out)).toEqual({
            rules_version: 1,
            patterns: [],
            exact: {
                '100': { category: 'Dining' },
                '7-Eleven': { category: null },
                '76': { category: 'Gas' },
                Zeta: { category: null },
            },
        });
    });

    it('keeps patterns and unknown keys exactly as read', () => {
        const rules = {
            rules_version: 1,
            patterns: [
                { category: 'Shopping', pattern: '^AMZN', normalized: 'Amazon', flags: ['i'], note: 'kept' },
                { pattern: 'UBER', flags: 'im', normalized: 'Uber', category: 'Transport' },
            ],
            exact: { b: { category: null } },
            raw_to_canonical: { 'AMZN MKTP': 'Amazon' },
        };
        const out = serializeRules(createRuleStore({ rules }));

        expect(out).toBe(JSON.stringify(rules, null, 2) + '\n');
    });

    it('round-trips byte for byte', () => {
        const store = createRuleStore({
            rules: {
                patterns: [{ pattern: '^ whole \\s* foods', flags: 'x', normalized: 'Whole Foods', category: 'Groceries' }],
                exact: { 'Corner Store': { category: null }, 'blue bottle': { category: 'Coffee' } },
            },
        });
        const first = serializeRules(store);
        const second = serializeRules(createRuleStore({ rules: JSON.parse(first) }));
        expect(second).toBe(first);
    });

    it('ends with a trailing newline', () => {
        expect(serializeRules(createRuleStore()).endsWith('}\n')).toBe(true);
    });
});

describe('serializeCategories', () => {
    it('writes a sorted list, one per line', () => {
        const store = createRuleStore({ categories: ['travel', 'Coffee', 'Bakery'] });
        expect(serializeCategories(store)).toBe('Bakery\nCoffee\ntravel\n');
    });

    it('writes nothing for an empty list', () => {
        expect(serializeCategories(createRuleStore())).toBe('');
    });
});

describe('serializeGroups', () => {
    it('writes sorted sections with sorted members', () => {
        const store = createRuleStore({
            groups: new Map([
                ['Food', ['Coffee', 'Bakery']],
                ['Auto', ['Gas']],
            ]),
        });
        expect(serializeGroups(store)).toBe('[Auto]\nGas\n\n[Food]\nBakery\nCoffee\n');
    });
});

describe('fingerprintStore', () => {
    it('is stable for the same content', () => {
        const a = createRuleStore({ categories: ['Coffee'], rules: { exact: { x: { category: 'Coffee' } } } });
        const b = createRuleStore({ categories: ['Coffee'], rules: { exact: { x: { category: 'Coffee' } } } });
        expect(fingerprintStore(a)).toBe(fingerprintStore(b));
        expect(fingerprintStore(a)).toMatch(/^[0-9a-f]{64}$/);
    });

    it('changes when the store changes', () => {
        const store = createRuleStore();
        const before = fingerprintStore(store);
        setExactRule(store, 'Corner Store', null);
        expect(fingerprintStore(store)).not.toBe(before);
    });
});
