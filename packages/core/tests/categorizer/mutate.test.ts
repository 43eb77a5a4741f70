import { describe, it, expect } from 'vitest';
import {
    applyOutcome,
    applyDecision,
    assignGroup,
    categoriesNeedingGroup,
    addPatternRule,
} from '../../src/categorizer/mutate.js';
import { resolve } from '../../src/categorizer/resolve.js';
import { createRuleStore, findExactRule } from '../../src/categorizer/store.js';

describe('applyOutcome', () => {
    it('creates a stub for an unseen merchant', () => {
        const store = createRuleStore();
        const { outcome } = resolve('Corner Store', null, store);
        const { changes } = applyOutcome(outcome, store);

        expect(changes).toEqual([{ type: 'stub-created', merchant: 'corner store' }]);
        expect(findExactRule(store, 'corner store')?.rule.category).toBeNull();
        expect(store.categories).toEqual([]);
    });

    it('is idempotent', () => {
        const store = createRuleStore();
        const { outcome } = resolve('Blue Bottle', 'Coffee', store);
        applyOutcome(outcome, store);
        const second = applyOutcome(outcome, store);

        expect(second.changes).toEqual([]);
        expect(store.categories).toEqual(['Coffee']);
        expect(store.exact.size).toBe(1);
    });

    it('returns the same store object', () => {
        const store = createRuleStore();
        const { outcome } = resolve('Blue Bottle', null, store);
        expect(applyOutcome(outcome, store).store).toBe(store);
    });

    it('never downgrades a categorized rule to a stub', () => {
        const store = createRuleStore({ rules: { exact: { 'Blue Bottle': { category: 'Coffee' } } } });
        const { changes } = applyOutcome(
            {
                raw_merchant: 'BLUE BOTTLE',
                canonical_payee: 'blue bottle',
                category: 'Uncategorized',
                source: 'fallback-uncategorized',
                is_new_stub: true,
                needs_review: true,
            },
            store
        );

        expect(changes).toEqual([]);
        expect(findExactRule(store, 'Blue Bottle')?.rule.category).toBe('Coffee');
    });

    it('fills a stub from a CSV category', () => {
        const store = createRuleStore({ rules: { exact: { 'corner store': { category: null } } } });
        const { outcome } = resolve('Corner Store', 'Groceries', store);
        const { changes } = applyOutcome(outcome, store);

        expect(changes).toEqual([
            { type: 'category-added', category: 'Groceries', needs_group: false },
            { type: 'rule-set', merchant: 'corner store', category: 'Groceries' },
        ]);
    });

    it('reports overwriting a different category', () => {
        const store = createRuleStore({
            rules: { exact: { 'Blue Bottle': { category: 'Coffee' } } },
            categories: ['Coffee'],
        });
        const { outcome } = resolve('Blue Bottle', 'Cafes', store);
        const { changes } = applyOutcome(outcome, store);

        expect(changes).toEqual([
            { type: 'category-added', category: 'Cafes', needs_group: false },
            {
                type: 'rule-overwritten',
                merchant: 'Blue Bottle',
                previous_category: 'Coffee',
                category: 'Cafes',
            },
        ]);
        expect(findExactRule(store, 'blue bottle')?.rule.category).toBe('Cafes');
    });

    it('never adds the Uncategorized sentinel as a category', () => {
        const store = createRuleStore();
        const { outcome } = resolve('New Place', 'Uncategorized', store);
        const { changes } = applyOutcome(outcome, store);

        expect(changes).toEqual([{ type: 'stub-created', merchant: 'New Place' }]);
        expect(store.categories).toEqual([]);
    });

    it('flags new categories without a group when groups are tracked', () => {
        const store = createRuleStore({
            categories: ['Coffee'],
            groups: new Map([['Food', ['Coffee']]]),
        });
        const { outcome } = resolve('Bread Co', 'Bakery', store);
        const { changes } = applyOutcome(outcome, store);

        expect(changes[0]).toEqual({ type: 'category-added', category: 'Bakery', needs_group: true });
    });

    it('does not add a category that exists with different casing', () => {
        const store = createRuleStore({ categories: ['Coffee'] });
        const { outcome } = resolve('Blue Bottle', 'coffee', store);
        applyOutcome(outcome, store);
        expect(store.categories).toEqual(['Coffee']);
    });
});

describe('applyDecision', () => {
    it('turns an outcome into a user decision', () => {
        const store = createRuleStore();
        const { outcome } = resolve('Corner Store', null, store);
        const decided = applyDecision(outcome, ' Groceries ');

        expect(decided).toEqual({
            raw_merchant: 'Corner Store',
            canonical_payee: 'corner store',
            category: 'Groceries',
            source: 'user-decision',
            is_new_stub: false,
            needs_review: false,
        });
        expect(outcome.source).toBe('fallback-uncategorized');
    });

    it('leaves the merchant undecided for an empty choice', () => {
        const store = createRuleStore();
        const { outcome } = resolve('Corner Store', null, store);
        const decided = applyDecision(outcome, '  ');

        expect(decided.category).toBeNull();
        expect(decided.needs_review).toBe(true);
        expect(applyOutcome(decided, store).changes).toEqual([
            { type: 'stub-created', merchant: 'corner store' },
        ]);
    });

    it('treats the sentinel in any case as undecided', () => {
        const store = createRuleStore();
        const { outcome } = resolve('Corner Store', null, store);
        const decided = applyDecision(outcome, 'UNCATEGORIZED');

        expect(decided.needs_review).toBe(true);
        applyOutcome(decided, store);
        expect(store.categories).toEqual([]);
    });

    it('sets the exact rule when applied', () => {
        const store = createRuleStore();
        const { outcome } = resolve('Corner Store', null, store);
        applyOutcome(outcome, store);
        const { changes } = applyOutcome(applyDecision(outcome, 'Groceries'), store);

        expect(changes).toEqual([
            { type: 'category-added', category: 'Groceries', needs_group: false },
            { type: 'rule-set', merchant: 'corner store', category: 'Groceries' },
        ]);
    });
});

describe('assignGroup', () => {
    it('moves a category into exactly one group', () => {
        const store = createRuleStore({
            categories: ['Coffee', 'Bakery'],
            groups: new Map([['Food', ['Coffee', 'Bakery']]]),
        });

        assignGroup(store, 'bakery', 'Treats');
        expect(store.groups.get('Food')).toEqual(['Coffee']);
        expect(store.groups.get('Treats')).toEqual(['Bakery']);

        assignGroup(store, 'Coffee', 'Treats');
        expect([...store.groups.keys()]).toEqual(['Treats']);
        expect(store.groups.get('Treats')).toEqual(['Bakery', 'Coffee']);
    });

    it('adds unknown categories and starts tracking groups', () => {
        const store = createRuleStore();
        assignGroup(store, 'Gas', 'Auto');
        expect(store.categories).toEqual(['Gas']);
        expect(store.groupsTracked).toBe(true);
    });
});

describe('categoriesNeedingGroup', () => {
    it('lists categories without a group, in list order', () => {
        const store = createRuleStore({
            categories: ['Coffee', 'Gas', 'Bakery'],
            groups: new Map([['Food', ['Coffee']]]),
        });
        expect(categoriesNeedingGroup(store)).toEqual(['Gas', 'Bakery']);
    });
});

describe('addPatternRule', () => {
    it('appends the rule after existing patterns and adds its category', () => {
        const store = createRuleStore({
            rules: { patterns: [{ pattern: '^AMZN', normalized: 'Amazon', category: 'Shopping' }] },
            categories: ['Shopping'],
        });
        const { compiled, changes } = addPatternRule(store, {
            pattern: 'UBER|LYFT',
            normalized: 'Rideshare',
            category: 'Transport',
        });

        expect(compiled.regex).not.toBeNull();
        expect(store.patterns.map((p) => p.rule.pattern)).toEqual(['^AMZN', 'UBER|LYFT']);
        expect(changes).toEqual([{ type: 'category-added', category: 'Transport', needs_group: false }]);
    });
});
