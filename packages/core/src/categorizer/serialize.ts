/**
 * Deterministic serialization of the rule store.
 *
 * Same store in, same bytes out. Exact keys and taxonomy lists are sorted
 * case-insensitively; pattern rules keep their order and content exactly.
 */

import { sha256 } from 'js-sha256';
import type { ExactRule } from '../types/index.js';
import { compareText } from '../utils/normalize.js';
import type { ExactEntry, RuleStore } from './types.js';

/**
 * rules.json as written. Pattern entries are the objects read from disk.
 */
export interface PersistedRules {
    rules_version: number;
    patterns: unknown[];
    exact: Record<string, ExactRule>;
    [key: string]: unknown;
}

/**
 * Plain rules object as persisted, unknown top-level keys included.
 * Exact entries are inserted in sorted order, but integer-like keys still
 * enumerate first on a plain object; {@link serializeRules} writes the order itself.
 */
export function toRulesFile(store: RuleStore): PersistedRules {
    const exact: Record<string, ExactRule> = {};
    for (const { merchant, rule } of sortedExact(store)) {
        exact[merchant] = rule;
    }

    return {
        ...store.extras,
        rules_version: store.rulesVersion,
        patterns: store.patterns.map((p) => p.raw),
        exact,
    };
}

function sortedExact(store: RuleStore): ExactEntry[] {
    return [...store.exact.values()].sort((a, b) => compareText(a.merchant, b.merchant));
}

/**
 * The `exact` object at top-level nesting, entries in the given order.
 */
function renderExact(entries: readonly ExactEntry[]): string {
    if (entries.length === 0) return '{}';
    const lines = entries.map(({ merchant, rule }) => {
        const value = JSON.stringify(rule, null, 2).replace(/\n/g, '\n    ');
        return `    ${JSON.stringify(merchant)}: ${value}`;
    });
    return `{\n${lines.join(',\n')}\n  }`;
}

/**
 * rules.json content: two-space indented JSON with a trailing newline.
 */
export function serializeRules(store: RuleStore): string {
    const { rules_version, patterns, exact: _exact, ...extras } = toRulesFile(store);
    const text = JSON.stringify({ rules_version, patterns, exact: {}, ...extras }, null, 2);
    // Only the top-level key sits at two-space indent; JSON strings hold no raw newline.
    const marker = '\n  "exact": {}';
    const at = text.indexOf(marker);
    const exact = `\n  "exact": ${renderExact(sortedExact(store))}`;
    return text.slice(0, at) + exact + text.slice(at + marker.length) + '\n';
}

/**
 * categories.txt content: one category per line, sorted and unique.
 */
export function serializeCategories(store: RuleStore): string {
    const seen = new Set<string>();
    const lines: string[] = [];
    for (const category of [...store.categories].sort(compareText)) {
        const key = category.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        lines.push(category);
    }
    return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

/**
 * groups.txt content: `[Group]` sections with sorted members, blank line between sections.
 */
export function serializeGroups(store: RuleStore): string {
    const sections = [...store.groups.keys()].sort(compareText).map((group) => {
        const members = [...new Set(store.groups.get(group))].sort(compareText);
        return [`[${group}]`, ...members].join('\n');
    });
    return sections.length > 0 ? sections.join('\n\n') + '\n' : '';
}

/**
 * SHA-256 over every serialized form. Equal fingerprints mean nothing to save.
 */
export function fingerprintStore(store: RuleStore): string {
    return sha256(
        [serializeRules(store), serializeCategories(store), serializeGroups(store)].join('\0')
    );
}
