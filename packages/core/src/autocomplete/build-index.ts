import { AUTOCOMPLETE_DEFAULTS } from '../types/index.js';
import type { AutocompleteIndex, AutocompleteItem, BuildIndexOptions, IndexEntry, MatchTarget } from './types.js';

function toTarget(norm: string, isAlias: boolean): MatchTarget {
    return Object.freeze({ norm, tokens: Object.freeze(norm ? norm.split(' ') : []), isAlias });
}

/**
 * Build the prefix index and target table for a set of items.
 *
 * The result is frozen. On taxonomy change build a new index and swap it in.
 *
 * @param items - Items with unique ids
 * @param options - prefixCap (default 6, minimum 1)
 * @throws Error on duplicate item ids
 */
export function buildIndex(
    items: readonly AutocompleteItem[],
    options: BuildIndexOptions = {}
): AutocompleteIndex {
    const prefixCap = Math.max(1, options.prefixCap ?? AUTOCOMPLETE_DEFAULTS.PREFIX_CAP);
    const entries = new Map<string, IndexEntry>();
    const prefixes = new Map<string, Set<string>>();

    for (const item of items) {
        if (entries.has(item.id)) {
            throw new Error(`Duplicate autocomplete item id: "${item.id}"`);
        }

        const targets = [toTarget(item.norm, false), ...item.aliases.map((alias) => toTarget(alias, true))];
        entries.set(item.id, Object.freeze({ item, targets: Object.freeze(targets) }));

        for (const target of targets) {
            for (const token of target.tokens) {
                for (let k = 1; k <= Math.min(token.length, prefixCap); k++) {
                    const prefix = token.slice(0, k);
                    const ids = prefixes.get(prefix) ?? new Set<string>();
                    ids.add(item.id);
                    prefixes.set(prefix, ids);
                }
            }
        }
    }

    return Object.freeze({
        items: Object.freeze([...items]),
        entries,
        prefixes,
        prefixCap,
    });
}
