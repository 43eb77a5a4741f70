import { normalize, slugify } from '../utils/normalize.js';
import type { AutocompleteItem } from './types.js';

/**
 * Build one item. Empty aliases and aliases equal to the label are dropped.
 */
export function createItem(id: string, label: string, aliases: readonly string[] = []): AutocompleteItem {
    const norm = normalize(label);
    const aliasNorms: string[] = [];
    for (const alias of aliases) {
        const n = normalize(alias);
        if (n && n !== norm && !aliasNorms.includes(n)) aliasNorms.push(n);
    }

    return Object.freeze({
        id,
        label,
        norm,
        tokens: Object.freeze(norm ? norm.split(' ') : []),
        aliases: Object.freeze(aliasNorms),
    });
}

/**
 * Build items for a category list.
 *
 * Ids are slugs of the label; a colliding slug gets a -2, -3, ... suffix
 * in list order, so ids stay stable while the list order does.
 *
 * @param labels - Category display names
 * @param aliases - Optional label → alias strings map
 */
export function buildItems(
    labels: readonly string[],
    aliases: Readonly<Record<string, readonly string[]>> = {}
): AutocompleteItem[] {
    const used = new Set<string>();

    return labels.map((label) => {
        const base = slugify(label);
        let id = base;
        for (let n = 2; used.has(id); n++) {
            id = `${base}-${n}`;
        }
        used.add(id);

        return createItem(id, label, Object.hasOwn(aliases, label) ? aliases[label] : []);
    });
}
