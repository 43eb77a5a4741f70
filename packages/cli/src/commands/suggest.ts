import { buildIndex, buildItems, query, type RankedItem, type RuleStore } from '@payee-match/core';
import type { Settings } from '@payee-match/shared';
import { loadRuleStore, loadSettings } from '../workspace/config.js';
import { log, info } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import { requireWorkspace } from './workspace.js';
import type { SuggestOptions } from '../types.js';

/**
 * Rank the workspace categories against a typed query.
 */
export function suggestCategories(text: string, options: SuggestOptions): RankedItem[] {
    const workspace = requireWorkspace(options.workspace);

    let settings: Settings;
    let store: RuleStore;
    try {
        settings = loadSettings(workspace);
        store = loadRuleStore(workspace);
    } catch (err) {
        console.error(`\n✖ Error: ${errorMessage(err)}`);
        process.exit(1);
    }

    const ac = settings.autocomplete;
    const index = buildIndex(buildItems(store.categories, settings.aliases), { prefixCap: ac.prefix_cap });

    return query(text, index, {
        limit: options.limit ?? ac.limit,
        fuzzyMaxDistance: ac.fuzzy_max_distance,
        fuzzyMinCandidates: ac.fuzzy_min_candidates,
        aliasPenalty: ac.alias_penalty,
    });
}

export async function suggest(text: string, options: SuggestOptions): Promise<void> {
    const results = suggestCategories(text, options);

    if (results.length === 0) {
        info(`No categories match "${text}".`);
        return;
    }

    for (const r of results) {
        log(`${r.score.toFixed(1).padStart(8)}  ${r.item.label}`);
    }
}
