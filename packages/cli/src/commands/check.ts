import { categoriesNeedingGroup, validateStore, type RuleStore } from '@payee-match/core';
import { loadRuleStore } from '../workspace/config.js';
import { success, warn, arrow } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import { requireWorkspace } from './workspace.js';
import type { CheckOptions } from '../types.js';

/**
 * Check the rule store and taxonomy for consistency. Exits 1 on any issue.
 */
export async function check(options: CheckOptions): Promise<void> {
    const workspace = requireWorkspace(options.workspace);

    let store: RuleStore;
    try {
        store = loadRuleStore(workspace);
    } catch (err) {
        console.error(`\n✖ Error: ${errorMessage(err)}`);
        process.exit(1);
    }

    arrow(`Patterns: ${store.patterns.length}`);
    arrow(`Exact rules: ${store.exact.size}`);
    arrow(`Categories: ${store.categories.length}`);
    arrow(`Groups: ${store.groupsTracked ? store.groups.size : 'not tracked'}`);

    const result = validateStore(store);
    if (result.valid) {
        success('Rule store is consistent.');
        return;
    }

    for (const issue of result.issues) {
        warn(issue);
    }
    const ungrouped = categoriesNeedingGroup(store);
    if (ungrouped.length > 0) {
        arrow(`Assign a group with: payee-match assign <merchant> <category> --group <group>`);
    }
    console.error(`\n✖ Error: ${result.issues.length} issue(s) found.`);
    process.exit(1);
}
