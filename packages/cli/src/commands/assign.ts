import { applyDecision, applyOutcome, assignGroup, resolve, type RuleStore } from '@payee-match/core';
import type { Settings } from '@payee-match/shared';
import { loadRuleStore, loadSettings } from '../workspace/config.js';
import { saveRuleStore } from '../store/persist.js';
import { success, arrow, warn } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import { requireWorkspace } from './workspace.js';
import type { AssignOptions } from '../types.js';

/**
 * Record a reviewer's category for a merchant as an exact rule.
 */
export async function assign(merchant: string, category: string, options: AssignOptions): Promise<void> {
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

    if (!merchant.trim()) {
        console.error('\n✖ Error: Merchant must not be empty.');
        process.exit(1);
    }

    const { outcome } = resolve(merchant, null, store);
    const decided = applyDecision(outcome, category);
    const { changes } = applyOutcome(decided, store);

    // default_group only places a new category; --group may also move an existing one
    const added = changes.some((change) => change.type === 'category-added');
    const group = options.group ?? (added ? settings.default_group : undefined);
    if (decided.category && !decided.needs_review && group) {
        assignGroup(store, decided.category, group);
    }

    for (const change of changes) {
        switch (change.type) {
            case 'rule-overwritten':
                warn(`"${change.merchant}": ${change.previous_category} → ${change.category}`);
                break;
            case 'category-added':
                arrow(`New category: ${change.category}`);
                if (change.needs_group && !group) {
                    warn(`Category "${change.category}" is not assigned to a group`);
                }
                break;
            default:
                break;
        }
    }

    try {
        await saveRuleStore(workspace, store);
    } catch (err) {
        console.error(`\n✖ Failed to save rules: ${errorMessage(err)}`);
        process.exit(1);
    }

    success(`"${decided.canonical_payee}" → ${decided.category ?? 'Uncategorized'}`);
}
