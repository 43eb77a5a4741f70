import { assignGroup, resolveAll } from '@payee-match/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 3: Resolve Payees
 * Resolves every row in file order and learns rules into the store.
 * New categories go to `default_group` when one is configured.
 */
export const resolveRows: PipelineStep = async (state) => {
    if (!state.store) {
        state.errors.push({ step: 'resolve', message: 'Rule store not loaded', fatal: true });
        return state;
    }

    const result = resolveAll(state.rows, state.store);
    state.outcomes = result.outcomes;
    state.changes = result.changes;
    state.stats = result.stats;
    state.warnings.push(...result.warnings);

    const defaultGroup = state.settings?.default_group;
    for (const change of result.changes) {
        if (change.type !== 'category-added' || !change.needs_group) continue;

        if (defaultGroup) {
            assignGroup(state.store, change.category, defaultGroup);
        } else {
            state.warnings.push(`New category "${change.category}" is not assigned to a group`);
        }
    }

    return state;
};
