import { fingerprintStore, validateStore } from '@payee-match/core';
import type { StoreChange } from '@payee-match/shared';
import type { PipelineStep } from '../types.js';
import { saveRuleStore } from '../../store/persist.js';
import { promptContinue } from '../../utils/prompt.js';
import { warn } from '../../utils/console.js';
import { errorMessage } from '../../utils/errors.js';

type Overwrite = Extract<StoreChange, { type: 'rule-overwritten' }>;

function isOverwrite(change: StoreChange): change is Overwrite {
    return change.type === 'rule-overwritten';
}

/**
 * Step 5: Save Rules
 * Persists learned rules. Overwritten categories need confirmation
 * unless --yes is given.
 */
export const saveRules: PipelineStep = async (state) => {
    const store = state.store;
    if (!store) {
        state.errors.push({ step: 'save', message: 'Rule store not loaded', fatal: true });
        return state;
    }

    state.fingerprintAfter = state.fingerprintBefore;

    for (const issue of validateStore(store).issues) {
        state.warnings.push(issue);
    }

    if (fingerprintStore(store) === state.fingerprintBefore) {
        return state;
    }

    if (state.options.dryRun) {
        state.warnings.push('Dry run: Rule changes not saved.');
        return state;
    }

    const overwrites = state.changes.filter(isOverwrite);
    if (overwrites.length > 0) {
        for (const o of overwrites) {
            warn(`"${o.merchant}": ${o.previous_category} → ${o.category}`);
        }
        const proceed = await promptContinue(
            `${overwrites.length} rule(s) change category. Save?`,
            state.options
        );
        if (!proceed) {
            state.warnings.push('Rule changes not saved.');
            return state;
        }
    }

    try {
        await saveRuleStore(state.workspace, store);
        state.saved = true;
        state.fingerprintAfter = fingerprintStore(store);
    } catch (err) {
        state.errors.push({
            step: 'save',
            message: `Failed to save rules: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
