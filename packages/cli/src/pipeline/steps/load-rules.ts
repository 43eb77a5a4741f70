import { fingerprintStore } from '@payee-match/core';
import type { PipelineStep } from '../types.js';
import { loadRuleStore, loadSettings } from '../../workspace/config.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 1: Load Rules
 * Reads settings, rules, categories and groups from the workspace.
 */
export const loadRules: PipelineStep = async (state) => {
    try {
        state.settings = loadSettings(state.workspace);
        state.store = loadRuleStore(state.workspace);
        state.fingerprintBefore = fingerprintStore(state.store);
    } catch (err) {
        state.errors.push({
            step: 'load-rules',
            message: `Failed to load rules: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
