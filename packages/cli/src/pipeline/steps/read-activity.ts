import { existsSync } from 'node:fs';
import type { PipelineStep } from '../types.js';
import { readActivityFile } from '../../csv/activity.js';
import { hashFile } from '../../utils/hash.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 2: Read Activity
 * Parses the activity CSV into transaction rows.
 */
export const readActivity: PipelineStep = async (state) => {
    if (!existsSync(state.activityPath)) {
        state.errors.push({
            step: 'read-activity',
            message: `Activity file not found: ${state.activityPath}`,
            fatal: true,
        });
        return state;
    }

    try {
        state.activityHash = await hashFile(state.activityPath);
        const result = await readActivityFile(state.activityPath);
        state.rows = result.rows;
        state.warnings.push(...result.warnings);

        if (result.rows.length === 0) {
            state.warnings.push(`No transactions found in ${state.activityPath}`);
        }
    } catch (err) {
        state.errors.push({
            step: 'read-activity',
            message: errorMessage(err),
            fatal: true,
            error: err,
        });
    }

    return state;
};
