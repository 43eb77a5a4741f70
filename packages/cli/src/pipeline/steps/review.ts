import { aggregateReview } from '@payee-match/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Build Review
 * Collects payees still lacking a category.
 */
export const buildReview: PipelineStep = async (state) => {
    state.review = aggregateReview(state.outcomes);
    return state;
};
