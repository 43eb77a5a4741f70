import type { PipelineState, PipelineStep } from './types.js';
import { loadRules } from './steps/load-rules.js';
import { readActivity } from './steps/read-activity.js';
import { resolveRows } from './steps/resolve.js';
import { buildReview } from './steps/review.js';
import { saveRules } from './steps/save.js';
import { exportReports } from './steps/export.js';
import type { Workspace, CategorizeOptions } from '../types.js';

/**
 * Orchestrates the categorize pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    activityPath: string,
    workspace: Workspace,
    options: CategorizeOptions
): Promise<PipelineState> {
    let state: PipelineState = {
        activityPath,
        workspace,
        options,
        rows: [],
        outcomes: [],
        changes: [],
        review: [],
        saved: false,
        outputs: [],
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Load Rules', fn: loadRules },
        { name: 'Read Activity', fn: readActivity },
        { name: 'Resolve Payees', fn: resolveRows },
        { name: 'Build Review', fn: buildReview },
        { name: 'Save Rules', fn: saveRules },
        { name: 'Export Reports', fn: exportReports },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        console.log(`\n→ Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some((e) => e.fatal)) {
            console.error(`\n✖ Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
