import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, arrow } from '../utils/console.js';
import { requireWorkspace } from './workspace.js';
import type { CategorizeOptions } from '../types.js';

export async function categorize(activityPath: string, options: CategorizeOptions): Promise<void> {
    log(`\npayee-match - Categorizing ${activityPath}`);

    arrow('Detecting workspace...');
    const workspace = requireWorkspace(options.workspace);
    success(`Workspace: ${workspace.root}`);

    const state = await runPipeline(activityPath, workspace, options);

    log('\n--- Categorize Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            console.error(`✖ ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some((e) => e.fatal)) {
            log('\n✖ Categorize failed with fatal errors.');
            process.exit(1);
        }
    }

    success(`Resolved ${state.outcomes.length} transactions.`);
    if (state.stats) {
        const s = state.stats.bySource;
        arrow(`CSV category: ${s['csv-provided']}`);
        arrow(`Pattern match: ${s['pattern-match']}`);
        arrow(`Exact match: ${s['exact-match']}`);
        arrow(`Uncategorized: ${s['fallback-uncategorized']}`);
    }
    arrow(`Payees to review: ${state.review.length}`);

    if (state.options.dryRun) {
        log('\n[DRY RUN] No files were written.');
        return;
    }

    if (state.saved) {
        arrow(`Rules saved to: ${workspace.data}`);
    }
    for (const output of state.outputs) {
        arrow(`Wrote ${output}`);
    }
}
