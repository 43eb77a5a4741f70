import { mkdir } from 'node:fs/promises';
import type { RunManifest } from '@payee-match/shared';
import type { PipelineStep } from '../types.js';
import {
    getReportStem,
    getReviewCsvPath,
    getReviewExcelPath,
    getManifestPath,
} from '../../workspace/paths.js';
import { formatReviewCsv } from '../../csv/review.js';
import { generateReviewExcel } from '../../excel/review.js';
import { writeFileAtomic } from '../../store/persist.js';
import { errorMessage } from '../../utils/errors.js';
import { VERSION } from '../../version.js';

/**
 * Step 6: Export Reports
 * Writes the review CSV, the review workbook and the run manifest to out/.
 */
export const exportReports: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping report export.');
        return state;
    }

    const stem = getReportStem(state.activityPath);
    const csvPath = getReviewCsvPath(state.workspace, stem);
    const excelPath = getReviewExcelPath(state.workspace, stem);
    const manifestPath = getManifestPath(state.workspace, stem);

    try {
        await mkdir(state.workspace.outputs, { recursive: true });

        await writeFileAtomic(csvPath, formatReviewCsv(state.review));
        state.outputs.push(csvPath);

        const workbook = generateReviewExcel(state.review, state.rows, state.outcomes);
        await workbook.xlsx.writeFile(excelPath);
        state.outputs.push(excelPath);

        const manifest: RunManifest = {
            activity_file: state.activityPath,
            activity_hash: state.activityHash ?? '',
            run_timestamp: new Date().toISOString(),
            row_count: state.rows.length,
            by_source: {
                'csv-provided': state.stats?.bySource['csv-provided'] ?? 0,
                'pattern-match': state.stats?.bySource['pattern-match'] ?? 0,
                'exact-match': state.stats?.bySource['exact-match'] ?? 0,
                'fallback-uncategorized': state.stats?.bySource['fallback-uncategorized'] ?? 0,
                'user-decision': state.stats?.bySource['user-decision'] ?? 0,
            },
            review_count: state.review.length,
            rules_fingerprint_before: state.fingerprintBefore ?? '',
            rules_fingerprint_after: state.fingerprintAfter ?? '',
            version: VERSION,
        };
        await writeFileAtomic(manifestPath, JSON.stringify(manifest, null, 2) + '\n');
        state.outputs.push(manifestPath);
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export reports to ${state.workspace.outputs}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
