import { basename, extname, join } from 'node:path';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        data: join(root, 'data'),
        outputs: join(root, 'out'),
        config: {
            rulesPath: join(root, 'data', 'rules.json'),
            categoriesPath: join(root, 'data', 'categories.txt'),
            groupsPath: join(root, 'data', 'groups.txt'),
            settingsPath: join(root, 'config', 'settings.yaml'),
        },
    };
}

/**
 * Report file stem for an activity file: `activity/2026-01.csv` → `2026-01`.
 */
export function getReportStem(activityPath: string): string {
    return basename(activityPath, extname(activityPath));
}

export function getReviewCsvPath(workspace: Workspace, stem: string): string {
    return join(workspace.outputs, `${stem}.review.csv`);
}

export function getReviewExcelPath(workspace: Workspace, stem: string): string {
    return join(workspace.outputs, `${stem}.review.xlsx`);
}

export function getManifestPath(workspace: Workspace, stem: string): string {
    return join(workspace.outputs, `${stem}.run_manifest.json`);
}
