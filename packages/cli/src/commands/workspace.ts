import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import type { Workspace } from '../types.js';

/**
 * Resolve the workspace from `--workspace` or the current directory,
 * exiting when there is none.
 */
export function requireWorkspace(explicit?: string): Workspace {
    const root = explicit || detectWorkspaceRoot();
    if (!root) {
        console.error('\n✖ Error: Workspace not found.');
        console.error('Expected "data/rules.json" in the workspace root or one of its parents.');
        process.exit(1);
    }
    return resolveWorkspace(root);
}
