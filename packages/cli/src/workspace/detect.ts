import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/** Relative path whose presence marks a workspace root. */
const WORKSPACE_MARKER = join('data', 'rules.json');

/**
 * Nearest directory at or above `startPath` that contains data/rules.json.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    for (let dir = resolve(startPath); ; dir = dirname(dir)) {
        if (existsSync(join(dir, WORKSPACE_MARKER))) return dir;
        if (dirname(dir) === dir) return null;
    }
}
