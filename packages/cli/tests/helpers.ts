import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { vi } from 'vitest';

/**
 * Temporary workspace directory with the given files (relative path → content).
 */
export async function makeWorkspace(files: Record<string, string>): Promise<string> {
    const root = await mkdtemp(join(tmpdir(), 'payee-match-'));
    for (const [rel, content] of Object.entries(files)) {
        await writeText(join(root, rel), content);
    }
    return root;
}

export async function writeText(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf8');
}

export async function removeWorkspace(root: string): Promise<void> {
    await rm(root, { recursive: true, force: true });
}

export function silenceConsole(): void {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
}
