import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

/**
 * SHA-256 of a file's bytes, as `sha256:<hex>`.
 * Recorded in the run manifest to identify the activity file.
 */
export async function hashFile(filePath: string): Promise<string> {
    const content = await readFile(filePath);
    return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}
