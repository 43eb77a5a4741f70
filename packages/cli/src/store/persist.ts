import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
    serializeRules,
    serializeCategories,
    serializeGroups,
    type RuleStore,
} from '@payee-match/core';
import type { Workspace } from '../types.js';

/**
 * Write a file through a sibling temp file renamed over the target.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
        await writeFile(tmpPath, content, 'utf8');
        await rename(tmpPath, filePath);
    } catch (err) {
        await rm(tmpPath, { force: true });
        throw err;
    }
}

/**
 * Persist the rule store: rules.json, categories.txt and, when groups are
 * tracked, groups.txt.
 *
 * @returns Paths written
 */
export async function saveRuleStore(workspace: Workspace, store: RuleStore): Promise<string[]> {
    const { rulesPath, categoriesPath, groupsPath } = workspace.config;
    const written: string[] = [];

    await writeFileAtomic(rulesPath, serializeRules(store));
    written.push(rulesPath);

    await writeFileAtomic(categoriesPath, serializeCategories(store));
    written.push(categoriesPath);

    if (store.groupsTracked) {
        await writeFileAtomic(groupsPath, serializeGroups(store));
        written.push(groupsPath);
    }

    return written;
}
