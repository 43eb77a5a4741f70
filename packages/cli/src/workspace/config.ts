import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { createRuleStore, parseCategories, parseGroups, type RuleStore } from '@payee-match/core';
import { SettingsSchema, type Settings } from '@payee-match/shared';
import type { Workspace } from '../types.js';
import { errorMessage } from '../utils/errors.js';

function readIfExists(path: string): string | null {
    return existsSync(path) ? readFileSync(path, 'utf-8') : null;
}

/**
 * Loads workspace settings (config/settings.yaml). A missing file means defaults.
 */
export function loadSettings(workspace: Workspace): Settings {
    const content = readIfExists(workspace.config.settingsPath);
    const data: unknown = content ? parse(content) : null;
    return SettingsSchema.parse(data ?? {});
}

/**
 * Loads rules, categories and groups into a rule store.
 * Missing files are treated as empty; groups are only tracked when groups.txt exists.
 *
 * @throws Error for malformed JSON, schema violations or duplicate exact keys
 */
export function loadRuleStore(workspace: Workspace): RuleStore {
    const rulesContent = readIfExists(workspace.config.rulesPath);
    const categoriesContent = readIfExists(workspace.config.categoriesPath);
    const groupsContent = readIfExists(workspace.config.groupsPath);

    let rules: unknown = {};
    if (rulesContent && rulesContent.trim() !== '') {
        try {
            rules = JSON.parse(rulesContent);
        } catch (err) {
            throw new Error(`Invalid JSON in ${workspace.config.rulesPath}: ${errorMessage(err)}`);
        }
    }

    return createRuleStore({
        rules,
        categories: categoriesContent ? parseCategories(categoriesContent) : [],
        groups: groupsContent !== null ? parseGroups(groupsContent) : null,
    });
}
