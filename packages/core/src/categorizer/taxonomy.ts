/**
 * Category and group text formats.
 *
 * categories.txt: one category per line, `#` comments.
 * groups.txt: `[Group]` header followed by member categories. The older
 * `*Group` header is read too; it is never written.
 */

import { UNGROUPED_GROUP } from '../types/index.js';

const BRACKET_HEADER = /^\[(.+)\]$/;
const STAR_HEADER = /^\*(.+)$/;

function contentLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Parse a category list, dropping duplicates (case-insensitive, first spelling kept).
 */
export function parseCategories(text: string): string[] {
    const seen = new Set<string>();
    const categories: string[] = [];
    for (const line of contentLines(text)) {
        const key = line.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        categories.push(line);
    }
    return categories;
}

/**
 * Parse group sections into an ordered group → members map.
 * Categories listed before any header belong to Ungrouped.
 */
export function parseGroups(text: string): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    let current = UNGROUPED_GROUP;

    for (const line of contentLines(text)) {
        const header = BRACKET_HEADER.exec(line) ?? STAR_HEADER.exec(line);
        if (header) {
            current = header[1].trim();
            if (!groups.has(current)) groups.set(current, []);
            continue;
        }

        const members = groups.get(current) ?? [];
        if (!members.includes(line)) members.push(line);
        groups.set(current, members);
    }

    return groups;
}
