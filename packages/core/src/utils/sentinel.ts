import { UNCATEGORIZED_CATEGORY } from '../types/index.js';

/**
 * True for the Uncategorized sentinel, in any letter case.
 */
export function isUncategorized(category: string): boolean {
    return category.toLowerCase() === UNCATEGORIZED_CATEGORY.toLowerCase();
}
