/**
 * Text normalization shared by rule resolution and autocomplete.
 *
 * NOTE: normalize() is for matching and canonical payees. Exact-rule keys
 * use ruleKey(), which only folds case and whitespace.
 */

const COMBINING_MARKS = /\p{M}/gu;
const PUNCTUATION = /[\/\-.,'()[\]{}:;!?"`~|\\]/g;
const CONTROL_CHARS = /\p{Cc}/gu;

function stripDiacritics(text: string): string {
    return text.normalize('NFKD').replace(COMBINING_MARKS, '');
}

/**
 * Normalize free text for matching.
 *
 * Transformations, in order:
 * - NFKD and strip diacritics
 * - Convert to lowercase
 * - Expand & to "and"
 * - Replace punctuation and control characters with space
 * - Collapse multiple whitespace to single space
 * - Trim leading/trailing whitespace
 *
 * Idempotent: normalize(normalize(s)) === normalize(s).
 *
 * @param text - Raw merchant, label or query text
 * @returns Normalized text, empty for blank input
 */
export function normalize(text: string): string {
    // Lowercasing can reintroduce combining marks (e.g. "İ"), so strip twice.
    return stripDiacritics(stripDiacritics(text).toLowerCase())
        .replace(/&/g, ' and ')
        .replace(PUNCTUATION, ' ')
        .replace(CONTROL_CHARS, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Case-insensitive key for exact merchant rules.
 */
export function ruleKey(merchant: string): string {
    return merchant.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Stable id for an autocomplete label.
 *
 * @example slugify('Gas & Electric') // 'gas-and-electric'
 */
export function slugify(label: string): string {
    const slug = normalize(label)
        .replace(/\s+/g, '-')
        .replace(/[^a-z0-9-]+/g, '')
        .replace(/-{2,}/g, '-')
        .replace(/^-+|-+$/g, '');
    return slug || 'item';
}

/**
 * Case-insensitive ordering with a code-unit tie-break, so the order is total.
 */
export function compareText(a: string, b: string): number {
    const la = a.toLowerCase();
    const lb = b.toLowerCase();
    if (la !== lb) return la < lb ? -1 : 1;
    if (a !== b) return a < b ? -1 : 1;
    return 0;
}
