/**
 * Regex flag handling for pattern rules.
 *
 * Rules declare flags from {i, m, s, x}. i, m and s map to the JavaScript
 * flags of the same name. x (extended) has no JavaScript equivalent, so the
 * pattern source is rewritten: unescaped whitespace and # comments outside
 * character classes are removed before compiling.
 */

import { DEFAULT_PATTERN_FLAGS } from '../types/index.js';
import type { PatternFlag, PatternFlags, PatternRule } from '../types/index.js';
import type { CompiledPattern } from './types.js';

const FLAG_ORDER: readonly PatternFlag[] = ['i', 'm', 's', 'x'];

function isPatternFlag(value: string): value is PatternFlag {
    return FLAG_ORDER.some((flag) => flag === value);
}

/**
 * Resolve declared flags (string or list) into a set, falling back to the default.
 */
export function parseFlags(flags: PatternFlags | undefined): Set<PatternFlag> {
    const declared = flags ?? DEFAULT_PATTERN_FLAGS;
    const list = typeof declared === 'string' ? declared.split('') : declared;
    const set = new Set<PatternFlag>();
    for (const flag of list) {
        if (isPatternFlag(flag)) set.add(flag);
    }
    return set;
}

/**
 * Remove extended-mode whitespace and comments from a pattern source.
 *
 * @example stripExtended('^ STARBUCKS  # coffee\n \\ store') // '^STARBUCKS\\ store'
 */
export function stripExtended(source: string): string {
    let out = '';
    let inClass = false;
    let inComment = false;

    for (let i = 0; i < source.length; i++) {
        const ch = source[i];

        if (inComment) {
            if (ch === '\n') inComment = false;
            continue;
        }
        if (ch === '\\') {
            out += source.slice(i, i + 2);
            i++;
            continue;
        }
        if (inClass) {
            if (ch === ']') inClass = false;
            out += ch;
            continue;
        }
        if (ch === '[') {
            inClass = true;
            out += ch;
            continue;
        }
        if (ch === '#') {
            inComment = true;
            continue;
        }
        if (/\s/.test(ch)) continue;
        out += ch;
    }

    return out;
}

/**
 * Compile a pattern rule once. An invalid regex is kept with its error,
 * so resolution can report it and move on.
 *
 * @param rule - Validated rule
 * @param raw - Rule as read from disk (defaults to the rule itself)
 */
export function compilePattern(
    rule: PatternRule,
    raw: unknown = rule
): CompiledPattern {
    const flags = parseFlags(rule.flags);
    const source = flags.has('x') ? stripExtended(rule.pattern) : rule.pattern;
    const jsFlags = FLAG_ORDER.filter((flag) => flag !== 'x' && flags.has(flag)).join('');

    try {
        return { rule, raw, regex: new RegExp(source, jsFlags) };
    } catch (e) {
        const errorMsg = e instanceof Error ? e.message : String(e);
        return { rule, raw, regex: null, error: errorMsg };
    }
}
