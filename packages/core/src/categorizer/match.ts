/**
 * Pattern matching for resolution.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Invalid regex returns warning in result.
 */

import type { PatternFlags } from '../types/index.js';
import { compilePattern } from './flags.js';
import type { CompiledPattern, MatchResult } from './types.js';

/**
 * Match a raw merchant string against a compiled pattern rule.
 *
 * An invalid regex returns false with a warning; it never throws.
 *
 * @param rawMerchant - Merchant text as it appears on the statement
 * @param compiled - Pattern compiled at store construction
 * @returns Match result with optional warning for invalid regex
 */
export function matchesPattern(rawMerchant: string, compiled: CompiledPattern): MatchResult {
    if (!compiled.regex) {
        const label = compiled.malformed ? 'Skipped malformed pattern rule' : 'Invalid regex pattern';
        return {
            matched: false,
            warning: `${label} "${compiled.rule.pattern}": ${compiled.error ?? 'failed to compile'}`,
        };
    }
    return { matched: compiled.regex.test(rawMerchant) };
}

/**
 * Test if a pattern compiles with the given flags.
 */
export function isValidPattern(pattern: string, flags?: PatternFlags): boolean {
    return compilePattern({ pattern, flags, normalized: '-', category: '-' }).regex !== null;
}
