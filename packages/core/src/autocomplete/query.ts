/**
 * Autocomplete ranking.
 *
 * Candidates come from token prefixes (via the index), substrings and
 * subsequences of label and alias norms. When too few are found, a fuzzy
 * pass adds targets within a small edit distance. Scores are summed per
 * target; an item keeps its best target. Ordering is a strict total order,
 * so the same query on the same index always gives the same list.
 *
 * Pure: no state is kept between calls.
 */

import { AUTOCOMPLETE_DEFAULTS, AUTOCOMPLETE_SCORES } from '../types/index.js';
import { normalize } from '../utils/normalize.js';
import { damerauLevenshtein } from './distance.js';
import type { AutocompleteIndex, AutocompleteItem, MatchTarget, QueryOptions, RankedItem } from './types.js';

interface ParsedQuery {
    norm: string;
    tokens: string[];
    compact: string;
}

interface TargetScore {
    score: number;
    coverage: number;
}

/**
 * True when `needle` letters appear in order in `haystack`, spaces ignored.
 */
export function isSubsequence(needle: string, haystack: string): boolean {
    let pos = 0;
    const letters = haystack.replace(/ /g, '');
    for (const ch of needle) {
        pos = letters.indexOf(ch, pos);
        if (pos === -1) return false;
        pos++;
    }
    return true;
}

function hasTokenPrefix(q: ParsedQuery, target: MatchTarget): boolean {
    return q.tokens.some((qt) => target.tokens.some((tt) => tt.startsWith(qt)));
}

function textMatch(q: ParsedQuery, target: MatchTarget): boolean {
    return target.norm.includes(q.norm) || isSubsequence(q.compact, target.norm);
}

function fuzzyDistance(q: ParsedQuery, target: MatchTarget, maxDist: number): number {
    let best = damerauLevenshtein(q.norm, target.norm, maxDist);
    for (const token of target.tokens) {
        if (best === 0) break;
        best = Math.min(best, damerauLevenshtein(q.norm, token, maxDist));
    }
    return best;
}

function tokensInOrder(q: ParsedQuery, target: MatchTarget): boolean {
    let pos = 0;
    for (const qt of q.tokens) {
        const idx = target.tokens.findIndex((tt, j) => j >= pos && tt.startsWith(qt));
        if (idx === -1) return false;
        pos = idx + 1;
    }
    return true;
}

function scoreTarget(q: ParsedQuery, target: MatchTarget, fuzzyDist: number | null): TargetScore {
    const S = AUTOCOMPLETE_SCORES;
    let score = 0;
    let coverage = 0;

    if (q.norm === target.norm) score += S.EXACT_MATCH;

    for (const qt of q.tokens) {
        if (target.tokens.some((tt) => tt.startsWith(qt))) {
            score += S.TOKEN_PREFIX;
            coverage++;
        }
        if (target.tokens.includes(qt)) score += S.WHOLE_TOKEN;
    }

    if (target.norm.includes(q.norm)) score += S.SUBSTRING;
    if (tokensInOrder(q, target)) score += S.TOKENS_IN_ORDER;
    if (target.norm.startsWith(q.norm)) score += S.STARTS_WITH;

    score -= S.LENGTH_PENALTY_PER_CHAR * (target.norm.length - q.norm.length);

    if (fuzzyDist !== null) {
        score += Math.max(0, S.FUZZY_BASE - S.FUZZY_STEP * fuzzyDist);
    }

    return { score, coverage };
}

function compareRanked(a: RankedItem, b: RankedItem): number {
    if (a.score !== b.score) return b.score - a.score;
    if (a.prefixCoverage !== b.prefixCoverage) return b.prefixCoverage - a.prefixCoverage;
    if (a.item.norm.length !== b.item.norm.length) return a.item.norm.length - b.item.norm.length;
    return compareLabels(a.item, b.item);
}

function compareLabels(a: AutocompleteItem, b: AutocompleteItem): number {
    const la = a.label.toLowerCase();
    const lb = b.label.toLowerCase();
    if (la !== lb) return la < lb ? -1 : 1;
    if (a.id !== b.id) return a.id < b.id ? -1 : 1;
    return 0;
}

function withLimit<T>(list: T[], limit: number | undefined): T[] {
    return limit === undefined ? list : list.slice(0, Math.max(0, limit));
}

/**
 * Rank items of the index against raw keyboard input.
 *
 * An empty (or punctuation-only) query returns `defaults` unscored, or
 * every item alphabetically when no defaults are given.
 *
 * @param rawQuery - Text as typed
 * @param index - Index from buildIndex()
 * @param options - Limit, fuzzy thresholds, alias penalty, defaults
 * @returns Ranked items, best first
 */
export function query(rawQuery: string, index: AutocompleteIndex, options: QueryOptions = {}): RankedItem[] {
    const norm = normalize(rawQuery);

    if (!norm) {
        const list = options.defaults
            ? [...options.defaults]
            : [...index.items].sort(compareLabels);
        return withLimit(
            list.map((item) => ({ item, score: 0, prefixCoverage: 0 })),
            options.limit
        );
    }

    const q: ParsedQuery = { norm, tokens: norm.split(' '), compact: norm.replace(/ /g, '') };
    const maxDist = Math.max(0, options.fuzzyMaxDistance ?? AUTOCOMPLETE_DEFAULTS.FUZZY_MAX_DISTANCE);
    const minCandidates = options.fuzzyMinCandidates ?? AUTOCOMPLETE_DEFAULTS.FUZZY_MIN_CANDIDATES;
    const aliasPenalty = options.aliasPenalty ?? AUTOCOMPLETE_DEFAULTS.ALIAS_PENALTY;

    // Prefix hits from the index, verified below for tokens longer than the cap
    const prefixHits = new Set<string>();
    for (const qt of q.tokens) {
        for (const id of index.prefixes.get(qt.slice(0, index.prefixCap)) ?? []) {
            prefixHits.add(id);
        }
    }

    const matched = new Map<string, Set<MatchTarget>>();
    for (const [id, entry] of index.entries) {
        for (const target of entry.targets) {
            const viaPrefix = prefixHits.has(id) && hasTokenPrefix(q, target);
            if (viaPrefix || textMatch(q, target)) {
                const set = matched.get(id) ?? new Set<MatchTarget>();
                set.add(target);
                matched.set(id, set);
            }
        }
    }

    const fuzzy = new Map<MatchTarget, number>();
    if (matched.size < minCandidates && maxDist > 0) {
        for (const [id, entry] of index.entries) {
            for (const target of entry.targets) {
                const d = fuzzyDistance(q, target, maxDist);
                if (d > maxDist) continue;
                fuzzy.set(target, d);
                const set = matched.get(id) ?? new Set<MatchTarget>();
                set.add(target);
                matched.set(id, set);
            }
        }
    }

    const results: RankedItem[] = [];
    for (const [id, targets] of matched) {
        const entry = index.entries.get(id);
        if (!entry) continue;

        let best: TargetScore | null = null;
        // entry.targets order puts the label first, so it wins ties
        for (const target of entry.targets) {
            if (!targets.has(target)) continue;
            const scored = scoreTarget(q, target, fuzzy.get(target) ?? null);
            if (target.isAlias) scored.score -= aliasPenalty;
            if (!best || scored.score > best.score) best = scored;
        }

        if (best) {
            results.push({ item: entry.item, score: best.score, prefixCoverage: best.coverage });
        }
    }

    return withLimit(results.sort(compareRanked), options.limit);
}
