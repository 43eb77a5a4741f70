/**
 * Types for the category autocomplete.
 */

/**
 * A selectable category. Built once per taxonomy load and never mutated.
 */
export interface AutocompleteItem {
    readonly id: string;
    readonly label: string;
    readonly norm: string;
    readonly tokens: readonly string[];
    /** Normalized alias strings. */
    readonly aliases: readonly string[];
}

/**
 * A normalized string a query is matched against: the label or one alias.
 */
export interface MatchTarget {
    readonly norm: string;
    readonly tokens: readonly string[];
    readonly isAlias: boolean;
}

export interface IndexEntry {
    readonly item: AutocompleteItem;
    /** Label first, then aliases. */
    readonly targets: readonly MatchTarget[];
}

/**
 * Frozen lookup structure. Rebuild and swap on taxonomy change.
 */
export interface AutocompleteIndex {
    readonly items: readonly AutocompleteItem[];
    /** Keyed by item id. */
    readonly entries: ReadonlyMap<string, IndexEntry>;
    /** Token prefix (length 1..prefixCap) → ids of items with a label or alias token starting with it. */
    readonly prefixes: ReadonlyMap<string, ReadonlySet<string>>;
    readonly prefixCap: number;
}

export interface BuildIndexOptions {
    /** Longest indexed prefix (default 6). */
    prefixCap?: number;
}

export interface QueryOptions {
    /** Maximum results; unbounded when omitted. */
    limit?: number;
    /** Edit-distance threshold for the fuzzy pass; 0 disables it (default 2). */
    fuzzyMaxDistance?: number;
    /** Run the fuzzy pass when fewer candidates than this were found (default 3). */
    fuzzyMinCandidates?: number;
    /** Subtracted from scores of alias matches (default 10). */
    aliasPenalty?: number;
    /** Returned unscored for an empty query, e.g. recently used categories. */
    defaults?: readonly AutocompleteItem[];
}

export interface RankedItem {
    item: AutocompleteItem;
    score: number;
    /** Query tokens matched as a prefix of some target token. */
    prefixCoverage: number;
}
