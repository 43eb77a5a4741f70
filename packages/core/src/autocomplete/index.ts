/**
 * Autocomplete module: ranked category suggestions for partial input.
 */

export { buildItems, createItem } from './items.js';
export { buildIndex } from './build-index.js';
export { query, isSubsequence } from './query.js';
export { damerauLevenshtein } from './distance.js';
export type {
    AutocompleteItem,
    AutocompleteIndex,
    MatchTarget,
    IndexEntry,
    BuildIndexOptions,
    QueryOptions,
    RankedItem,
} from './types.js';
