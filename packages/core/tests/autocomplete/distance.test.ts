import { describe, it, expect } from 'vitest';
import { damerauLevenshtein } from '../../src/autocomplete/distance.js';

describe('damerauLevenshtein', () => {
    it('returns 0 for equal strings', () => {
        expect(damerauLevenshtein('security', 'security')).toBe(0);
    });

    it('returns the other length when one side is empty', () => {
        expect(damerauLevenshtein('', 'abc')).toBe(3);
        expect(damerauLevenshtein('abcd', '')).toBe(4);
    });

    it('counts an adjacent transposition as one edit', () => {
        expect(damerauLevenshtein('ab', 'ba')).toBe(1);
        expect(damerauLevenshtein('secruty', 'security')).toBe(2);
    });

    it('counts insertions, deletions and substitutions', () => {
        expect(damerauLevenshtein('kitten', 'sitting')).toBe(3);
    });

    it('edits each substring at most once', () => {
        expect(damerauLevenshtein('ca', 'abc')).toBe(3);
    });

    it('stops at maxDist + 1', () => {
        expect(damerauLevenshtein('a', 'abcd', 1)).toBe(2);
        expect(damerauLevenshtein('kitten', 'sitting', 2)).toBe(3);
        expect(damerauLevenshtein('securty', 'security', 2)).toBe(1);
    });
});
