/**
 * Damerau-Levenshtein distance, optimal string alignment variant:
 * insertions, deletions, substitutions and adjacent transpositions, each
 * substring edited at most once.
 *
 * With maxDist, returns maxDist + 1 as soon as the distance is known to exceed it.
 *
 * @example damerauLevenshtein('secruty', 'security') // 2
 */
export function damerauLevenshtein(a: string, b: string, maxDist?: number): number {
    if (a === b) return 0;
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    if (maxDist !== undefined && Math.abs(a.length - b.length) > maxDist) {
        return maxDist + 1;
    }

    const rows = a.length + 1;
    const cols = b.length + 1;
    const dp: number[][] = Array.from({ length: rows }, (_, i) =>
        Array.from({ length: cols }, (_, j) => (i === 0 ? j : j === 0 ? i : 0))
    );

    for (let i = 1; i < rows; i++) {
        let rowMin = Infinity;
        for (let j = 1; j < cols; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            let d = Math.min(dp[i - 1][j] + 1, dp[i][j - 1] + 1, dp[i - 1][j - 1] + cost);
            if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
                d = Math.min(d, dp[i - 2][j - 2] + 1);
            }
            dp[i][j] = d;
            rowMin = Math.min(rowMin, d);
        }
        if (maxDist !== undefined && rowMin > maxDist) {
            return maxDist + 1;
        }
    }

    return dp[a.length][b.length];
}
