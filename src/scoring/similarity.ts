import type { SimilarityFn } from "../types";

/**
 * Length of the longest common subsequence of two code point arrays
 * Two-row dynamic programming, O(|a| * |b|) time, O(min) space
 */
function lcsLength(a: readonly string[], b: readonly string[]): number {
    // Keep the shorter sequence on the inner loop
    const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
    let prev = new Array<number>(inner.length + 1).fill(0);
    let curr = new Array<number>(inner.length + 1).fill(0);

    for (const charA of outer) {
        for (let j = 1; j <= inner.length; j++) {
            if (charA === inner[j - 1]) {
                curr[j] = (prev[j - 1] ?? 0) + 1;
            } else {
                curr[j] = Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
            }
        }
        [prev, curr] = [curr, prev];
    }

    return prev[inner.length] ?? 0;
}

/**
 * Normalized InDel similarity: 1 - indelDistance / (|a| + |b|)
 * Equivalent to 2 * LCS / (|a| + |b|). Two empty strings are identical (1.0).
 */
export const indelRatio: SimilarityFn = (a, b) => {
    if (a === b) return 1;

    const charsA = Array.from(a);
    const charsB = Array.from(b);
    const total = charsA.length + charsB.length;
    if (total === 0) return 1;

    return (2 * lcsLength(charsA, charsB)) / total;
};

export interface SimilarityCacheStats {
    calls: number;
    hits: number;
    size: number;
}

export interface CachedSimilarity {
    similarity: SimilarityFn;
    stats: () => SimilarityCacheStats;
}

/**
 * Key for an unordered pair, so (a, b) and (b, a) share one entry
 */
function pairKey(a: string, b: string): string {
    return a <= b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

/**
 * Memoize a symmetric similarity function over unordered string pairs
 * Header and footer texts recur across pages, so most window comparisons repeat.
 */
export function createCachedSimilarity(fn: SimilarityFn): CachedSimilarity {
    const cache = new Map<string, number>();
    let calls = 0;
    let hits = 0;

    function similarity(a: string, b: string): number {
        calls++;
        const key = pairKey(a, b);
        const cached = cache.get(key);
        if (cached !== undefined) {
            hits++;
            return cached;
        }
        const value = fn(a, b);
        cache.set(key, value);
        return value;
    }

    return {
        similarity,
        stats: () => ({ calls, hits, size: cache.size }),
    };
}
