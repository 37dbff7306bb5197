/**
 * @fileoverview PRNG utilities for shuffling.
 * @module utils/prng
 * @version 1.0.0
 */

/** Source of uniformly distributed numbers in [0, 1) */
export type RandomSource = () => number;

// ============================================
// Mulberry32 PRNG
// ============================================

/**
 * Create a Mulberry32 PRNG function.
 * Mulberry32 is a fast, high-quality 32-bit PRNG.
 *
 * @param seed - Initial seed value
 * @returns A function that returns the next random number [0, 1)
 * @see https://github.com/bryc/code/blob/master/jshash/PRNGs.md
 */
export function createMulberry32(seed: number): RandomSource {
    if (!Number.isFinite(seed)) {
        throw new Error('Seed must be a finite number');
    }
    let state = seed | 0;
    return function (): number {
        let t = (state += 0x6d2b79f5);
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

// ============================================
// Fisher-Yates Shuffle
// ============================================

/**
 * Fisher-Yates shuffle driven by the given random source.
 *
 * @param items - Array to shuffle (not mutated)
 * @param random - Random source, e.g. Math.random or a seeded Mulberry32
 * @returns New array with shuffled items
 */
export function fisherYatesShuffle<T>(items: readonly T[], random: RandomSource): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        const temp = result[i] as T;
        result[i] = result[j] as T;
        result[j] = temp;
    }
    return result;
}
