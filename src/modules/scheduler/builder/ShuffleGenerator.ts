/**
 * @fileoverview Shuffle generator with repeat avoidance.
 * @module modules/scheduler/builder/ShuffleGenerator
 * @version 1.0.0
 */

import type { RandomSource } from '../../../utils/prng';
import { fisherYatesShuffle } from '../../../utils/prng';
import type { IShuffleGenerator } from './interfaces';
import type { ShuffleResult } from './types';

function sameOrder(a: readonly string[], b: readonly string[]): boolean {
    if (a.length !== b.length) {
        return false;
    }
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) {
            return false;
        }
    }
    return true;
}

/**
 * Fisher-Yates shuffle generator.
 * Each schedule rebuild gets a fresh order; pass a seeded random source
 * (e.g. `createMulberry32(seed)`) for reproducible orders.
 *
 * @example
 * ```typescript
 * const shuffler = new ShuffleGenerator(createMulberry32(42));
 * const { order, attempts } = shuffler.shuffleAvoiding(shows, lastOrder, (s) => s.id, 5);
 * ```
 */
export class ShuffleGenerator implements IShuffleGenerator {
    private readonly _random: RandomSource;

    /**
     * @param random - Random source (defaults to Math.random)
     */
    constructor(random: RandomSource = Math.random) {
        this._random = random;
    }

    public shuffle<T>(items: readonly T[]): T[] {
        return fisherYatesShuffle(items, this._random);
    }

    public shuffleAvoiding<T>(
        items: readonly T[],
        previous: readonly string[] | null,
        idOf: (item: T) => string,
        maxAttempts: number
    ): ShuffleResult<T> {
        const limit = Math.max(1, Math.floor(maxAttempts));
        let order = this.shuffle(items);
        let attempts = 1;

        if (items.length < 2 || !previous || previous.length === 0) {
            return { order, attempts };
        }

        while (attempts < limit && sameOrder(order.map(idOf), previous)) {
            order = this.shuffle(items);
            attempts++;
        }

        return { order, attempts };
    }
}
