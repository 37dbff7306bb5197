/**
 * @fileoverview Interface definitions for the Schedule Builder.
 * @module modules/scheduler/builder/interfaces
 * @version 1.0.0
 */

import type { ShuffleResult, TimelineBuildInput, TimelineBuildResult } from './types';

/**
 * Shuffle generator.
 */
export interface IShuffleGenerator {
    /**
     * Shuffle a copy of `items`.
     */
    shuffle<T>(items: readonly T[]): T[];

    /**
     * Shuffle, retrying while the result equals `previous` (compared by `idOf`).
     * Arrays shorter than 2 are shuffled once without the comparison.
     * @param maxAttempts - Upper bound on shuffles performed
     */
    shuffleAvoiding<T>(
        items: readonly T[],
        previous: readonly string[] | null,
        idOf: (item: T) => string,
        maxAttempts: number
    ): ShuffleResult<T>;
}

/**
 * Builds a channel timeline.
 */
export interface ITimelineBuilder {
    /**
     * @throws ScheduleError for a non-finite epoch or non-positive horizon
     */
    build(input: TimelineBuildInput): TimelineBuildResult;
}
