/**
 * @fileoverview Type definitions for the Position Resolver.
 * @module modules/scheduler/resolver/types
 * @version 1.0.0
 */

import type {
    AdSegmentRef,
    MediaItem,
    ScheduleEntry,
    ScheduleItemRef,
} from '../builder/types';

/**
 * A timeline entry placed at its real (loop-adjusted) time.
 */
export interface ResolvedProgram {
    entry: ScheduleEntry;
    ref: ScheduleItemRef;
    /** Underlying media file */
    item: MediaItem;
    /** Slot length (for ads: the segment length) */
    durationMs: number;
    isAd: boolean;
    /** Segment addressing for ad entries, null for shows */
    segment: AdSegmentRef | null;
    /** Start of this occurrence (Unix ms) */
    programStart: number;
    /** End of this occurrence (Unix ms) */
    programEnd: number;
    /** Time into the program at the query instant, clamped to [0, durationMs] */
    elapsedMs: number;
    remainingMs: number;
    /** Index into timeline.entries */
    entryIndex: number;
    /** Completed loops before this occurrence */
    loopNumber: number;
}

/**
 * What a caller should do to join a program in progress.
 */
export type TunePlan =
    | {
          kind: 'seek';
          program: ResolvedProgram;
          file: string;
          /** Position to hand to the player (includes the segment start offset) */
          seekMs: number;
          /** now - programStart, clamped at 0 */
          offsetMs: number;
          remainingMs: number;
      }
    | {
          /** The resolved program already ended: re-resolve, never seek past the end */
          kind: 'stale';
          program: ResolvedProgram;
          offsetMs: number;
      };
