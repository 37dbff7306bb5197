/**
 * @fileoverview Type definitions for the Schedule Builder.
 * @module modules/scheduler/builder/types
 * @version 1.0.0
 */

import type { MediaItem } from '../../catalog/types';

// Re-export catalog types used in scheduling
export type { MediaItem, ChannelId } from '../../catalog/types';

// ============================================
// Schedule Item References
// ============================================

/**
 * A whole show occupying one slot.
 */
export interface ShowRef {
    readonly kind: 'show';
    readonly item: MediaItem;
}

/**
 * One commercial pick inside an ad break.
 */
export interface AdSegmentRef {
    readonly kind: 'ad';
    readonly item: MediaItem;
    /** Offset into the physical file where the segment begins (0 at build time) */
    readonly startOffsetMs: number;
    /** Segment length; shorter than the file when the break budget truncated it */
    readonly segmentDurationMs: number;
}

export type ScheduleItemRef = ShowRef | AdSegmentRef;

// ============================================
// Timeline
// ============================================

/**
 * One slot of a channel timeline.
 */
export interface ScheduleEntry {
    /** Build-time start (Unix ms) */
    readonly startTime: number;
    readonly ref: ScheduleItemRef;
    readonly durationMs: number;
    readonly isAd: boolean;
}

/**
 * A channel's built timeline: contiguous entries from `epoch`,
 * covering at least `horizonMs`, looped forever with period `totalDurationMs`.
 */
export interface Timeline {
    readonly channelId: string;
    /** Epoch the entries were laid out from */
    readonly epoch: number;
    readonly horizonMs: number;
    readonly entries: readonly ScheduleEntry[];
    /** Cumulative start offset of each entry within one loop */
    readonly entryOffsets: readonly number[];
    /** Loop period; 0 for an empty (off-air) timeline */
    readonly totalDurationMs: number;
    /** When the timeline was built */
    readonly builtAt: number;
}

// ============================================
// Build Input / Output
// ============================================

/**
 * Input for a single channel build.
 */
export interface TimelineBuildInput {
    channelId: string;
    shows: readonly MediaItem[];
    ads: readonly MediaItem[];
    /** Global schedule epoch (Unix ms) */
    epoch: number;
    /** Ad break length; 0 disables breaks */
    adBreakTargetMs: number;
    horizonMs: number;
}

/**
 * Build statistics, for logging and tests.
 */
export interface TimelineBuildStats {
    showEntries: number;
    adEntries: number;
    /** Shuffles performed before an order was accepted (0 when nothing was shuffled) */
    shuffleAttempts: number;
    /** Accepted show order (item ids) */
    showOrder: string[];
}

export interface TimelineBuildResult {
    timeline: Timeline;
    stats: TimelineBuildStats;
}

/**
 * Result of a repeat-avoiding shuffle.
 */
export interface ShuffleResult<T> {
    order: T[];
    attempts: number;
}
