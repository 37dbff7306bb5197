/**
 * @fileoverview Type definitions for the Schedule Cache.
 * @module modules/scheduler/cache/types
 * @version 1.0.0
 */

import type { AppError } from '../../../types/app-errors';
import type { TimelineBuildStats } from '../builder/types';

/** Why timelines were dropped */
export type InvalidationReason = 'startup' | 'reload' | 'settings' | 'content' | 'manual';

/**
 * Outcome of building one channel during a bulk build.
 */
export type ChannelBuildOutcome =
    | { channelId: string; ok: true; entries: number; offAir: boolean }
    | { channelId: string; ok: false; error: AppError };

/**
 * Schedule cache events
 */
export interface ScheduleCacheEventMap {
    /** A timeline was built and swapped in */
    timelineBuilt: {
        channelId: string;
        epoch: number;
        stats: TimelineBuildStats;
        probeFailures: string[];
    };
    /** Timelines were dropped; channelId is null when all were */
    scheduleInvalidated: {
        reason: InvalidationReason;
        epoch: number;
        channelId: string | null;
    };
    /** A channel build failed */
    buildFailed: { channelId: string; error: AppError };
    /** Index for typed EventEmitter */
    [key: string]: unknown;
}
