/**
 * @fileoverview Public exports for the Schedule Builder.
 * @module modules/scheduler/builder
 * @version 1.0.0
 */

export { TimelineBuilder, createTimeline } from './TimelineBuilder';
export type { TimelineBuilderConfig } from './TimelineBuilder';
export { ShuffleGenerator } from './ShuffleGenerator';

export type { IShuffleGenerator, ITimelineBuilder } from './interfaces';

export type {
    ShowRef,
    AdSegmentRef,
    ScheduleItemRef,
    ScheduleEntry,
    Timeline,
    TimelineBuildInput,
    TimelineBuildStats,
    TimelineBuildResult,
    ShuffleResult,
} from './types';

export {
    DEFAULT_HORIZON_MS,
    SHOWS_PER_AD_BREAK,
    MAX_SHUFFLE_ATTEMPTS,
    BUILDER_ERROR_MESSAGES,
} from './constants';
