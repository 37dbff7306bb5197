/**
 * @fileoverview Public exports for the Schedule Cache.
 * @module modules/scheduler/cache
 * @version 1.0.0
 */

export { ScheduleCache, startOfLocalDay } from './ScheduleCache';
export type { ScheduleCacheConfig } from './ScheduleCache';
export type {
    InvalidationReason,
    ChannelBuildOutcome,
    ScheduleCacheEventMap,
} from './types';
export { HOUR_MS, DEFAULT_GUIDE_HOURS, CACHE_ERROR_MESSAGES } from './constants';
