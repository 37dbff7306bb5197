/**
 * @fileoverview Constants for the Schedule Cache.
 * @module modules/scheduler/cache/constants
 * @version 1.0.0
 */

export const HOUR_MS = 60 * 60 * 1000;

/** Default guide window length (hours) */
export const DEFAULT_GUIDE_HOURS = 12;

export const CACHE_ERROR_MESSAGES = {
    INVALID_WINDOW: 'Invalid guide window: start must be finite and hours positive',
    BUILD_FAILED: 'Failed to build schedule',
} as const;
