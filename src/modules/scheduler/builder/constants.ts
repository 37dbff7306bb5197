/**
 * @fileoverview Constants for the Schedule Builder.
 * @module modules/scheduler/builder/constants
 * @version 1.0.0
 */

/** Timeline horizon: 48 hours */
export const DEFAULT_HORIZON_MS = 48 * 60 * 60 * 1000;

/** Shows placed between consecutive ad breaks */
export const SHOWS_PER_AD_BREAK = 2;

/** Shuffle attempts before a repeated show order is accepted anyway */
export const MAX_SHUFFLE_ATTEMPTS = 5;

export const BUILDER_ERROR_MESSAGES = {
    INVALID_EPOCH: 'Schedule epoch must be a finite timestamp',
    INVALID_HORIZON: 'Schedule horizon must be a positive duration',
} as const;
