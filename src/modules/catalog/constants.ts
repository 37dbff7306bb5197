/**
 * @fileoverview Constants for the Media Catalog module.
 * @module modules/catalog/constants
 * @version 1.0.0
 */

/** Sub-folder holding a channel's shows */
export const SHOWS_FOLDER = 'Shows';

/** Sub-folder holding a channel's commercials */
export const COMMERCIALS_FOLDER = 'Commercials';

/** Duration substituted when probing fails (30 seconds) */
export const FALLBACK_DURATION_MS = 30_000;

/** Probed durations are floored to this */
export const MIN_MEDIA_DURATION_MS = 1000;

/** Upper bound on a single probe before the fallback is used */
export const PROBE_TIMEOUT_MS = 5000;

/** Recognised media file extensions (lower case, with dot) */
export const VIDEO_EXTENSIONS: readonly string[] = [
    '.mp4',
    '.mkv',
    '.avi',
    '.mov',
    '.m4v',
    '.webm',
    '.wmv',
    '.flv',
    '.mpg',
    '.mpeg',
    '.ts',
];

export const CATALOG_ERROR_MESSAGES = {
    PROBE_TIMEOUT: 'Duration probe timed out',
    INVALID_DURATION: 'Probe returned an invalid duration',
} as const;
