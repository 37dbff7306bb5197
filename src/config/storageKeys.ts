/**
 * @fileoverview Key-value store key constants.
 * @module config/storageKeys
 * @version 1.0.0
 */

/**
 * Canonical store keys used across modules.
 *
 * Keep this file free of module imports so every layer can depend on it safely.
 */
export const STORAGE_KEYS = {
    /** Schedule-affecting settings (JSON object) */
    SCHEDULE_SETTINGS: 'loopcast_schedule_settings',
    /** Per-channel remembered show order; suffixed with the channel name */
    SHOW_ORDER_PREFIX: 'loopcast_show_order:',
    /** Probed media durations (JSON object of file id -> ms) */
    DURATION_CACHE: 'loopcast_durations',
} as const;
