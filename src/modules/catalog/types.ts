/**
 * @fileoverview Type definitions for the Media Catalog module.
 * @module modules/catalog/types
 * @version 1.0.0
 */

/** Opaque channel identifier (the channel folder path) */
export type ChannelId = string;

/** Whether a file lives under a channel's Shows or Commercials folder */
export type MediaKind = 'show' | 'commercial';

/**
 * A playable unit with a probed duration.
 */
export interface MediaItem {
    /** File identifier (path) */
    readonly id: string;
    readonly kind: MediaKind;
    /** Duration in ms, always >= MIN_MEDIA_DURATION_MS */
    readonly durationMs: number;
}

/**
 * A channel's playable content, ready for schedule building.
 */
export interface ChannelContent {
    channelId: ChannelId;
    shows: MediaItem[];
    ads: MediaItem[];
    /** Files whose duration could not be probed (fallback duration used) */
    probeFailures: string[];
    resolvedAt: number;
}

/**
 * Outcome of a single duration lookup.
 */
export interface DurationLookup {
    durationMs: number;
    /** True when served from cache */
    cached: boolean;
    /** True when the fallback duration was substituted */
    fallback: boolean;
}
