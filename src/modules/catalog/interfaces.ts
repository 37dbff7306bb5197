/**
 * @fileoverview Interface definitions for the Media Catalog module.
 * @module modules/catalog/interfaces
 * @version 1.0.0
 */

import type { ChannelContent, ChannelId, DurationLookup } from './types';

/**
 * Media discovery, provided by the host (filesystem walker, remote index, ...).
 */
export interface IMediaCatalog {
    /**
     * List channel folders under a root folder.
     * @param rootFolder - Channels root
     * @returns Channel ids, in display order
     */
    listChannels(rootFolder: string): Promise<ChannelId[]>;

    /**
     * List media files inside a folder (recursively).
     * A missing folder yields an empty list.
     */
    listMedia(folder: string): Promise<string[]>;
}

/**
 * Duration probing, provided by the host (ffprobe wrapper, container parser, ...).
 */
export interface IMediaProber {
    /**
     * @returns Duration in milliseconds
     * @throws When the file cannot be probed
     */
    probeDuration(file: string): Promise<number>;
}

/**
 * Read-through duration cache.
 */
export interface IDurationCache {
    /** Never rejects: failures produce the fallback duration */
    getDuration(file: string): Promise<DurationLookup>;
    /** Forget one file (renamed/deleted) */
    forget(file: string): void;
    clear(): void;
}

/**
 * Loads a channel's shows and commercials with durations.
 */
export interface IChannelContentResolver {
    resolve(channelId: ChannelId): Promise<ChannelContent>;
    listChannels(rootFolder: string): Promise<ChannelId[]>;
    /** Drop what is known about files that were renamed, moved or deleted */
    forget(files: readonly string[]): void;
}
