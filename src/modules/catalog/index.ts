/**
 * @fileoverview Public exports for the Media Catalog module.
 * @module modules/catalog
 * @version 1.0.0
 */

export { DurationCache } from './DurationCache';
export type { DurationCacheConfig } from './DurationCache';
export { ChannelContentResolver } from './ChannelContentResolver';
export type { ChannelContentResolverConfig } from './ChannelContentResolver';

export type {
    IMediaCatalog,
    IMediaProber,
    IDurationCache,
    IChannelContentResolver,
} from './interfaces';

export type {
    ChannelId,
    MediaKind,
    MediaItem,
    ChannelContent,
    DurationLookup,
} from './types';

export {
    SHOWS_FOLDER,
    COMMERCIALS_FOLDER,
    FALLBACK_DURATION_MS,
    MIN_MEDIA_DURATION_MS,
    PROBE_TIMEOUT_MS,
    VIDEO_EXTENSIONS,
    CATALOG_ERROR_MESSAGES,
} from './constants';
