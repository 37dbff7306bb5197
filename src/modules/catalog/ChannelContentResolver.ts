/**
 * @fileoverview Resolves a channel folder into probed show and commercial items.
 * @module modules/catalog/ChannelContentResolver
 * @version 1.0.0
 */

import path from 'node:path';
import type { ILogger } from '../../utils/interfaces';
import { createTaggedLogger } from '../../utils/logger';
import type { IChannelContentResolver, IDurationCache, IMediaCatalog } from './interfaces';
import type { ChannelContent, ChannelId, MediaItem, MediaKind } from './types';
import { COMMERCIALS_FOLDER, SHOWS_FOLDER, VIDEO_EXTENSIONS } from './constants';

export interface ChannelContentResolverConfig {
    catalog: IMediaCatalog;
    durations: IDurationCache;
    logger?: ILogger;
    /** Injected clock (defaults to Date.now) */
    now?: () => number;
}

function isVideoFile(file: string): boolean {
    return VIDEO_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

/**
 * Channel content resolver.
 * Lists `<channel>/Shows` and `<channel>/Commercials`, keeps video files,
 * sorts them, and attaches cached or freshly probed durations.
 */
export class ChannelContentResolver implements IChannelContentResolver {
    private readonly _catalog: IMediaCatalog;
    private readonly _durations: IDurationCache;
    private readonly _logger: ILogger;
    private readonly _now: () => number;

    constructor(config: ChannelContentResolverConfig) {
        this._catalog = config.catalog;
        this._durations = config.durations;
        this._logger = createTaggedLogger('ContentResolver', config.logger);
        this._now = config.now ?? Date.now;
    }

    public listChannels(rootFolder: string): Promise<ChannelId[]> {
        return this._catalog.listChannels(rootFolder);
    }

    public forget(files: readonly string[]): void {
        for (const file of files) {
            this._durations.forget(file);
        }
    }

    /**
     * @throws When the catalog cannot list the channel's folders
     */
    public async resolve(channelId: ChannelId): Promise<ChannelContent> {
        const probeFailures: string[] = [];
        const [shows, ads] = await Promise.all([
            this._resolveFolder(path.join(channelId, SHOWS_FOLDER), 'show', probeFailures),
            this._resolveFolder(path.join(channelId, COMMERCIALS_FOLDER), 'commercial', probeFailures),
        ]);

        if (shows.length === 0) {
            this._logger.warn('No shows found for channel ' + path.basename(channelId));
        }

        return {
            channelId,
            shows,
            ads,
            probeFailures,
            resolvedAt: this._now(),
        };
    }

    private async _resolveFolder(
        folder: string,
        kind: MediaKind,
        probeFailures: string[]
    ): Promise<MediaItem[]> {
        const files = (await this._catalog.listMedia(folder)).filter(isVideoFile).sort();
        const items: MediaItem[] = [];
        for (const file of files) {
            const lookup = await this._durations.getDuration(file);
            if (lookup.fallback) {
                probeFailures.push(file);
            }
            items.push({ id: file, kind, durationMs: lookup.durationMs });
        }
        return items;
    }
}
