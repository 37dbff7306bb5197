/**
 * @fileoverview Builds a channel's looping timeline of shows and ad breaks.
 * @module modules/scheduler/builder/TimelineBuilder
 * @version 1.0.0
 */

import path from 'node:path';
import { AppErrorCode, ScheduleError } from '../../../types/app-errors';
import type { ILogger } from '../../../utils/interfaces';
import { createTaggedLogger } from '../../../utils/logger';
import type { IShowOrderStore } from '../show-order/ShowOrderStore';
import type { IShuffleGenerator, ITimelineBuilder } from './interfaces';
import type {
    MediaItem,
    ScheduleEntry,
    Timeline,
    TimelineBuildInput,
    TimelineBuildResult,
} from './types';
import { ShuffleGenerator } from './ShuffleGenerator';
import {
    BUILDER_ERROR_MESSAGES,
    MAX_SHUFFLE_ATTEMPTS,
    SHOWS_PER_AD_BREAK,
} from './constants';

export interface TimelineBuilderConfig {
    showOrders: IShowOrderStore;
    shuffler?: IShuffleGenerator;
    logger?: ILogger;
    /** Injected clock (defaults to Date.now) */
    now?: () => number;
}

/**
 * Compute cumulative offsets and freeze a timeline.
 */
export function createTimeline(
    channelId: string,
    epoch: number,
    horizonMs: number,
    entries: ScheduleEntry[],
    builtAt: number
): Timeline {
    const entryOffsets: number[] = [];
    let total = 0;
    for (const entry of entries) {
        entryOffsets.push(total);
        total += entry.durationMs;
    }
    return Object.freeze({
        channelId,
        epoch,
        horizonMs,
        entries: Object.freeze(entries.map((e) => Object.freeze(e))),
        entryOffsets: Object.freeze(entryOffsets),
        totalDurationMs: total,
        builtAt,
    });
}

const itemId = (item: MediaItem): string => item.id;

function hasPlayableDuration(item: MediaItem): boolean {
    return Number.isFinite(item.durationMs) && item.durationMs > 0;
}

/**
 * Timeline builder.
 *
 * Shows are laid out from the epoch in a shuffled order that differs from the
 * channel's previous order, repeating that order until the horizon is reached.
 * After every second show an ad break of `adBreakTargetMs` is filled with
 * shuffled commercials; the last commercial of a break is truncated to fit.
 * Shows are never truncated.
 *
 * @example
 * ```typescript
 * const builder = new TimelineBuilder({ showOrders: new ShowOrderStore(store) });
 * const { timeline } = builder.build({
 *     channelId: 'Channels/Retro',
 *     shows,
 *     ads,
 *     epoch: midnight,
 *     adBreakTargetMs: 3 * 60 * 1000,
 *     horizonMs: DEFAULT_HORIZON_MS,
 * });
 * ```
 */
export class TimelineBuilder implements ITimelineBuilder {
    private readonly _showOrders: IShowOrderStore;
    private readonly _shuffler: IShuffleGenerator;
    private readonly _logger: ILogger;
    private readonly _now: () => number;

    constructor(config: TimelineBuilderConfig) {
        this._showOrders = config.showOrders;
        this._shuffler = config.shuffler ?? new ShuffleGenerator();
        this._logger = createTaggedLogger('TimelineBuilder', config.logger);
        this._now = config.now ?? Date.now;
    }

    public build(input: TimelineBuildInput): TimelineBuildResult {
        const { channelId, epoch, horizonMs } = input;
        if (!Number.isFinite(epoch)) {
            throw new ScheduleError(AppErrorCode.INVALID_TIME_RANGE, BUILDER_ERROR_MESSAGES.INVALID_EPOCH);
        }
        if (!Number.isFinite(horizonMs) || horizonMs <= 0) {
            throw new ScheduleError(AppErrorCode.INVALID_TIME_RANGE, BUILDER_ERROR_MESSAGES.INVALID_HORIZON);
        }

        const shows = this._playable(input.shows, channelId);
        const ads = this._playable(input.ads, channelId);

        if (shows.length === 0) {
            this._logger.warn('No shows for ' + path.basename(channelId) + ', channel is off air');
            return {
                timeline: createTimeline(channelId, epoch, horizonMs, [], this._now()),
                stats: { showEntries: 0, adEntries: 0, shuffleAttempts: 0, showOrder: [] },
            };
        }

        const previousOrder = this._showOrders.load(channelId);
        const { order: showOrder, attempts } = this._shuffler.shuffleAvoiding(
            shows,
            previousOrder,
            itemId,
            MAX_SHUFFLE_ATTEMPTS
        );
        const acceptedOrder = showOrder.map(itemId);
        this._showOrders.save(channelId, acceptedOrder);

        const adOrder = this._shuffler.shuffle(ads);
        const breakBudgetMs = Math.max(0, input.adBreakTargetMs);

        const entries: ScheduleEntry[] = [];
        const endTime = epoch + horizonMs;
        let currentTime = epoch;
        let showIndex = 0;
        let adIndex = 0;
        let showEntries = 0;
        let adEntries = 0;

        while (currentTime < endTime) {
            const show = showOrder[showIndex % showOrder.length];
            if (!show) {
                break;
            }
            entries.push({
                startTime: currentTime,
                ref: { kind: 'show', item: show },
                durationMs: show.durationMs,
                isAd: false,
            });
            currentTime += show.durationMs;
            showIndex++;
            showEntries++;

            if (adOrder.length === 0 || breakBudgetMs === 0 || showIndex % SHOWS_PER_AD_BREAK !== 0) {
                continue;
            }

            let remainingMs = breakBudgetMs;
            while (remainingMs > 0) {
                const ad = adOrder[adIndex % adOrder.length];
                if (!ad) {
                    break;
                }
                const segmentMs = Math.min(ad.durationMs, remainingMs);
                entries.push({
                    startTime: currentTime,
                    ref: {
                        kind: 'ad',
                        item: ad,
                        startOffsetMs: 0,
                        segmentDurationMs: segmentMs,
                    },
                    durationMs: segmentMs,
                    isAd: true,
                });
                currentTime += segmentMs;
                remainingMs -= segmentMs;
                adIndex++;
                adEntries++;
            }
        }

        this._logger.info(
            'Built schedule for ' + path.basename(channelId) + ': ' +
            showEntries + ' shows, ' + adEntries + ' ads'
        );

        return {
            timeline: createTimeline(channelId, epoch, horizonMs, entries, this._now()),
            stats: { showEntries, adEntries, shuffleAttempts: attempts, showOrder: acceptedOrder },
        };
    }

    private _playable(items: readonly MediaItem[], channelId: string): MediaItem[] {
        const playable = items.filter(hasPlayableDuration);
        if (playable.length !== items.length) {
            this._logger.warn(
                'Skipping ' + (items.length - playable.length) +
                ' item(s) without a playable duration on ' + path.basename(channelId)
            );
        }
        return playable;
    }
}
