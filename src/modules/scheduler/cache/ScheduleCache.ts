/**
 * @fileoverview Schedule cache: owns every channel timeline and the global epoch.
 * @module modules/scheduler/cache/ScheduleCache
 * @version 1.0.0
 */

import path from 'node:path';
import type { ScheduleSettings } from '../../../config/scheduleSettings';
import {
    DEFAULT_SCHEDULE_SETTINGS,
    adBreakTargetMs,
    isScheduleAffectingChange,
    normalizeScheduleSettings,
} from '../../../config/scheduleSettings';
import { AppErrorCode, ScheduleError, toAppError } from '../../../types/app-errors';
import { EventEmitter } from '../../../utils/EventEmitter';
import type { IDisposable, ILogger } from '../../../utils/interfaces';
import { createTaggedLogger } from '../../../utils/logger';
import type { IChannelContentResolver } from '../../catalog/interfaces';
import type { ChannelContent } from '../../catalog/types';
import type { IShuffleGenerator, ITimelineBuilder } from '../builder/interfaces';
import type { Timeline, TimelineBuildResult } from '../builder/types';
import { TimelineBuilder } from '../builder/TimelineBuilder';
import { DEFAULT_HORIZON_MS } from '../builder/constants';
import type { IShowOrderStore } from '../show-order/ShowOrderStore';
import { resolveCurrent, resolveUpcoming, walkWindow } from '../resolver/PositionResolver';
import type { ResolvedProgram } from '../resolver/types';
import { MAX_WINDOW_PROGRAMS } from '../resolver/constants';
import type {
    ChannelBuildOutcome,
    InvalidationReason,
    ScheduleCacheEventMap,
} from './types';
import { CACHE_ERROR_MESSAGES, HOUR_MS } from './constants';

/**
 * Local midnight of the day containing `timeMs`.
 */
export function startOfLocalDay(timeMs: number): number {
    const d = new Date(timeMs);
    d.setHours(0, 0, 0, 0);
    return d.getTime();
}

export interface ScheduleCacheConfig {
    contentResolver: IChannelContentResolver;
    showOrders: IShowOrderStore;
    shuffler?: IShuffleGenerator;
    /** Replaces the default TimelineBuilder (showOrders/shuffler are then unused) */
    builder?: ITimelineBuilder;
    settings?: ScheduleSettings;
    /** Initial epoch; defaults to local midnight of today */
    epoch?: number;
    horizonMs?: number;
    logger?: ILogger;
    /** Injected clock (defaults to Date.now) */
    now?: () => number;
}

/**
 * Schedule cache / lifecycle manager.
 *
 * Timelines are built lazily per channel, off to the side, and swapped in
 * whole; readers only ever see complete, frozen timelines. Concurrent requests
 * for one channel share a single build. A build that completes after an
 * invalidation is discarded and redone against the new state.
 *
 * @example
 * ```typescript
 * const cache = new ScheduleCache({ contentResolver, showOrders });
 * const now = await cache.getCurrentProgram('Channels/Retro');
 * const guide = await cache.guideWindow('Channels/Retro', Date.now(), 12);
 * await cache.reloadNow();
 * ```
 */
export class ScheduleCache {
    private readonly _contentResolver: IChannelContentResolver;
    private readonly _builder: ITimelineBuilder;
    private readonly _emitter: EventEmitter<ScheduleCacheEventMap>;
    private readonly _logger: ILogger;
    private readonly _now: () => number;
    private readonly _horizonMs: number;

    private _settings: ScheduleSettings;
    private _epoch: number;
    private _generation = 0;

    private readonly _timelines = new Map<string, Timeline>();
    private readonly _inFlight = new Map<string, Promise<Timeline>>();
    private readonly _channelGenerations = new Map<string, number>();

    constructor(config: ScheduleCacheConfig) {
        this._contentResolver = config.contentResolver;
        this._logger = createTaggedLogger('ScheduleCache', config.logger);
        this._now = config.now ?? Date.now;
        this._builder = config.builder ?? new TimelineBuilder({
            showOrders: config.showOrders,
            ...(config.shuffler ? { shuffler: config.shuffler } : {}),
            ...(config.logger ? { logger: config.logger } : {}),
            now: this._now,
        });
        this._emitter = new EventEmitter<ScheduleCacheEventMap>(this._logger);
        this._horizonMs = config.horizonMs ?? DEFAULT_HORIZON_MS;
        this._settings = normalizeScheduleSettings(config.settings ?? DEFAULT_SCHEDULE_SETTINGS);
        this._epoch = config.epoch ?? startOfLocalDay(this._now());
    }

    // ============================================
    // State
    // ============================================

    public getEpoch(): number {
        return this._epoch;
    }

    public getSettings(): ScheduleSettings {
        return { ...this._settings };
    }

    /**
     * Cached timeline for a channel, without building.
     */
    public peek(channelId: string): Timeline | null {
        return this._timelines.get(channelId) ?? null;
    }

    // ============================================
    // Building
    // ============================================

    /**
     * Cached timeline, building it on first access.
     * @throws ScheduleError(SCHEDULE_BUILD_FAILED) when content cannot be loaded or built
     */
    public getOrBuild(channelId: string): Promise<Timeline> {
        const cached = this._timelines.get(channelId);
        if (cached) {
            return Promise.resolve(cached);
        }
        const pending = this._inFlight.get(channelId);
        if (pending) {
            return pending;
        }

        const build: Promise<Timeline> = this._buildAndSwap(channelId).finally(() => {
            if (this._inFlight.get(channelId) === build) {
                this._inFlight.delete(channelId);
            }
        });
        this._inFlight.set(channelId, build);
        return build;
    }

    /**
     * Build every listed channel (or every channel under the root folder),
     * one at a time. A failing channel is logged and reported; the rest still build.
     */
    public async buildChannels(channelIds?: readonly string[]): Promise<ChannelBuildOutcome[]> {
        const targets = channelIds ?? (await this.listChannels());
        const outcomes: ChannelBuildOutcome[] = [];
        for (const channelId of targets) {
            try {
                const timeline = await this.getOrBuild(channelId);
                outcomes.push({
                    channelId,
                    ok: true,
                    entries: timeline.entries.length,
                    offAir: timeline.entries.length === 0,
                });
            } catch (error) {
                outcomes.push({ channelId, ok: false, error: toAppError(error, AppErrorCode.SCHEDULE_BUILD_FAILED) });
            }
        }
        return outcomes;
    }

    public listChannels(): Promise<string[]> {
        return this._contentResolver.listChannels(this._settings.channelsRootFolder);
    }

    // ============================================
    // Invalidation
    // ============================================

    /**
     * Drop every timeline and move the epoch. The next access rebuilds
     * from scratch with a new shuffle.
     */
    public invalidateAll(newEpoch: number, reason: InvalidationReason = 'manual'): void {
        if (!Number.isFinite(newEpoch)) {
            throw new ScheduleError(AppErrorCode.INVALID_TIME_RANGE, 'Epoch must be a finite timestamp');
        }
        this._generation++;
        this._timelines.clear();
        this._inFlight.clear();
        this._epoch = newEpoch;
        this._logger.info('Schedules invalidated (' + reason + '), epoch ' + new Date(newEpoch).toISOString());
        this._emitter.emit('scheduleInvalidated', { reason, epoch: newEpoch, channelId: null });
    }

    /**
     * Drop one channel's timeline after its content changed. The epoch is kept.
     * Durations of `changedFiles` (renamed, moved or deleted) are forgotten
     * so the rebuild probes them again.
     */
    public invalidateChannel(channelId: string, changedFiles: readonly string[] = []): void {
        if (changedFiles.length > 0) {
            this._contentResolver.forget(changedFiles);
        }
        this._channelGenerations.set(channelId, (this._channelGenerations.get(channelId) ?? 0) + 1);
        this._timelines.delete(channelId);
        this._inFlight.delete(channelId);
        this._emitter.emit('scheduleInvalidated', {
            reason: 'content',
            epoch: this._epoch,
            channelId,
        });
    }

    /**
     * Start a brand new schedule beginning now and rebuild every channel.
     */
    public reloadNow(channelIds?: readonly string[]): Promise<ChannelBuildOutcome[]> {
        this.invalidateAll(this._now(), 'reload');
        return this.buildChannels(channelIds);
    }

    /**
     * Replace settings. A schedule-affecting change invalidates everything
     * with the epoch reset to now.
     * @returns true when schedules were invalidated
     */
    public applySettings(next: unknown): boolean {
        const normalized = normalizeScheduleSettings(next);
        const affecting = isScheduleAffectingChange(this._settings, normalized);
        this._settings = normalized;
        if (affecting) {
            this.invalidateAll(this._now(), 'settings');
        }
        return affecting;
    }

    // ============================================
    // Queries
    // ============================================

    /**
     * What is airing on a channel.
     * @returns null when the channel has no content (off air)
     */
    public async getCurrentProgram(channelId: string, now: number = this._now()): Promise<ResolvedProgram | null> {
        const timeline = await this.getOrBuild(channelId);
        return resolveCurrent(timeline, timeline.epoch, now);
    }

    /**
     * The next `count` programs, starting with the current one.
     */
    public async getUpcoming(channelId: string, count: number, now: number = this._now()): Promise<ResolvedProgram[]> {
        const timeline = await this.getOrBuild(channelId);
        return resolveUpcoming(timeline, timeline.epoch, now, count);
    }

    /**
     * Guide listing for `[windowStart, windowStart + windowHours)`.
     *
     * Programs are placed in loop-adjusted time, so windows beyond the
     * first horizon are as complete as the first. The program in progress
     * at `windowStart` is included first when it started before the window.
     * At most MAX_WINDOW_PROGRAMS programs are returned; a cut listing is logged.
     *
     * @throws ScheduleError(INVALID_TIME_RANGE) for a non-finite start or non-positive length
     */
    public async guideWindow(
        channelId: string,
        windowStart: number,
        windowHours: number
    ): Promise<ResolvedProgram[]> {
        if (!Number.isFinite(windowStart) || !Number.isFinite(windowHours) || windowHours <= 0) {
            throw new ScheduleError(AppErrorCode.INVALID_TIME_RANGE, CACHE_ERROR_MESSAGES.INVALID_WINDOW);
        }
        const timeline = await this.getOrBuild(channelId);
        const windowEnd = windowStart + windowHours * HOUR_MS;
        const programs = walkWindow(timeline, timeline.epoch, windowStart, windowEnd);
        const last = programs[programs.length - 1];
        if (programs.length >= MAX_WINDOW_PROGRAMS && last && last.programEnd < windowEnd) {
            this._logger.warn(
                'Guide window for ' + path.basename(channelId) + ' truncated at ' +
                    MAX_WINDOW_PROGRAMS + ' programs'
            );
        }
        return programs;
    }

    // ============================================
    // Events
    // ============================================

    public on<K extends keyof ScheduleCacheEventMap>(
        event: K,
        handler: (payload: ScheduleCacheEventMap[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    public off<K extends keyof ScheduleCacheEventMap>(
        event: K,
        handler: (payload: ScheduleCacheEventMap[K]) => void
    ): void {
        this._emitter.off(event, handler);
    }

    // ============================================
    // Private Methods
    // ============================================

    private async _buildAndSwap(channelId: string): Promise<Timeline> {
        const generation = this._generation;
        const channelGeneration = this._channelGenerations.get(channelId) ?? 0;

        let content: ChannelContent;
        try {
            content = await this._contentResolver.resolve(channelId);
        } catch (error) {
            throw this._reportBuildFailure(channelId, error);
        }

        if (
            generation !== this._generation ||
            channelGeneration !== (this._channelGenerations.get(channelId) ?? 0)
        ) {
            this._logger.debug?.('Discarding build for ' + path.basename(channelId) + ' after invalidation');
            return this.getOrBuild(channelId);
        }

        const epoch = this._epoch;
        let result: TimelineBuildResult;
        try {
            result = this._builder.build({
                channelId,
                shows: content.shows,
                ads: content.ads,
                epoch,
                adBreakTargetMs: adBreakTargetMs(this._settings),
                horizonMs: this._horizonMs,
            });
        } catch (error) {
            throw this._reportBuildFailure(channelId, error);
        }

        this._timelines.set(channelId, result.timeline);
        this._emitter.emit('timelineBuilt', {
            channelId,
            epoch,
            stats: result.stats,
            probeFailures: content.probeFailures,
        });
        return result.timeline;
    }

    private _reportBuildFailure(channelId: string, error: unknown): ScheduleError {
        const wrapped =
            error instanceof ScheduleError
                ? error
                : new ScheduleError(
                      AppErrorCode.SCHEDULE_BUILD_FAILED,
                      CACHE_ERROR_MESSAGES.BUILD_FAILED + ' for ' + path.basename(channelId) +
                          ': ' + (error instanceof Error ? error.message : String(error)),
                      true
                  );
        this._logger.error(wrapped.message);
        this._emitter.emit('buildFailed', { channelId, error: toAppError(wrapped) });
        return wrapped;
    }
}
