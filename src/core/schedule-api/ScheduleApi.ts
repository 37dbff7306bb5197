/**
 * @fileoverview Read-mostly query surface over the schedule cache:
 * now playing, guide listings, reload, and remote command routing.
 * @module core/schedule-api/ScheduleApi
 * @version 1.0.0
 */

import path from 'node:path';
import { saveScheduleSettings } from '../../config/scheduleSettings';
import { summarizeErrorForLog } from '../../types/app-errors';
import type { IKeyValueStore, ILogger } from '../../utils/interfaces';
import { createTaggedLogger } from '../../utils/logger';
import { formatClockTime, formatShowName } from '../../utils/mediaFormat';
import type { ScheduleCache } from '../../modules/scheduler/cache/ScheduleCache';
import type { ChannelBuildOutcome } from '../../modules/scheduler/cache/types';
import type { ResolvedProgram } from '../../modules/scheduler/resolver/types';
import { DEFAULT_GUIDE_HOURS } from '../../modules/scheduler/cache/constants';
import type {
    ChannelGuide,
    CommandResult,
    GuideListing,
    GuideOptions,
    ITunerHandle,
    NowPlaying,
    ScheduleStatus,
} from './types';
import { COMMERCIAL_BREAK_TITLE, OFF_AIR_TITLE, REMOTE_GUIDE_HOURS } from './constants';

export interface ScheduleApiDeps {
    cache: ScheduleCache;
    tuner?: ITunerHandle;
    /** Where settings are persisted on update */
    settingsStore?: IKeyValueStore;
    logger?: ILogger;
    now?: () => number;
}

function titleOf(program: ResolvedProgram): string {
    return program.isAd ? COMMERCIAL_BREAK_TITLE : formatShowName(program.item.id);
}

export class ScheduleApi {
    private readonly _logger: ILogger;
    private readonly _now: () => number;

    constructor(private readonly deps: ScheduleApiDeps) {
        this._logger = createTaggedLogger('ScheduleApi', deps.logger);
        this._now = deps.now ?? Date.now;
    }

    async getNowPlaying(channelId: string): Promise<NowPlaying> {
        const program = await this.deps.cache.getCurrentProgram(channelId, this._now());
        const channelName = path.basename(channelId);
        if (!program) {
            return {
                channelId,
                channelName,
                offAir: true,
                title: OFF_AIR_TITLE,
                file: null,
                isAd: false,
                startTime: null,
                endTime: null,
                elapsedMs: 0,
                remainingMs: 0,
            };
        }
        return {
            channelId,
            channelName,
            offAir: false,
            title: titleOf(program),
            file: program.item.id,
            isAd: program.isAd,
            startTime: program.programStart,
            endTime: program.programEnd,
            elapsedMs: program.elapsedMs,
            remainingMs: program.remainingMs,
        };
    }

    /**
     * Listings for one channel. Shows only unless `includeAds` is set.
     */
    async getGuide(channelId: string, options: GuideOptions = {}): Promise<GuideListing[]> {
        const windowStart = options.startTime ?? this._now();
        const programs = await this.deps.cache.guideWindow(
            channelId,
            windowStart,
            options.hours ?? DEFAULT_GUIDE_HOURS
        );
        return programs
            .filter((p) => options.includeAds === true || !p.isAd)
            .map((p) => ({
                title: titleOf(p),
                file: p.item.id,
                isAd: p.isAd,
                startTime: p.programStart,
                endTime: p.programEnd,
                time: formatClockTime(p.programStart),
                inProgress: p.programStart < windowStart,
            }));
    }

    /**
     * Short guide across every channel. A channel that fails to build is
     * logged and skipped.
     */
    async getGuideForAllChannels(hours: number = REMOTE_GUIDE_HOURS): Promise<ChannelGuide[]> {
        const now = this._now();
        const guide: ChannelGuide[] = [];
        for (const channelId of await this.deps.cache.listChannels()) {
            try {
                const shows = await this.getGuide(channelId, { startTime: now, hours });
                const current = await this.deps.cache.getCurrentProgram(channelId, now);
                guide.push({
                    channelId,
                    channelName: path.basename(channelId),
                    current: current ? titleOf(current) : '',
                    shows,
                });
            } catch (error: unknown) {
                this._logger.error('Guide unavailable for ' + path.basename(channelId) + ':', summarizeErrorForLog(error));
            }
        }
        return guide;
    }

    async getStatus(): Promise<ScheduleStatus> {
        const channels = await this.deps.cache.listChannels();
        const channelId = this.deps.tuner?.getCurrentChannel() ?? null;
        let program = 'N/A';
        if (channelId !== null) {
            program = (await this.getNowPlaying(channelId)).title;
        }
        return {
            channel: channelId === null ? null : path.basename(channelId),
            program,
            channelsCount: channels.length,
            epoch: this.deps.cache.getEpoch(),
            settings: this.deps.cache.getSettings(),
        };
    }

    /**
     * Start a brand new schedule beginning now, rebuild every channel and
     * re-tune the active one.
     */
    async reloadNow(): Promise<ChannelBuildOutcome[]> {
        const outcomes = await this.deps.cache.reloadNow();
        const failed = outcomes.filter((o) => !o.ok).length;
        this._logger.info('Schedules reloaded: ' + (outcomes.length - failed) + ' ok, ' + failed + ' failed');

        const active = this.deps.tuner?.getCurrentChannel() ?? null;
        if (active !== null && this.deps.tuner) {
            await this.deps.tuner.tuneToChannel(active);
        }
        return outcomes;
    }

    /**
     * Apply and persist new settings.
     * @returns true when schedules were invalidated
     */
    updateSettings(raw: unknown): boolean {
        const invalidated = this.deps.cache.applySettings(raw);
        if (this.deps.settingsStore) {
            saveScheduleSettings(this.deps.settingsStore, this.deps.cache.getSettings());
        }
        return invalidated;
    }

    /**
     * Route a remote-control command. Unknown commands are logged and ignored.
     */
    async handleCommand(command: string): Promise<CommandResult> {
        const cmd = command.trim();
        try {
            switch (cmd) {
                case 'reload_schedule':
                    return { success: true, command: 'reload_schedule', data: await this.reloadNow() };
                case 'status':
                    return { success: true, command: 'status', data: await this.getStatus() };
                case 'guide':
                    return { success: true, command: 'guide', data: await this.getGuideForAllChannels() };
                default:
                    this._logger.warn('Unknown remote command: ' + cmd);
                    return { success: false, command: cmd, error: 'Unknown command' };
            }
        } catch (error: unknown) {
            this._logger.error('Command handler error:', summarizeErrorForLog(error));
            return {
                success: false,
                command: cmd,
                error: error instanceof Error ? error.message : String(error),
            };
        }
    }
}
