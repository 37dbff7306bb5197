/**
 * @fileoverview Tunes the player into whatever a channel is airing right now.
 * @module core/channel-tuning/ChannelTuningCoordinator
 * @version 1.0.0
 */

import path from 'node:path';
import type { AppError } from '../../types/app-errors';
import { AppErrorCode, summarizeErrorForLog, toAppError } from '../../types/app-errors';
import type { ILogger } from '../../utils/interfaces';
import { createTaggedLogger } from '../../utils/logger';
import { planTune } from '../../modules/scheduler/resolver/PositionResolver';
import type { ResolvedProgram, TunePlan } from '../../modules/scheduler/resolver/types';
import type { IPlayer, IProgramSource, TuneOutcome } from './types';
import { MAX_STALE_RETRIES } from './constants';

type SeekPlan = Extract<TunePlan, { kind: 'seek' }>;

export interface ChannelTuningCoordinatorDeps {
    schedule: IProgramSource;
    player: IPlayer;

    notifyNowPlaying?: (channelId: string, program: ResolvedProgram) => void;
    notifyOffAir?: (channelId: string) => void;
    handleError: (error: AppError, context: string) => void;

    logger?: ILogger;
    /** Injected clock (defaults to Date.now) */
    now?: () => number;
}

export class ChannelTuningCoordinator {
    private _isTuning = false;
    private _currentChannelId: string | null = null;
    private _segmentTimer: ReturnType<typeof setTimeout> | null = null;
    private readonly _logger: ILogger;
    private readonly _now: () => number;

    constructor(private readonly deps: ChannelTuningCoordinatorDeps) {
        this._logger = createTaggedLogger('ChannelTuning', deps.logger);
        this._now = deps.now ?? Date.now;
    }

    public getCurrentChannel(): string | null {
        return this._currentChannelId;
    }

    /**
     * Join `channelId` in progress: resolve the current program, seek into it
     * and start playback. A plan that went stale while resolving is
     * re-resolved up to MAX_STALE_RETRIES times.
     */
    async tuneToChannel(channelId: string): Promise<TuneOutcome> {
        // Prevent overlapping tunes from loading two files
        if (this._isTuning) {
            this._logger.warn('Tune already in progress, ignoring request for ' + path.basename(channelId));
            return { kind: 'ignored', channelId };
        }

        this._isTuning = true;
        this._clearSegmentTimer();
        try {
            return await this._tune(channelId);
        } finally {
            this._isTuning = false;
        }
    }

    /**
     * The player finished the current file (or segment): pick up whatever
     * should be playing now on the same channel.
     */
    async onPlaybackEnded(): Promise<TuneOutcome | null> {
        if (this._currentChannelId === null) {
            return null;
        }
        return this.tuneToChannel(this._currentChannelId);
    }

    /**
     * Cancel a pending segment-end timer.
     */
    dispose(): void {
        this._clearSegmentTimer();
    }

    private async _tune(channelId: string): Promise<TuneOutcome> {
        for (let attempt = 0; attempt <= MAX_STALE_RETRIES; attempt++) {
            let program: ResolvedProgram | null;
            try {
                program = await this.deps.schedule.getCurrentProgram(channelId, this._now());
            } catch (error: unknown) {
                this._logger.error('Failed to resolve schedule:', summarizeErrorForLog(error));
                return this._fail(channelId, toAppError(error, AppErrorCode.SCHEDULE_BUILD_FAILED));
            }

            if (!program) {
                const message = 'No content available for ' + path.basename(channelId);
                this._logger.warn(message);
                this._currentChannelId = channelId;
                this.deps.notifyOffAir?.(channelId);
                return {
                    kind: 'offAir',
                    channelId,
                    error: { code: AppErrorCode.EMPTY_CHANNEL, message, recoverable: true },
                };
            }

            // Time moves on while content loads; plan against a fresh clock
            const plan = planTune(program, this._now());
            if (plan.kind === 'stale') {
                this._logger.debug?.('Stale program on attempt ' + (attempt + 1) + ', re-resolving');
                continue;
            }

            try {
                await this.deps.player.load(plan.file, plan.seekMs, plan.remainingMs);
            } catch (error: unknown) {
                this._logger.error('Player failed to load ' + plan.file + ':', summarizeErrorForLog(error));
                return this._fail(channelId, toAppError(error, AppErrorCode.UNKNOWN));
            }

            this._currentChannelId = channelId;
            this._armSegmentTimer(plan);
            this.deps.notifyNowPlaying?.(channelId, plan.program);
            return { kind: 'playing', channelId, plan };
        }

        return this._fail(channelId, {
            code: AppErrorCode.STALE_SCHEDULE,
            message: 'Schedule kept going stale while tuning ' + path.basename(channelId),
            recoverable: true,
        });
    }

    /**
     * A commercial truncated by the break budget ends before its file does,
     * so the player never reports the end of the slot. Tune on when it elapses.
     */
    private _armSegmentTimer(plan: SeekPlan): void {
        const segment = plan.program.segment;
        if (!segment || segment.startOffsetMs + segment.segmentDurationMs >= plan.program.item.durationMs) {
            return;
        }
        this._segmentTimer = setTimeout(() => {
            this._segmentTimer = null;
            this.onPlaybackEnded().catch((error: unknown) => {
                this._logger.error('Failed to continue after segment end:', summarizeErrorForLog(error));
            });
        }, plan.remainingMs);
    }

    private _clearSegmentTimer(): void {
        if (this._segmentTimer !== null) {
            clearTimeout(this._segmentTimer);
            this._segmentTimer = null;
        }
    }

    private _fail(channelId: string, error: AppError): TuneOutcome {
        this.deps.handleError(error, 'tuneToChannel');
        return { kind: 'failed', channelId, error };
    }
}
