/**
 * @fileoverview Query-surface types for the Schedule API.
 * @module core/schedule-api/types
 * @version 1.0.0
 */

import type { ScheduleSettings } from '../../config/scheduleSettings';
import type { ChannelBuildOutcome } from '../../modules/scheduler/cache/types';

export interface NowPlaying {
    channelId: string;
    channelName: string;
    /** True when the channel has nothing to air */
    offAir: boolean;
    /** Display title; "Commercial Break" for ads */
    title: string;
    file: string | null;
    isAd: boolean;
    startTime: number | null;
    endTime: number | null;
    elapsedMs: number;
    remainingMs: number;
}

export interface GuideListing {
    title: string;
    file: string;
    isAd: boolean;
    startTime: number;
    endTime: number;
    /** Local HH:MM */
    time: string;
    /** Started before the window and still airing at its start */
    inProgress: boolean;
}

export interface ChannelGuide {
    channelId: string;
    channelName: string;
    /** Title airing now, empty when off air */
    current: string;
    shows: GuideListing[];
}

export interface GuideOptions {
    startTime?: number;
    hours?: number;
    /** Keep commercial entries (default false) */
    includeAds?: boolean;
}

export interface ScheduleStatus {
    channel: string | null;
    program: string;
    channelsCount: number;
    epoch: number;
    settings: ScheduleSettings;
}

/**
 * Optional view of the tuner, so a reload can re-tune the active channel.
 */
export interface ITunerHandle {
    getCurrentChannel(): string | null;
    tuneToChannel(channelId: string): Promise<unknown>;
}

export type RemoteCommand = 'reload_schedule' | 'status' | 'guide';

export type CommandResult =
    | { success: true; command: 'reload_schedule'; data: ChannelBuildOutcome[] }
    | { success: true; command: 'status'; data: ScheduleStatus }
    | { success: true; command: 'guide'; data: ChannelGuide[] }
    | { success: false; command: string; error: string };
