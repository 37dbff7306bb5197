/**
 * @fileoverview Tests for the ScheduleApi query surface.
 * @module core/schedule-api/__tests__/ScheduleApi.test
 */

import { ScheduleApi } from '../ScheduleApi';
import type { ITunerHandle } from '../types';
import { ScheduleCache } from '../../../modules/scheduler/cache/ScheduleCache';
import { ShuffleGenerator } from '../../../modules/scheduler/builder/ShuffleGenerator';
import { ShowOrderStore } from '../../../modules/scheduler/show-order/ShowOrderStore';
import type { ChannelContent } from '../../../modules/catalog/types';
import { DEFAULT_SCHEDULE_SETTINGS } from '../../../config/scheduleSettings';
import { STORAGE_KEYS } from '../../../config/storageKeys';
import { AppErrorCode } from '../../../types/app-errors';
import { MemoryKeyValueStore } from '../../../utils/storage';
import { formatClockTime } from '../../../utils/mediaFormat';
import {
    commercial,
    createMockLogger,
    identityRandom,
    show,
} from '../../../__tests__/mocks/media';

const EPOCH = Date.UTC(2024, 0, 1);
const RETRO = 'Channels/Retro';
const NEWS = 'Channels/News';
const EMPTY = 'Channels/Empty';
const BROKEN = 'Channels/Broken';

const PILOT = 'Channels/Retro/Shows/S01E01 - Pilot_Episode.mp4';
const NIGHT = 'Channels/Retro/Shows/Night.Shift.mkv';
const SODA = 'Channels/Retro/Commercials/Soda.mp4';
const EVENING = 'Channels/News/Shows/Evening_News.mp4';

const CONTENTS: Record<string, ChannelContent> = {
    [RETRO]: {
        channelId: RETRO,
        shows: [show(PILOT, 300_000), show(NIGHT, 600_000)],
        ads: [commercial(SODA, 60_000)],
        probeFailures: [],
        resolvedAt: 0,
    },
    [NEWS]: { channelId: NEWS, shows: [show(EVENING, 1_800_000)], ads: [], probeFailures: [], resolvedAt: 0 },
    [EMPTY]: { channelId: EMPTY, shows: [], ads: [], probeFailures: [], resolvedAt: 0 },
};

describe('ScheduleApi', () => {
    let clock: number;
    let logger: ReturnType<typeof createMockLogger>;
    let listChannels: jest.Mock<Promise<string[]>, [string]>;
    let cache: ScheduleCache;
    let store: MemoryKeyValueStore;

    const createApi = (tuner?: ITunerHandle): ScheduleApi =>
        new ScheduleApi({
            cache,
            ...(tuner ? { tuner } : {}),
            settingsStore: store,
            logger,
            now: () => clock,
        });

    const createTuner = (channelId: string | null): ITunerHandle & { tuneToChannel: jest.Mock } => ({
        getCurrentChannel: () => channelId,
        tuneToChannel: jest.fn().mockResolvedValue(undefined),
    });

    beforeEach(() => {
        clock = EPOCH + 950_000;
        logger = createMockLogger();
        store = new MemoryKeyValueStore();
        listChannels = jest.fn<Promise<string[]>, [string]>().mockResolvedValue([RETRO, NEWS, BROKEN]);
        cache = new ScheduleCache({
            contentResolver: {
                resolve: async (channelId: string): Promise<ChannelContent> => {
                    const found = CONTENTS[channelId];
                    if (!found) {
                        throw new Error('no such channel: ' + channelId);
                    }
                    return found;
                },
                listChannels,
                forget: () => undefined,
            },
            showOrders: new ShowOrderStore(store, logger),
            shuffler: new ShuffleGenerator(identityRandom),
            epoch: EPOCH,
            logger,
            now: () => clock,
        });
    });

    describe('getNowPlaying', () => {
        it('describes a commercial in progress', async () => {
            await expect(createApi().getNowPlaying(RETRO)).resolves.toEqual({
                channelId: RETRO,
                channelName: 'Retro',
                offAir: false,
                title: 'Commercial Break',
                file: SODA,
                isAd: true,
                startTime: EPOCH + 900_000,
                endTime: EPOCH + 960_000,
                elapsedMs: 50_000,
                remainingMs: 10_000,
            });
        });

        it('uses the formatted show name for shows', async () => {
            clock = EPOCH + 100_000;
            const playing = await createApi().getNowPlaying(RETRO);
            expect(playing.title).toBe('Pilot Episode');
            expect(playing.file).toBe(PILOT);
        });

        it('reports an empty channel as off air', async () => {
            await expect(createApi().getNowPlaying(EMPTY)).resolves.toEqual({
                channelId: EMPTY,
                channelName: 'Empty',
                offAir: true,
                title: 'Off Air',
                file: null,
                isAd: false,
                startTime: null,
                endTime: null,
                elapsedMs: 0,
                remainingMs: 0,
            });
        });
    });

    describe('getGuide', () => {
        it('lists shows in the window', async () => {
            const guide = await createApi().getGuide(RETRO, { startTime: EPOCH + 950_000, hours: 1 });

            expect(guide.map((g) => g.startTime - EPOCH)).toEqual([
                1_080_000, 1_380_000, 2_160_000, 2_460_000, 3_240_000, 3_540_000, 4_320_000,
            ]);
            expect(guide[0]).toEqual({
                title: 'Pilot Episode',
                file: PILOT,
                isAd: false,
                startTime: EPOCH + 1_080_000,
                endTime: EPOCH + 1_380_000,
                time: formatClockTime(EPOCH + 1_080_000),
                inProgress: false,
            });
            expect(guide[1]?.title).toBe('Night Shift');
        });

        it('includes commercials when asked', async () => {
            const guide = await createApi().getGuide(RETRO, { startTime: EPOCH + 950_000, hours: 1, includeAds: true });

            expect(guide).toHaveLength(19);
            expect(guide[0]).toMatchObject({ title: 'Commercial Break', isAd: true, inProgress: true });
        });

        it('defaults the window start to now', async () => {
            clock = EPOCH + 100_000;
            const guide = await createApi().getGuide(RETRO, { hours: 1 });
            expect(guide[0]).toMatchObject({ file: PILOT, startTime: EPOCH, inProgress: true });
        });
    });

    describe('getGuideForAllChannels', () => {
        it('summarizes every channel and skips the ones that fail', async () => {
            const guide = await createApi().getGuideForAllChannels();

            expect(guide.map((g) => [g.channelName, g.current])).toEqual([
                ['Retro', 'Commercial Break'],
                ['News', 'Evening News'],
            ]);
            expect(guide[1]?.shows.map((s) => s.startTime - EPOCH)).toEqual([
                0, 1_800_000, 3_600_000, 5_400_000, 7_200_000,
            ]);
            expect(logger.error).toHaveBeenCalledWith(
                '[ScheduleApi] Guide unavailable for Broken:',
                expect.objectContaining({ code: AppErrorCode.SCHEDULE_BUILD_FAILED })
            );
        });
    });

    describe('getStatus', () => {
        it('reports the active channel and program', async () => {
            await expect(createApi(createTuner(RETRO)).getStatus()).resolves.toEqual({
                channel: 'Retro',
                program: 'Commercial Break',
                channelsCount: 3,
                epoch: EPOCH,
                settings: { ...DEFAULT_SCHEDULE_SETTINGS },
            });
        });

        it('reports no channel without a tuner', async () => {
            const status = await createApi().getStatus();
            expect(status.channel).toBeNull();
            expect(status.program).toBe('N/A');
        });
    });

    describe('reloadNow', () => {
        it('rebuilds from now and re-tunes the active channel', async () => {
            const tuner = createTuner(RETRO);
            clock = EPOCH + 3_600_000;

            const outcomes = await createApi(tuner).reloadNow();

            expect(outcomes.map((o) => o.ok)).toEqual([true, true, false]);
            expect(cache.getEpoch()).toBe(EPOCH + 3_600_000);
            expect(tuner.tuneToChannel).toHaveBeenCalledWith(RETRO);
            expect(logger.info).toHaveBeenCalledWith('[ScheduleApi] Schedules reloaded: 2 ok, 1 failed');
        });

        it('skips retuning when nothing is playing', async () => {
            const tuner = createTuner(null);
            await createApi(tuner).reloadNow();
            expect(tuner.tuneToChannel).not.toHaveBeenCalled();
        });
    });

    describe('updateSettings', () => {
        it('applies and persists settings', () => {
            const api = createApi();

            expect(api.updateSettings({ adBreakTargetMinutes: 4 })).toBe(true);
            expect(store.getItem(STORAGE_KEYS.SCHEDULE_SETTINGS)).toBe(
                '{"adBreakTargetMinutes":4,"minShowMinutes":5,"channelsRootFolder":"Channels"}'
            );
            expect(cache.getEpoch()).toBe(clock);
        });
    });

    describe('handleCommand', () => {
        it('reloads schedules', async () => {
            const result = await createApi().handleCommand('reload_schedule');

            expect(result.success).toBe(true);
            expect(result.command).toBe('reload_schedule');
            expect(cache.getEpoch()).toBe(clock);
        });

        it('returns status', async () => {
            const result = await createApi().handleCommand(' status ');
            expect(result).toMatchObject({ success: true, command: 'status', data: { channelsCount: 3 } });
        });

        it('returns the guide', async () => {
            const result = await createApi().handleCommand('guide');
            expect(result.success && result.command === 'guide' && result.data.length).toBe(2);
        });

        it('logs and ignores unknown commands', async () => {
            const result = await createApi().handleCommand('dance');

            expect(result).toEqual({ success: false, command: 'dance', error: 'Unknown command' });
            expect(logger.warn).toHaveBeenCalledWith('[ScheduleApi] Unknown remote command: dance');
        });

        it('reports command failures', async () => {
            listChannels.mockRejectedValueOnce(new Error('catalog offline'));

            const result = await createApi().handleCommand('status');

            expect(result).toEqual({ success: false, command: 'status', error: 'catalog offline' });
        });
    });
});
