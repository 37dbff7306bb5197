/**
 * @fileoverview Tests for TimelineBuilder.
 * @module modules/scheduler/builder/__tests__/TimelineBuilder.test
 */

import { TimelineBuilder } from '../TimelineBuilder';
import { ShuffleGenerator } from '../ShuffleGenerator';
import { DEFAULT_HORIZON_MS, MAX_SHUFFLE_ATTEMPTS } from '../constants';
import type { MediaItem, TimelineBuildInput } from '../types';
import { ShowOrderStore } from '../../show-order/ShowOrderStore';
import { resolveCurrent } from '../../resolver/PositionResolver';
import { AppErrorCode, ScheduleError } from '../../../../types/app-errors';
import { MemoryKeyValueStore } from '../../../../utils/storage';
import { createMulberry32 } from '../../../../utils/prng';
import {
    commercial,
    createMockLogger,
    identityRandom,
    show,
} from '../../../../__tests__/mocks/media';

const CHANNEL = 'Channels/Retro';
const EPOCH = Date.UTC(2024, 0, 1);
const HOUR = 60 * 60 * 1000;

const S1 = show('S1', 300_000);
const S2 = show('S2', 600_000);
const A1 = commercial('A1', 60_000);

function input(overrides: Partial<TimelineBuildInput> = {}): TimelineBuildInput {
    return {
        channelId: CHANNEL,
        shows: [S1, S2],
        ads: [A1],
        epoch: EPOCH,
        adBreakTargetMs: 180_000,
        horizonMs: DEFAULT_HORIZON_MS,
        ...overrides,
    };
}

describe('TimelineBuilder', () => {
    let showOrders: ShowOrderStore;
    let logger: ReturnType<typeof createMockLogger>;

    const createBuilder = (random: () => number = identityRandom): TimelineBuilder =>
        new TimelineBuilder({
            showOrders,
            shuffler: new ShuffleGenerator(random),
            logger,
            now: () => 7,
        });

    beforeEach(() => {
        logger = createMockLogger();
        showOrders = new ShowOrderStore(new MemoryKeyValueStore(), logger);
    });

    describe('layout', () => {
        it('places two shows then a full ad break, then wraps', () => {
            const { timeline } = createBuilder().build(input());

            const head = timeline.entries.slice(0, 6).map((e) => ({
                id: e.ref.item.id,
                start: e.startTime - EPOCH,
                duration: e.durationMs,
                isAd: e.isAd,
            }));
            expect(head).toEqual([
                { id: 'S1', start: 0, duration: 300_000, isAd: false },
                { id: 'S2', start: 300_000, duration: 600_000, isAd: false },
                { id: 'A1', start: 900_000, duration: 60_000, isAd: true },
                { id: 'A1', start: 960_000, duration: 60_000, isAd: true },
                { id: 'A1', start: 1_020_000, duration: 60_000, isAd: true },
                { id: 'S1', start: 1_080_000, duration: 300_000, isAd: false },
            ]);
        });

        it('fills exactly the horizon when the cycle divides it', () => {
            const { timeline, stats } = createBuilder().build(input());

            // 48h / 1,080,000ms per cycle = 160 cycles of 2 shows + 3 ads
            expect(timeline.entries).toHaveLength(800);
            expect(timeline.totalDurationMs).toBe(DEFAULT_HORIZON_MS);
            expect(stats.showEntries).toBe(320);
            expect(stats.adEntries).toBe(480);
        });

        it('tiles the timeline from the epoch with no gaps or overlaps', () => {
            const shows = [show('a', 1_234_000), show('b', 2_345_000), show('c', 987_000)];
            const ads = [commercial('x', 45_000), commercial('y', 75_000)];
            const { timeline } = createBuilder(createMulberry32(5)).build(
                input({ shows, ads, horizonMs: 6 * HOUR })
            );

            let expectedStart = EPOCH;
            timeline.entries.forEach((entry, i) => {
                expect(entry.startTime).toBe(expectedStart);
                expect(timeline.entryOffsets[i]).toBe(expectedStart - EPOCH);
                expectedStart += entry.durationMs;
            });
            expect(expectedStart - EPOCH).toBe(timeline.totalDurationMs);
            expect(timeline.totalDurationMs).toBeGreaterThanOrEqual(6 * HOUR);

            // The last show starts inside the horizon; a break it opened is completed
            const lastShowIndex = timeline.entries.map((e) => e.isAd).lastIndexOf(false);
            expect(timeline.entries[lastShowIndex]?.startTime).toBeLessThan(EPOCH + 6 * HOUR);
            const trailing = timeline.entries.slice(lastShowIndex + 1);
            expect(trailing.every((e) => e.isAd)).toBe(true);
            const trailingMs = trailing.reduce((sum, e) => sum + e.durationMs, 0);
            expect(trailingMs).toBeLessThanOrEqual(180_000);
        });

        it('truncates an ad longer than the break budget', () => {
            const longAd = commercial('LONG', 240_000);
            const { timeline } = createBuilder().build(input({ ads: [longAd], horizonMs: 900_000 }));

            const adEntry = timeline.entries[2];
            expect(adEntry?.durationMs).toBe(180_000);
            expect(adEntry?.ref).toEqual({
                kind: 'ad',
                item: longAd,
                startOffsetMs: 0,
                segmentDurationMs: 180_000,
            });
        });

        it('keeps the ad cursor running across breaks', () => {
            const ads = [commercial('X', 120_000), commercial('Y', 120_000)];
            const { timeline } = createBuilder().build(input({ ads, horizonMs: 2_000_000 }));

            const adIds = timeline.entries.filter((e) => e.isAd).map((e) => e.ref.item.id);
            const adDurations = timeline.entries.filter((e) => e.isAd).map((e) => e.durationMs);
            expect(adIds).toEqual(['X', 'Y', 'X', 'Y']);
            expect(adDurations).toEqual([120_000, 60_000, 120_000, 60_000]);
        });

        it('runs shows back to back without ads', () => {
            const { timeline, stats } = createBuilder().build(input({ ads: [], horizonMs: 2 * HOUR }));

            expect(timeline.entries.some((e) => e.isAd)).toBe(false);
            expect(stats.adEntries).toBe(0);
            timeline.entries.forEach((entry, i) => {
                const next = timeline.entries[i + 1];
                if (next) {
                    expect(next.startTime).toBe(entry.startTime + entry.durationMs);
                }
            });
        });

        it('skips ad breaks when the budget is zero', () => {
            const { stats } = createBuilder().build(input({ adBreakTargetMs: 0, horizonMs: HOUR }));
            expect(stats.adEntries).toBe(0);
        });

        it('never truncates a show that crosses the horizon', () => {
            const { timeline } = createBuilder().build(input({ ads: [], horizonMs: 400_000 }));

            expect(timeline.entries.map((e) => e.durationMs)).toEqual([300_000, 600_000]);
            expect(timeline.totalDurationMs).toBe(900_000);
        });

        it('produces frozen timelines', () => {
            const { timeline } = createBuilder().build(input({ horizonMs: HOUR }));
            expect(Object.isFrozen(timeline)).toBe(true);
            expect(Object.isFrozen(timeline.entries)).toBe(true);
            expect(timeline.builtAt).toBe(7);
        });
    });

    describe('show order', () => {
        it('remembers the accepted order', () => {
            const { stats } = createBuilder().build(input({ horizonMs: HOUR }));

            expect(stats.showOrder).toEqual(['S1', 'S2']);
            expect(showOrders.load(CHANNEL)).toEqual(['S1', 'S2']);
        });

        it('reshuffles an order identical to the previous one', () => {
            showOrders.save(CHANNEL, ['S1', 'S2']);
            // Identity on the first shuffle, a swap on the second
            const random = jest.fn<number, []>().mockReturnValueOnce(0.999).mockReturnValue(0);

            const { timeline, stats } = createBuilder(random).build(input({ horizonMs: HOUR }));

            expect(stats.shuffleAttempts).toBe(2);
            expect(stats.showOrder).toEqual(['S2', 'S1']);
            expect(timeline.entries[0]?.ref.item.id).toBe('S2');
            expect(showOrders.load(CHANNEL)).toEqual(['S2', 'S1']);
        });

        it('stops retrying after the attempt cap', () => {
            showOrders.save(CHANNEL, ['S1', 'S2']);

            const { stats } = createBuilder().build(input({ horizonMs: HOUR }));

            expect(stats.shuffleAttempts).toBe(MAX_SHUFFLE_ATTEMPTS);
            expect(stats.showOrder).toEqual(['S1', 'S2']);
        });

        it('never exceeds the attempt cap with a real random source', () => {
            const shows = ['a', 'b', 'c', 'd'].map((id) => show(id, 600_000));
            const builder = createBuilder(createMulberry32(11));
            let previous: string[] | null = null;

            for (let i = 0; i < 20; i++) {
                const { stats } = builder.build(input({ shows, horizonMs: HOUR }));
                expect(stats.shuffleAttempts).toBeLessThanOrEqual(MAX_SHUFFLE_ATTEMPTS);
                if (previous && stats.shuffleAttempts < MAX_SHUFFLE_ATTEMPTS) {
                    expect(stats.showOrder).not.toEqual(previous);
                }
                previous = stats.showOrder;
            }
        });
    });

    describe('empty and invalid content', () => {
        it('returns an empty timeline when there are no shows', () => {
            const { timeline, stats } = createBuilder().build(input({ shows: [] }));

            expect(timeline.entries).toHaveLength(0);
            expect(timeline.totalDurationMs).toBe(0);
            expect(stats).toEqual({ showEntries: 0, adEntries: 0, shuffleAttempts: 0, showOrder: [] });
            expect(resolveCurrent(timeline, EPOCH, EPOCH + 1000)).toBeNull();
            expect(logger.warn).toHaveBeenCalledWith('[TimelineBuilder] No shows for Retro, channel is off air');
        });

        it('skips items without a playable duration', () => {
            const broken: MediaItem = show('broken', 0);
            const { stats } = createBuilder().build(input({ shows: [S1, broken], ads: [], horizonMs: 600_000 }));

            expect(stats.showOrder).toEqual(['S1']);
            expect(logger.warn).toHaveBeenCalledWith(
                '[TimelineBuilder] Skipping 1 item(s) without a playable duration on Retro'
            );
        });

        it('rejects a non-finite epoch', () => {
            expect(() => createBuilder().build(input({ epoch: Number.NaN }))).toThrow(ScheduleError);
        });

        it('rejects a non-positive horizon', () => {
            try {
                createBuilder().build(input({ horizonMs: 0 }));
                throw new Error('expected build to throw');
            } catch (error) {
                expect(error).toBeInstanceOf(ScheduleError);
                expect(error instanceof ScheduleError && error.code).toBe(AppErrorCode.INVALID_TIME_RANGE);
            }
        });
    });

    it('logs a build summary', () => {
        createBuilder().build(input());
        expect(logger.info).toHaveBeenCalledWith('[TimelineBuilder] Built schedule for Retro: 320 shows, 480 ads');
    });
});
