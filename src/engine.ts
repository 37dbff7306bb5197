/**
 * @fileoverview Composition root: wires catalog, scheduler, tuning and API.
 * @module engine
 * @version 1.0.0
 */

import { loadScheduleSettings } from './config/scheduleSettings';
import { ChannelTuningCoordinator } from './core/channel-tuning/ChannelTuningCoordinator';
import type { IPlayer } from './core/channel-tuning/types';
import { ScheduleApi } from './core/schedule-api/ScheduleApi';
import { ChannelContentResolver } from './modules/catalog/ChannelContentResolver';
import { DurationCache } from './modules/catalog/DurationCache';
import type { IMediaCatalog, IMediaProber } from './modules/catalog/interfaces';
import { ShuffleGenerator } from './modules/scheduler/builder/ShuffleGenerator';
import { ScheduleCache } from './modules/scheduler/cache/ScheduleCache';
import { ShowOrderStore } from './modules/scheduler/show-order/ShowOrderStore';
import type { AppError } from './types/app-errors';
import type { IKeyValueStore, ILogger } from './utils/interfaces';
import { consoleLogger } from './utils/logger';
import type { RandomSource } from './utils/prng';

export interface ScheduleEngineConfig {
    catalog: IMediaCatalog;
    prober: IMediaProber;
    store: IKeyValueStore;
    player: IPlayer;
    logger?: ILogger;
    now?: () => number;
    random?: RandomSource;
    /** Initial epoch; defaults to local midnight */
    epoch?: number;
    onError?: (error: AppError, context: string) => void;
}

export interface ScheduleEngine {
    durations: DurationCache;
    cache: ScheduleCache;
    tuner: ChannelTuningCoordinator;
    api: ScheduleApi;
}

export function createScheduleEngine(config: ScheduleEngineConfig): ScheduleEngine {
    const logger = config.logger ?? consoleLogger;
    const now = config.now ?? Date.now;

    const durations = new DurationCache({ prober: config.prober, store: config.store, logger });
    const contentResolver = new ChannelContentResolver({
        catalog: config.catalog,
        durations,
        logger,
        now,
    });
    const cache = new ScheduleCache({
        contentResolver,
        showOrders: new ShowOrderStore(config.store, logger),
        shuffler: new ShuffleGenerator(config.random),
        settings: loadScheduleSettings(config.store),
        logger,
        now,
        ...(config.epoch !== undefined ? { epoch: config.epoch } : {}),
    });
    const tuner = new ChannelTuningCoordinator({
        schedule: cache,
        player: config.player,
        handleError: config.onError ?? ((error, context): void => {
            logger.error('[' + context + '] ' + error.code + ': ' + error.message);
        }),
        logger,
        now,
    });
    const api = new ScheduleApi({ cache, tuner, settingsStore: config.store, logger, now });

    return { durations, cache, tuner, api };
}
