/**
 * @fileoverview Public exports for the utils module.
 * @module utils
 * @version 1.0.0
 */

export { EventEmitter } from './EventEmitter';
export { consoleLogger, createTaggedLogger } from './logger';
export { createMulberry32, fisherYatesShuffle } from './prng';
export type { RandomSource } from './prng';
export {
    safeStoreGet,
    safeStoreSet,
    safeStoreRemove,
    readJsonRecord,
    MemoryKeyValueStore,
} from './storage';
export { formatShowName, formatClockTime } from './mediaFormat';
export type { IEventEmitter, IDisposable, ILogger, IKeyValueStore } from './interfaces';
