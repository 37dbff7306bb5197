/**
 * @fileoverview Persists each channel's last accepted show order.
 * @module modules/scheduler/show-order/ShowOrderStore
 * @version 1.0.0
 */

import path from 'node:path';
import { STORAGE_KEYS } from '../../../config/storageKeys';
import type { IKeyValueStore, ILogger } from '../../../utils/interfaces';
import { createTaggedLogger } from '../../../utils/logger';
import { readJsonRecord, safeStoreRemove, safeStoreSet } from '../../../utils/storage';

/**
 * Remembered show orders, keyed by channel.
 */
export interface IShowOrderStore {
    /** @returns The last order, or null when none (or the record is corrupt) */
    load(channelId: string): string[] | null;
    /** Overwrite the remembered order */
    save(channelId: string, order: readonly string[]): void;
    clear(channelId: string): void;
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Show order store backed by an IKeyValueStore.
 * Records are JSON string arrays under `SHOW_ORDER_PREFIX + <channel name>`.
 * An in-memory copy answers reads within a session so a failed write
 * still prevents an immediate repeat.
 */
export class ShowOrderStore implements IShowOrderStore {
    private readonly _store: IKeyValueStore;
    private readonly _logger: ILogger;
    private readonly _memory = new Map<string, string[]>();

    constructor(store: IKeyValueStore, logger?: ILogger) {
        this._store = store;
        this._logger = createTaggedLogger('ShowOrderStore', logger);
    }

    public load(channelId: string): string[] | null {
        const remembered = this._memory.get(channelId);
        if (remembered) {
            return [...remembered];
        }
        const stored = readJsonRecord(this._store, this._key(channelId), isStringArray);
        if (stored) {
            this._memory.set(channelId, stored);
            return [...stored];
        }
        return null;
    }

    public save(channelId: string, order: readonly string[]): void {
        const copy = [...order];
        this._memory.set(channelId, copy);
        if (!safeStoreSet(this._store, this._key(channelId), JSON.stringify(copy))) {
            this._logger.warn('Failed to save show order for ' + channelId);
        }
    }

    public clear(channelId: string): void {
        this._memory.delete(channelId);
        safeStoreRemove(this._store, this._key(channelId));
    }

    private _key(channelId: string): string {
        return STORAGE_KEYS.SHOW_ORDER_PREFIX + path.basename(channelId);
    }
}
