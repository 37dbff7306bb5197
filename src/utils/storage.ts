/**
 * @fileoverview Safe key-value store helpers.
 * @module utils/storage
 * @version 1.0.0
 *
 * Backing stores can throw (unwritable file, full disk, locked registry).
 * These helpers treat storage as optional and never throw.
 */

import type { IKeyValueStore } from './interfaces';

export function safeStoreGet(store: IKeyValueStore, key: string): string | null {
    try {
        return store.getItem(key);
    } catch {
        return null;
    }
}

export function safeStoreSet(store: IKeyValueStore, key: string, value: string): boolean {
    try {
        store.setItem(key, value);
        return true;
    } catch {
        return false;
    }
}

export function safeStoreRemove(store: IKeyValueStore, key: string): boolean {
    try {
        store.removeItem(key);
        return true;
    } catch {
        return false;
    }
}

/**
 * Read and parse a JSON record, returning null when it is missing,
 * unparseable, or rejected by the guard.
 */
export function readJsonRecord<T>(
    store: IKeyValueStore,
    key: string,
    guard: (value: unknown) => value is T
): T | null {
    const raw = safeStoreGet(store, key);
    if (raw === null) {
        return null;
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }
    return guard(parsed) ? parsed : null;
}

/**
 * In-memory store. Used when the host provides no persistence.
 */
export class MemoryKeyValueStore implements IKeyValueStore {
    private readonly _data = new Map<string, string>();

    public getItem(key: string): string | null {
        return this._data.get(key) ?? null;
    }

    public setItem(key: string, value: string): void {
        this._data.set(key, value);
    }

    public removeItem(key: string): void {
        this._data.delete(key);
    }

    public get size(): number {
        return this._data.size;
    }
}
