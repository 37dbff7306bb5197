/**
 * @fileoverview Read-through cache of probed media durations.
 * @module modules/catalog/DurationCache
 * @version 1.0.0
 */

import { STORAGE_KEYS } from '../../config/storageKeys';
import { AppErrorCode, summarizeErrorForLog } from '../../types/app-errors';
import type { IKeyValueStore, ILogger } from '../../utils/interfaces';
import { createTaggedLogger } from '../../utils/logger';
import { readJsonRecord, safeStoreSet } from '../../utils/storage';
import type { IDurationCache, IMediaProber } from './interfaces';
import type { DurationLookup } from './types';
import {
    CATALOG_ERROR_MESSAGES,
    FALLBACK_DURATION_MS,
    MIN_MEDIA_DURATION_MS,
    PROBE_TIMEOUT_MS,
} from './constants';

export interface DurationCacheConfig {
    prober: IMediaProber;
    /** Persists successful probes across sessions */
    store?: IKeyValueStore;
    logger?: ILogger;
    probeTimeoutMs?: number;
}

function isDurationRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Caches durations per file so each file is probed at most once.
 * Probe failures and timeouts are logged and replaced by FALLBACK_DURATION_MS.
 */
export class DurationCache implements IDurationCache {
    private readonly _prober: IMediaProber;
    private readonly _store: IKeyValueStore | null;
    private readonly _logger: ILogger;
    private readonly _probeTimeoutMs: number;

    private readonly _durations = new Map<string, number>();
    /** Files currently holding the fallback duration */
    private readonly _fallbacks = new Set<string>();
    private readonly _inFlight = new Map<string, Promise<DurationLookup>>();

    constructor(config: DurationCacheConfig) {
        this._prober = config.prober;
        this._store = config.store ?? null;
        this._logger = createTaggedLogger('DurationCache', config.logger);
        this._probeTimeoutMs = config.probeTimeoutMs ?? PROBE_TIMEOUT_MS;
        this._loadPersisted();
    }

    public async getDuration(file: string): Promise<DurationLookup> {
        const known = this._durations.get(file);
        if (known !== undefined) {
            return { durationMs: known, cached: true, fallback: this._fallbacks.has(file) };
        }

        // Concurrent lookups for one file share a single probe
        const pending = this._inFlight.get(file);
        if (pending) {
            return pending;
        }

        const lookup = this._probe(file).finally(() => {
            this._inFlight.delete(file);
        });
        this._inFlight.set(file, lookup);
        return lookup;
    }

    public forget(file: string): void {
        this._fallbacks.delete(file);
        if (this._durations.delete(file)) {
            this._persist();
        }
    }

    public clear(): void {
        this._durations.clear();
        this._fallbacks.clear();
        this._persist();
    }

    public get size(): number {
        return this._durations.size;
    }

    private async _probe(file: string): Promise<DurationLookup> {
        try {
            const raw = await this._probeWithTimeout(file);
            if (!Number.isFinite(raw) || raw <= 0) {
                throw new Error(CATALOG_ERROR_MESSAGES.INVALID_DURATION + ': ' + String(raw));
            }
            const durationMs = Math.max(MIN_MEDIA_DURATION_MS, Math.round(raw));
            this._durations.set(file, durationMs);
            this._fallbacks.delete(file);
            this._persist();
            return { durationMs, cached: false, fallback: false };
        } catch (error) {
            this._logger.warn('Probe failed, using fallback duration for ' + file, {
                code: AppErrorCode.DURATION_PROBE_FAILED,
                cause: summarizeErrorForLog(error),
            });
            // Cached for this session only; the next session retries the probe
            this._durations.set(file, FALLBACK_DURATION_MS);
            this._fallbacks.add(file);
            return { durationMs: FALLBACK_DURATION_MS, cached: false, fallback: true };
        }
    }

    private _probeWithTimeout(file: string): Promise<number> {
        let timer: ReturnType<typeof setTimeout> | null = null;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                reject(new Error(CATALOG_ERROR_MESSAGES.PROBE_TIMEOUT));
            }, this._probeTimeoutMs);
        });
        return Promise.race([this._prober.probeDuration(file), timeout]).finally(() => {
            if (timer !== null) {
                clearTimeout(timer);
            }
        });
    }

    private _loadPersisted(): void {
        if (!this._store) {
            return;
        }
        const record = readJsonRecord(this._store, STORAGE_KEYS.DURATION_CACHE, isDurationRecord);
        if (!record) {
            return;
        }
        for (const [file, value] of Object.entries(record)) {
            if (typeof value === 'number' && Number.isFinite(value) && value >= MIN_MEDIA_DURATION_MS) {
                this._durations.set(file, Math.round(value));
            }
        }
    }

    private _persist(): void {
        if (!this._store) {
            return;
        }
        const record: Record<string, number> = {};
        for (const [file, durationMs] of this._durations) {
            if (!this._fallbacks.has(file)) {
                record[file] = durationMs;
            }
        }
        if (!safeStoreSet(this._store, STORAGE_KEYS.DURATION_CACHE, JSON.stringify(record))) {
            this._logger.warn('Failed to persist duration cache');
        }
    }
}
