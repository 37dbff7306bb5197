/**
 * @fileoverview Schedule settings: defaults, normalization, persistence and change detection.
 * @module config/scheduleSettings
 * @version 1.0.0
 */

import type { IKeyValueStore } from '../utils/interfaces';
import { readJsonRecord, safeStoreSet } from '../utils/storage';
import { STORAGE_KEYS } from './storageKeys';

/**
 * Settings consumed by the schedule engine.
 */
export interface ScheduleSettings {
    /** Target length of each ad break (minutes) */
    adBreakTargetMinutes: number;
    /** Minimum show length (minutes). Reserved: the builder does not filter on it. */
    minShowMinutes: number;
    /** Folder whose sub-folders are channels */
    channelsRootFolder: string;
}

export const DEFAULT_SCHEDULE_SETTINGS: Readonly<ScheduleSettings> = Object.freeze({
    adBreakTargetMinutes: 3,
    minShowMinutes: 5,
    channelsRootFolder: 'Channels',
});

export const AD_BREAK_MINUTES_RANGE = { MIN: 1, MAX: 30 } as const;
export const MIN_SHOW_MINUTES_RANGE = { MIN: 5, MAX: 60 } as const;

/** Settings whose change requires every timeline to be rebuilt */
export const SCHEDULE_AFFECTING_KEYS: readonly (keyof ScheduleSettings)[] = [
    'adBreakTargetMinutes',
    'minShowMinutes',
    'channelsRootFolder',
];

function clampInteger(value: unknown, min: number, max: number, fallback: number): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        return fallback;
    }
    return Math.min(max, Math.max(min, Math.round(value)));
}

/**
 * Coerce untrusted input (stored JSON, remote payloads) into valid settings.
 * Unknown or invalid fields fall back to defaults; numbers are clamped.
 */
export function normalizeScheduleSettings(raw: unknown): ScheduleSettings {
    const src: Record<string, unknown> =
        raw !== null && typeof raw === 'object' ? { ...raw } : {};

    const folder = src['channelsRootFolder'];
    return {
        adBreakTargetMinutes: clampInteger(
            src['adBreakTargetMinutes'],
            AD_BREAK_MINUTES_RANGE.MIN,
            AD_BREAK_MINUTES_RANGE.MAX,
            DEFAULT_SCHEDULE_SETTINGS.adBreakTargetMinutes
        ),
        minShowMinutes: clampInteger(
            src['minShowMinutes'],
            MIN_SHOW_MINUTES_RANGE.MIN,
            MIN_SHOW_MINUTES_RANGE.MAX,
            DEFAULT_SCHEDULE_SETTINGS.minShowMinutes
        ),
        channelsRootFolder:
            typeof folder === 'string' && folder.trim().length > 0
                ? folder.trim()
                : DEFAULT_SCHEDULE_SETTINGS.channelsRootFolder,
    };
}

/**
 * True when any schedule-affecting setting differs.
 */
export function isScheduleAffectingChange(prev: ScheduleSettings, next: ScheduleSettings): boolean {
    return SCHEDULE_AFFECTING_KEYS.some((key) => prev[key] !== next[key]);
}

/**
 * Ad-break target in milliseconds.
 */
export function adBreakTargetMs(settings: ScheduleSettings): number {
    return settings.adBreakTargetMinutes * 60 * 1000;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Load settings from the store. Missing or corrupt records yield defaults.
 */
export function loadScheduleSettings(store: IKeyValueStore): ScheduleSettings {
    const stored = readJsonRecord(store, STORAGE_KEYS.SCHEDULE_SETTINGS, isPlainObject);
    return normalizeScheduleSettings(stored);
}

/**
 * Persist settings. Returns false if the store rejected the write.
 */
export function saveScheduleSettings(store: IKeyValueStore, settings: ScheduleSettings): boolean {
    return safeStoreSet(store, STORAGE_KEYS.SCHEDULE_SETTINGS, JSON.stringify(settings));
}
