/**
 * @fileoverview Public exports for the live-schedule engine.
 * @module index
 * @version 1.0.0
 */

export { createScheduleEngine } from './engine';
export type { ScheduleEngineConfig, ScheduleEngine } from './engine';

export * from './types/app-errors';
export * from './utils';
export * from './config/storageKeys';
export * from './config/scheduleSettings';
export * from './modules/catalog';
export * from './modules/scheduler';
export * from './core/channel-tuning';
export * from './core/schedule-api';
