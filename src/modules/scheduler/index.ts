/**
 * @fileoverview Public exports for the scheduler modules.
 * @module modules/scheduler
 * @version 1.0.0
 */

export * from './show-order';
export * from './builder';
export * from './resolver';
export * from './cache';
