/**
 * @fileoverview Public exports for the show order store.
 * @module modules/scheduler/show-order
 */

export { ShowOrderStore } from './ShowOrderStore';
export type { IShowOrderStore } from './ShowOrderStore';
