/**
 * @fileoverview Public exports for the Position Resolver.
 * @module modules/scheduler/resolver
 * @version 1.0.0
 */

export {
    binarySearchForEntry,
    programAt,
    resolveCurrent,
    resolveNext,
    resolveUpcoming,
    walkWindow,
    planTune,
} from './PositionResolver';

export type { ResolvedProgram, TunePlan } from './types';

export { MAX_WINDOW_PROGRAMS } from './constants';
