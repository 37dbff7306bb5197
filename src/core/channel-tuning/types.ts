/**
 * @fileoverview Types for join-in-progress channel tuning.
 * @module core/channel-tuning/types
 * @version 1.0.0
 */

import type { AppError } from '../../types/app-errors';
import type { ResolvedProgram, TunePlan } from '../../modules/scheduler/resolver/types';

/**
 * Playback engine contract.
 *
 * `load` starts `file` at `startOffsetMs` and plays at most `playForMs`,
 * the time left in the program's slot. For a commercial cut short by the
 * break budget the slot ends before the file does.
 */
export interface IPlayer {
    load(file: string, startOffsetMs: number, playForMs: number): void | Promise<void>;
}

/**
 * Anything that can say what is airing on a channel at a given instant.
 */
export interface IProgramSource {
    getCurrentProgram(channelId: string, now?: number): Promise<ResolvedProgram | null>;
}

export type TuneOutcome =
    | { kind: 'playing'; channelId: string; plan: Extract<TunePlan, { kind: 'seek' }> }
    | { kind: 'offAir'; channelId: string; error: AppError }
    | { kind: 'failed'; channelId: string; error: AppError }
    | { kind: 'ignored'; channelId: string };
