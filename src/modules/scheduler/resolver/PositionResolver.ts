/**
 * @fileoverview Pure functions mapping wall-clock time to timeline positions.
 * Provides O(log n) lookups over a looping timeline.
 * @module modules/scheduler/resolver/PositionResolver
 * @version 1.0.0
 */

import type { Timeline } from '../builder/types';
import type { ResolvedProgram, TunePlan } from './types';
import { MAX_WINDOW_PROGRAMS } from './constants';

// ============================================
// Binary Search
// ============================================

/**
 * Find the entry index whose span contains `positionInLoop`, i.e.
 * `entryOffsets[index] <= positionInLoop < entryOffsets[index + 1]`.
 *
 * @param positionInLoop - Position within one loop (ms)
 * @param entryOffsets - Cumulative start offsets (ascending, first is 0)
 */
export function binarySearchForEntry(
    positionInLoop: number,
    entryOffsets: readonly number[]
): number {
    let low = 0;
    let high = entryOffsets.length - 1;

    while (low < high) {
        const mid = Math.ceil((low + high) / 2);
        const midOffset = entryOffsets[mid];
        if (midOffset !== undefined && midOffset <= positionInLoop) {
            low = mid;
        } else {
            high = mid - 1;
        }
    }

    return low;
}

// ============================================
// Program Construction
// ============================================

/**
 * Place entry `entryIndex` of loop `loopNumber` in real time.
 * @returns null when the index is out of range
 */
export function programAt(
    timeline: Timeline,
    epoch: number,
    entryIndex: number,
    loopNumber: number,
    queryTime: number
): ResolvedProgram | null {
    const entry = timeline.entries[entryIndex];
    const offset = timeline.entryOffsets[entryIndex];
    if (!entry || offset === undefined) {
        return null;
    }

    const programStart = epoch + loopNumber * timeline.totalDurationMs + offset;
    const programEnd = programStart + entry.durationMs;
    const elapsedMs = Math.min(entry.durationMs, Math.max(0, queryTime - programStart));

    return {
        entry,
        ref: entry.ref,
        item: entry.ref.item,
        durationMs: entry.durationMs,
        isAd: entry.isAd,
        segment: entry.ref.kind === 'ad' ? entry.ref : null,
        programStart,
        programEnd,
        elapsedMs,
        remainingMs: entry.durationMs - elapsedMs,
        entryIndex,
        loopNumber,
    };
}

// ============================================
// Current Program
// ============================================

/**
 * Resolve what is airing at `now`.
 *
 * `position = max(0, now - epoch) mod total`; the entry containing that
 * position is reported with its start for the current loop iteration,
 * so the same (timeline, epoch, now) always gives the same answer.
 *
 * @returns null for an empty (off-air) timeline
 */
export function resolveCurrent(
    timeline: Timeline,
    epoch: number,
    now: number
): ResolvedProgram | null {
    const total = timeline.totalDurationMs;
    if (timeline.entries.length === 0 || total <= 0) {
        return null;
    }

    const elapsed = Math.max(0, now - epoch);
    const loopNumber = Math.floor(elapsed / total);
    const positionInLoop = elapsed % total;
    const entryIndex = binarySearchForEntry(positionInLoop, timeline.entryOffsets);

    return programAt(timeline, epoch, entryIndex, loopNumber, now);
}

/**
 * The program following `program`, wrapping into the next loop.
 */
export function resolveNext(
    timeline: Timeline,
    epoch: number,
    program: ResolvedProgram
): ResolvedProgram | null {
    const count = timeline.entries.length;
    if (count === 0) {
        return null;
    }
    const wraps = program.entryIndex + 1 >= count;
    return programAt(
        timeline,
        epoch,
        wraps ? 0 : program.entryIndex + 1,
        wraps ? program.loopNumber + 1 : program.loopNumber,
        program.programEnd
    );
}

/**
 * The `count` programs starting with the one airing at `now`.
 */
export function resolveUpcoming(
    timeline: Timeline,
    epoch: number,
    now: number,
    count: number
): ResolvedProgram[] {
    const programs: ResolvedProgram[] = [];
    let current = count > 0 ? resolveCurrent(timeline, epoch, now) : null;
    while (current && programs.length < count) {
        programs.push(current);
        current = resolveNext(timeline, epoch, current);
    }
    return programs;
}

// ============================================
// Window Walk
// ============================================

/**
 * All programs overlapping `[startTime, endTime)`, in loop-adjusted time:
 * the program in progress at `startTime` (if it started earlier) followed by
 * every program starting inside the window. Works for any window, however
 * many loops past the epoch.
 */
export function walkWindow(
    timeline: Timeline,
    epoch: number,
    startTime: number,
    endTime: number
): ResolvedProgram[] {
    const programs: ResolvedProgram[] = [];
    if (endTime <= startTime) {
        return programs;
    }

    let current = resolveCurrent(timeline, epoch, startTime);
    while (
        current &&
        current.programStart < endTime &&
        programs.length < MAX_WINDOW_PROGRAMS
    ) {
        if (current.programEnd > startTime) {
            programs.push(current);
        }
        current = resolveNext(timeline, epoch, current);
    }
    return programs;
}

// ============================================
// Tuning
// ============================================

/**
 * Decide how to join `program` at `now`.
 *
 * The seek offset is `now - programStart` (clamped at 0). If that is at or
 * past the program's duration the plan is `stale` and the caller must
 * re-resolve. Ad segments add their `startOffsetMs` to the seek position.
 */
export function planTune(program: ResolvedProgram, now: number): TunePlan {
    const offsetMs = Math.max(0, now - program.programStart);
    if (offsetMs >= program.durationMs) {
        return { kind: 'stale', program, offsetMs };
    }
    const segmentOffset = program.segment ? program.segment.startOffsetMs : 0;
    return {
        kind: 'seek',
        program,
        file: program.item.id,
        seekMs: offsetMs + segmentOffset,
        offsetMs,
        remainingMs: program.durationMs - offsetMs,
    };
}
