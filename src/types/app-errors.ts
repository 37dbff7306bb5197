/**
 * @fileoverview Canonical application error taxonomy and base error shape.
 * @module types/app-errors
 * @version 1.0.0
 */

/**
 * Unified error codes for consistent error handling across the engine.
 */
export enum AppErrorCode {
    // Content Errors (1xx)
    EMPTY_CHANNEL = 'EMPTY_CHANNEL',
    DURATION_PROBE_FAILED = 'DURATION_PROBE_FAILED',

    // Schedule Errors (2xx)
    SCHEDULE_BUILD_FAILED = 'SCHEDULE_BUILD_FAILED',
    STALE_SCHEDULE = 'STALE_SCHEDULE',
    INVALID_TIME_RANGE = 'INVALID_TIME_RANGE',

    // Generic
    UNKNOWN = 'UNKNOWN',
}

/**
 * Base application error structure.
 */
export interface AppError {
    /** Error code from canonical taxonomy */
    code: AppErrorCode;
    /** Technical error message */
    message: string;
    /** Whether recovery might succeed */
    recoverable: boolean;
    /** Additional context for debugging */
    context?: Record<string, unknown>;
}

/**
 * Schedule-specific error carrying an AppErrorCode.
 */
export class ScheduleError extends Error {
    public readonly code: AppErrorCode;
    public readonly recoverable: boolean;

    constructor(code: AppErrorCode, message: string, recoverable = false) {
        super(message);
        this.name = 'ScheduleError';
        this.code = code;
        this.recoverable = recoverable;
    }
}

/**
 * Convert any thrown value into an AppError for reporting.
 */
export function toAppError(error: unknown, fallbackCode: AppErrorCode = AppErrorCode.UNKNOWN): AppError {
    if (error instanceof ScheduleError) {
        return { code: error.code, message: error.message, recoverable: error.recoverable };
    }
    if (error instanceof Error) {
        return { code: fallbackCode, message: error.message, recoverable: false };
    }
    return { code: fallbackCode, message: String(error), recoverable: false };
}

/**
 * Reduce an unknown error to loggable fields.
 */
export function summarizeErrorForLog(error: unknown): { name?: string; code?: unknown; message?: string } {
    if (!error || typeof error !== 'object') return {};
    const e = error as { name?: unknown; code?: unknown; message?: unknown };
    return {
        ...(typeof e.name === 'string' ? { name: e.name } : {}),
        ...('code' in e ? { code: e.code } : {}),
        ...(typeof e.message === 'string' ? { message: e.message } : {}),
    };
}
