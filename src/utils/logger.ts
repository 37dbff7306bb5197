/**
 * @fileoverview Console-backed logger with a component tag prefix.
 * @module utils/logger
 */

import type { ILogger } from './interfaces';

/**
 * Logger writing to the console.
 */
export const consoleLogger: ILogger = {
    debug: console.debug.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
};

/**
 * Wrap a logger so every message is prefixed with `[tag]`.
 *
 * @example
 * ```typescript
 * const log = createTaggedLogger('ScheduleCache');
 * log.warn('Build failed', err); // "[ScheduleCache] Build failed"
 * ```
 */
export function createTaggedLogger(tag: string, base: ILogger = consoleLogger): ILogger {
    const prefix = '[' + tag + '] ';
    return {
        debug: (message, ...args): void => {
            if (base.debug) {
                base.debug(prefix + message, ...args);
            }
        },
        info: (message, ...args): void => base.info(prefix + message, ...args),
        warn: (message, ...args): void => base.warn(prefix + message, ...args),
        error: (message, ...args): void => base.error(prefix + message, ...args),
    };
}
