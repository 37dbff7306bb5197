/**
 * @fileoverview Constants for the Position Resolver.
 * @module modules/scheduler/resolver/constants
 * @version 1.0.0
 */

/** Upper bound on programs returned by one window walk */
export const MAX_WINDOW_PROGRAMS = 5000;
