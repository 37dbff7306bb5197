/**
 * Re-resolve attempts after a stale tune plan before giving up.
 */
export const MAX_STALE_RETRIES = 3;
