/**
 * @fileoverview Media formatting helpers.
 * @module utils/mediaFormat
 */

const EPISODE_PREFIX = /^(S\d+E\d+|Episode\s*\d+|Ep\s*\d+)\s*[-_]\s*/i;
const EPISODE_SUFFIX = /\s*[-_]\s*(S\d+E\d+|Episode\s*\d+|Ep\s*\d+)$/i;
const MAX_TITLE_LENGTH = 50;

/**
 * Turn a media file path into a display title.
 * Strips directories, extension and leading/trailing episode markers,
 * and collapses dots/underscores into spaces.
 *
 * @example
 * formatShowName('Channels/Retro/Shows/S01E02 - The_Big.Heist.mkv'); // 'The Big Heist'
 */
export function formatShowName(filePath: string): string {
    const base = filePath.split(/[\\/]/).pop() ?? filePath;
    const dot = base.lastIndexOf('.');
    let name = dot > 0 ? base.slice(0, dot) : base;
    name = name.replace(EPISODE_PREFIX, '');
    name = name.replace(EPISODE_SUFFIX, '');
    name = name.replace(/[._]+/g, ' ');
    name = name.replace(/\s+/g, ' ').trim();
    return name.length > MAX_TITLE_LENGTH ? name.slice(0, MAX_TITLE_LENGTH) + '...' : name;
}

/**
 * Format a timestamp as local HH:MM for guide listings.
 */
export function formatClockTime(timeMs: number): string {
    const d = new Date(timeMs);
    const pad = (n: number): string => (n < 10 ? '0' + n : String(n));
    return pad(d.getHours()) + ':' + pad(d.getMinutes());
}
