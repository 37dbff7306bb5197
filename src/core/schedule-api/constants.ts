export const COMMERCIAL_BREAK_TITLE = 'Commercial Break';
export const OFF_AIR_TITLE = 'Off Air';

/** Hours covered by the remote guide listing */
export const REMOTE_GUIDE_HOURS = 2;
