export { ScheduleApi } from './ScheduleApi';
export type { ScheduleApiDeps } from './ScheduleApi';
export type {
    NowPlaying,
    GuideListing,
    ChannelGuide,
    GuideOptions,
    ScheduleStatus,
    ITunerHandle,
    RemoteCommand,
    CommandResult,
} from './types';
export { COMMERCIAL_BREAK_TITLE, OFF_AIR_TITLE, REMOTE_GUIDE_HOURS } from './constants';
