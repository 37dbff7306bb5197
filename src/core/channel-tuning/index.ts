export { ChannelTuningCoordinator } from './ChannelTuningCoordinator';
export type { ChannelTuningCoordinatorDeps } from './ChannelTuningCoordinator';
export type { IPlayer, IProgramSource, TuneOutcome } from './types';
export { MAX_STALE_RETRIES } from './constants';
