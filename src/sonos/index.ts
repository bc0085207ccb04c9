export { SonosGateway, PLAY_SUCCESS_MESSAGE, describeError } from './gateway.js';
export { SonosClient, SonosApiError } from './client.js';
export { speakersFromZones } from './discovery.js';
export { parseTimeToSeconds, playbackStateFromPayload } from './state.js';
export { buildShareUri, extractTrackPath } from './share.js';
export type {
  GatewayConfig,
  OperationResult,
  PlayMode,
  PlaybackState,
  SpeakerDescriptor,
} from './types.js';
