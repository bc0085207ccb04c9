import { createLogger } from '../logger.js';
import { SonosApiError, SonosClient } from './client.js';
import { speakersFromZones } from './discovery.js';
import { buildShareUri } from './share.js';
import { emptyPlaybackState, playbackStateFromPayload } from './state.js';
import type {
  GatewayConfig,
  OperationResult,
  PlaybackState,
  SpeakerDescriptor,
} from './types.js';

const log = createLogger('SonosGateway');

export const PLAY_SUCCESS_MESSAGE = 'Track started playing on Sonos';

/** "fetch failed (connect ECONNREFUSED ...)" rather than just "fetch failed". */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error.cause instanceof Error && error.cause.message) {
    return `${error.message} (${error.cause.message})`;
  }
  return error.message;
}

/**
 * Speaker control through node-sonos-http-api. None of the operations
 * reject: an unreachable or failing control API shows up as an empty
 * speaker list, an idle state, or an unsuccessful OperationResult.
 */
export class SonosGateway {
  private readonly config: Readonly<GatewayConfig>;
  private readonly client: SonosClient;

  constructor(config: GatewayConfig) {
    this.config = Object.freeze({ ...config });
    this.client = new SonosClient(config.apiUrl, config.requestTimeoutMs);
  }

  get settings(): Readonly<GatewayConfig> {
    return this.config;
  }

  async checkConnection(): Promise<boolean> {
    return this.client.checkConnection();
  }

  async listSpeakers(): Promise<SpeakerDescriptor[]> {
    try {
      const zones = await this.client.request('/zones');
      return speakersFromZones(zones);
    } catch (error) {
      log.debug(`Listing zones failed: ${describeError(error)}`);
      return [];
    }
  }

  async getState(speakerId: string): Promise<PlaybackState> {
    try {
      const encodedRoom = encodeURIComponent(speakerId);
      const payload = await this.client.request(`/${encodedRoom}/state`);
      return playbackStateFromPayload(payload);
    } catch (error) {
      log.debug(`State of ${speakerId} unavailable: ${describeError(error)}`);
      return emptyPlaybackState();
    }
  }

  async playTrack(speakerId: string, trackUrl: string): Promise<OperationResult> {
    let path: string;
    try {
      path = this.playPath(speakerId, trackUrl);
    } catch (error) {
      // encodeURIComponent rejects lone surrogates
      return {
        success: false,
        message: `Invalid request: ${describeError(error)}`,
      };
    }
    log.debug(`Sonos play URL: ${this.config.apiUrl}${path}`);

    try {
      await this.client.send(path);
      return { success: true, message: PLAY_SUCCESS_MESSAGE };
    } catch (error) {
      if (error instanceof SonosApiError) {
        return {
          success: false,
          message: `HTTP error ${error.status}: ${error.body}`,
        };
      }
      return {
        success: false,
        message: `Connection error: ${describeError(error)}`,
      };
    }
  }

  private playPath(speakerId: string, trackUrl: string): string {
    const encodedRoom = encodeURIComponent(speakerId);
    switch (this.config.playMode) {
      case 'share': {
        const uri = buildShareUri(this.config.fileServer, trackUrl);
        return `/${encodedRoom}/setavtransporturi/${encodeURIComponent(uri)}`;
      }
      case 'clip':
        return `/${encodedRoom}/clip/${trackUrl}`;
    }
  }
}
