/** A Sonos zone coordinator, addressed by its room name. */
export interface SpeakerDescriptor {
  id: string;
  name: string;
  /** Always true: the control API only lists zones it can see. */
  available: boolean;
  /** 0-100 */
  volume?: number;
}

export interface PlaybackState {
  isPlaying: boolean;
  artist?: string;
  title?: string;
  /** Elapsed seconds in the current track. */
  position?: number;
  /** Track length in seconds. */
  duration?: number;
}

export interface OperationResult {
  success: boolean;
  message: string;
}

/**
 * share: rewrite the track URL to an x-file-cifs:// URI on the file server
 * and hand it to setavtransporturi.
 * clip: pass the track URL to the clip endpoint untouched.
 */
export type PlayMode = 'share' | 'clip';

export interface GatewayConfig {
  apiUrl: string;
  fileServer: string;
  playMode: PlayMode;
  requestTimeoutMs?: number;
}
