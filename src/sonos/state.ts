import { isRecord } from './json.js';
import type { PlaybackState } from './types.js';

/**
 * Parse "MM:SS" or "H:MM:SS" into seconds. Plain numbers are taken as
 * seconds already. Anything else yields null.
 */
export function parseTimeToSeconds(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.floor(value) : null;
  }
  if (typeof value !== 'string') return null;

  const parts = value.split(':');
  if (parts.length !== 2 && parts.length !== 3) return null;
  if (parts.some((part) => !/^\d+$/.test(part))) return null;

  const [seconds, minutes, hours = 0] = parts.map((part) => parseInt(part, 10)).reverse();
  return hours * 3600 + minutes * 60 + seconds;
}

export function emptyPlaybackState(): PlaybackState {
  return { isPlaying: false };
}

/** Map a /{room}/state payload to a PlaybackState. */
export function playbackStateFromPayload(payload: unknown): PlaybackState {
  if (!isRecord(payload)) return emptyPlaybackState();
  const track: Record<string, unknown> = isRecord(payload.currentTrack)
    ? payload.currentTrack
    : {};

  const result: PlaybackState = {
    isPlaying: payload.playbackState === 'PLAYING',
  };
  if (typeof track.artist === 'string') result.artist = track.artist;
  if (typeof track.title === 'string') result.title = track.title;

  const position = parseTimeToSeconds(payload.relTime);
  if (position !== null) result.position = position;
  const duration = parseTimeToSeconds(track.duration);
  if (duration !== null) result.duration = duration;

  return result;
}
