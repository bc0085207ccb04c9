import { isRecord } from './json.js';
import type { SpeakerDescriptor } from './types.js';

export interface SonosZone {
  coordinator: {
    roomName: string;
    state?: unknown;
  };
}

function isZone(value: unknown): value is SonosZone {
  return (
    isRecord(value) &&
    isRecord(value.coordinator) &&
    typeof value.coordinator.roomName === 'string'
  );
}

function readVolume(zone: SonosZone): number | undefined {
  const state = zone.coordinator.state;
  if (!isRecord(state)) return undefined;
  const volume = state.volume;
  if (typeof volume !== 'number' || !Number.isInteger(volume)) return undefined;
  return volume >= 0 && volume <= 100 ? volume : undefined;
}

/**
 * Map a /zones payload to one descriptor per zone coordinator. Zones
 * without a coordinator room name are skipped, and anything that is not
 * an array yields no speakers.
 */
export function speakersFromZones(zones: unknown): SpeakerDescriptor[] {
  if (!Array.isArray(zones)) return [];

  const speakers: SpeakerDescriptor[] = [];
  for (const zone of zones) {
    if (!isZone(zone)) continue;
    const roomName = zone.coordinator.roomName;
    const speaker: SpeakerDescriptor = {
      id: roomName,
      name: roomName,
      available: true,
    };
    const volume = readVolume(zone);
    if (volume !== undefined) {
      speaker.volume = volume;
    }
    speakers.push(speaker);
  }
  return speakers;
}
