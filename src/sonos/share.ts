const AUDIO_MARKER = '/audio/';

/**
 * Decode each run of %XX escapes on its own. Runs that are not valid
 * UTF-8, and stray % signs, stay as they are.
 */
function safeDecode(value: string): string {
  return value.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) => {
    try {
      return decodeURIComponent(run);
    } catch {
      return run;
    }
  });
}

/**
 * Pull the file path out of a media server track URL.
 *
 * e.g. http://localhost:5050/api/v8/audio/Test%2FKinderlieder%2FTest.mp3
 * yields Test/Kinderlieder/Test.mp3. Without an /audio/ segment the
 * whole URL is used.
 */
export function extractTrackPath(trackUrl: string): string {
  const markerAt = trackUrl.indexOf(AUDIO_MARKER);
  if (markerAt === -1) return trackUrl;

  const rest = trackUrl.slice(markerAt + AUDIO_MARKER.length);
  const nextMarker = rest.indexOf(AUDIO_MARKER);
  return safeDecode(nextMarker === -1 ? rest : rest.slice(0, nextMarker));
}

/** x-file-cifs://{fileServer}/{path} for a track the speaker can stream from the share. */
export function buildShareUri(fileServer: string, trackUrl: string): string {
  return `x-file-cifs://${fileServer}/${extractTrackPath(trackUrl)}`;
}
