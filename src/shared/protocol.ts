/**
 * Remote Deck wire protocol
 *
 * One exchange is a single command token from the device followed by a single
 * response line from the host. Tokens are uppercase words with no arguments;
 * responses take one of four shapes:
 *
 *   OK: <description>
 *   ERROR: <message>
 *   UNKNOWN: <token>
 *   TRACK:<name>|<artist>|<album>|<duration_ms>|<position_s>|<is_playing>
 */

export const TRACK_INFO_COMMAND = 'GET_TRACK_INFO';

export const TRACK_PREFIX = 'TRACK:';

/** Answer to the track query when nothing plays or the player could not be asked */
export const EMPTY_TRACK_RESPONSE = 'TRACK:||||||false';

export const TOKEN_PATTERN = /^[A-Z0-9_]+$/;

export type ParsedResponse =
  | { kind: 'ok'; description: string }
  | { kind: 'error'; message: string }
  | { kind: 'unknown'; token: string }
  | { kind: 'track'; track: TrackInfo | null };

export interface TrackInfo {
  name: string;
  artist: string;
  album: string;
  durationMs: number;
  positionSeconds: number;
  isPlaying: boolean;
}

export function okResponse(description: string): string {
  return `OK: ${description}`;
}

export function errorResponse(message: string): string {
  return `ERROR: ${message}`;
}

export function unknownResponse(token: string): string {
  return `UNKNOWN: ${token}`;
}

export function isValidToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}

// Field separators and line breaks would shift every following field
function sanitizeField(value: string): string {
  return value.replace(/[|\r\n]+/g, ' ').trim();
}

/**
 * Build a TRACK: response from structured track data
 */
export function formatTrackResponse(track: TrackInfo): string {
  return (
    TRACK_PREFIX +
    [
      sanitizeField(track.name),
      sanitizeField(track.artist),
      sanitizeField(track.album),
      String(track.durationMs),
      String(track.positionSeconds),
      String(track.isPlaying),
    ].join('|')
  );
}

function parseNumericField(value: string): number | null {
  if (value.trim() === '') return 0;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  return parsed;
}

/**
 * Parse a TRACK: response into its six fields.
 *
 * Returns null when the line is not a track response, carries fewer than six
 * fields, or has a duration/position that is not a non-negative number.
 * Fields past the sixth are ignored and empty numbers count as zero.
 */
export function parseTrackResponse(line: string): TrackInfo | null {
  if (!line.startsWith(TRACK_PREFIX)) return null;

  const fields = line.slice(TRACK_PREFIX.length).split('|');
  if (fields.length < 6) return null;

  const [name, artist, album, durationRaw, positionRaw, playingRaw] = fields;
  const durationMs = parseNumericField(durationRaw);
  const positionSeconds = parseNumericField(positionRaw);
  if (durationMs === null || positionSeconds === null) return null;

  return {
    name,
    artist,
    album,
    durationMs,
    positionSeconds,
    isPlaying: playingRaw.trim().toLowerCase() === 'true',
  };
}

/**
 * Classify a response line. Returns null for anything outside the protocol.
 */
export function parseResponseLine(line: string): ParsedResponse | null {
  if (line.startsWith(TRACK_PREFIX)) {
    return { kind: 'track', track: parseTrackResponse(line) };
  }
  if (line.startsWith('OK: ')) {
    return { kind: 'ok', description: line.slice(4) };
  }
  if (line.startsWith('ERROR: ')) {
    return { kind: 'error', message: line.slice(7) };
  }
  if (line.startsWith('UNKNOWN: ')) {
    return { kind: 'unknown', token: line.slice(9) };
  }
  return null;
}
