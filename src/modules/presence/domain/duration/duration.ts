import { toAsciiDigits, toPersianDigits } from '../calendar/persian-digits';

/** Precedes the duration token on a segment line. */
export const DURATION_MARKER = 'مدت:';

/**
 * `minutes` renders the legacy `H:MM` form, `seconds` the current `H:MM:SS`.
 */
export type DurationPrecision = 'minutes' | 'seconds';

export type FormatDurationOptions = {
  precision?: DurationPrecision;
  persianDigits?: boolean;
};

const FIELD = /^\d+$/;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatDuration(
  elapsedSeconds: number,
  options: FormatDurationOptions = {},
): string {
  const total = Math.max(0, Math.floor(elapsedSeconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;

  const text =
    options.precision === 'minutes'
      ? `${hours}:${pad2(minutes)}`
      : `${hours}:${pad2(minutes)}:${pad2(seconds)}`;

  return options.persianDigits ? toPersianDigits(text) : text;
}

function parseDurationToken(token: string): number | null {
  const fields = toAsciiDigits(token).split(':');
  if (fields.length !== 2 && fields.length !== 3) return null;
  if (!fields.every((field) => FIELD.test(field))) return null;

  const [hours, minutes, seconds = 0] = fields.map(Number);
  return hours * 3600 + minutes * 60 + seconds;
}

function tokenAfterMarker(line: string): string | null {
  const index = line.indexOf(DURATION_MARKER);
  if (index === -1) return null;
  const [token] = line
    .slice(index + DURATION_MARKER.length)
    .trim()
    .split(/\s+/);
  return token ? token : null;
}

/**
 * Seconds recorded on a segment line, or `null` when the line carries no
 * readable duration (summary lines, foreign or truncated text).
 */
export function parseLineDuration(line: string): number | null {
  const token = tokenAfterMarker(line);
  return token === null ? null : parseDurationToken(token);
}

/**
 * Like `parseLineDuration`, but a text without the marker is read as a bare
 * duration token (`۰:۰۰:۰۵`, `2:45`).
 */
export function tryParseDuration(text: string): number | null {
  if (text.includes(DURATION_MARKER)) {
    return parseLineDuration(text);
  }
  return parseDurationToken(text.trim());
}

/** Never throws: anything unreadable counts as zero. */
export function parseDuration(text: string): number {
  return tryParseDuration(text) ?? 0;
}
