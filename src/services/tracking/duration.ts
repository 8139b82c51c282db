/**
 * Duration parsing, formatting and elapsed-time arithmetic
 */

import { validationError } from '../../utils/errors.js';

const MS_PER_MINUTE = 60_000;

/**
 * Parse a flexible duration input into whole minutes
 */
export function parseDuration(input: string | number): number {
  const minutes = parseMinutes(input);
  if (!Number.isSafeInteger(minutes)) {
    throw validationError(`Duration is too large: ${input}`);
  }
  return minutes;
}

function parseMinutes(input: string | number): number {
  if (typeof input === 'number') {
    if (input < 0 || !Number.isFinite(input)) {
      throw validationError(`Invalid duration: ${input}`);
    }
    return Math.round(input);
  }

  const trimmed = input.trim();
  if (!trimmed) {
    throw validationError('Duration cannot be empty');
  }

  // Pure number string: treat as minutes
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed));
  }

  // Hours only: "2h", "2.5h"
  const hoursOnly = trimmed.match(/^(\d+(?:\.\d+)?)h$/i);
  if (hoursOnly?.[1]) {
    return Math.round(parseFloat(hoursOnly[1]) * 60);
  }

  // Minutes only: "30m"
  const minutesOnly = trimmed.match(/^(\d+)m$/i);
  if (minutesOnly?.[1]) {
    return parseInt(minutesOnly[1], 10);
  }

  // Hours and minutes: "2h 30m", "2h30m"
  const hoursAndMinutes = trimmed.match(/^(\d+)h\s*(\d+)m$/i);
  if (hoursAndMinutes?.[1] && hoursAndMinutes[2]) {
    const hours = parseInt(hoursAndMinutes[1], 10);
    const minutes = parseInt(hoursAndMinutes[2], 10);
    return hours * 60 + minutes;
  }

  throw validationError(
    `Invalid duration format: "${input}". Use minutes (90), hours (2h, 1.5h), or hours+minutes (1h 30m).`
  );
}

/**
 * Format minutes as a human-readable duration string
 */
export function formatDuration(minutes: number): string {
  if (minutes < 0) return '0m';
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  if (hours === 0) return `${mins}m`;
  if (mins === 0) return `${hours}h`;
  return `${hours}h ${mins}m`;
}

/**
 * Minutes charged for a stopped meeting: partial minutes round up, never below 1
 */
export function meetingDurationMinutes(startedAt: string, stoppedAt: string): number {
  const elapsedMs = Date.parse(stoppedAt) - Date.parse(startedAt);
  return Math.max(1, Math.ceil(elapsedMs / MS_PER_MINUTE));
}

/**
 * Whole minutes elapsed between a recorded start and now
 */
export function elapsedMinutes(startedAt: string, now: Date): number {
  const elapsedMs = now.getTime() - Date.parse(startedAt);
  return Math.max(0, Math.floor(elapsedMs / MS_PER_MINUTE));
}

/**
 * YYYY-MM-DD date of an ISO timestamp (UTC)
 */
export function toDateKey(timestamp: string): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}
