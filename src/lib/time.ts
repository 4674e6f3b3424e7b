/**
 * Approach Time Utilities
 *
 * Close-approach times arrive as `YYYY-MMM-DD hh:mm` (e.g. `1900-Jan-01 00:00`)
 * and are always UTC. They are displayed as `YYYY-MM-DD hh:mm`; there is no
 * seconds precision in the source data, so none is printed.
 */

import { DataLoadError, ErrorCode, McpError } from '../shared/errors/index.js';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const APPROACH_TIME_PATTERN = /^(\d{4})-([A-Za-z]{3})-(\d{2}) (\d{2}):(\d{2})$/;
const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Build a UTC date, or null when any field is out of range.
 * setUTCFullYear keeps years below 100 from being read as 19xx.
 */
function buildUtcDate(
  year: number,
  monthIndex: number,
  day: number,
  hours = 0,
  minutes = 0,
): Date | null {
  if (monthIndex < 0 || monthIndex > 11 || hours > 23 || minutes > 59 || day < 1) {
    return null;
  }
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(hours, minutes, 0, 0);
  // Rolled over into the next month (e.g. Feb 30)
  if (date.getUTCMonth() !== monthIndex) {
    return null;
  }
  return date;
}

/**
 * Parse a compact close-approach time such as `1900-Jan-01 00:00`.
 *
 * @throws DataLoadError with code INVALID_TIMESTAMP on malformed input
 */
export function parseApproachTime(text: string): Date {
  const match = APPROACH_TIME_PATTERN.exec(text.trim());
  const date = match
    ? buildUtcDate(
        Number(match[1]),
        MONTHS.indexOf(match[2].toLowerCase()),
        Number(match[3]),
        Number(match[4]),
        Number(match[5]),
      )
    : null;

  if (!date) {
    throw new DataLoadError(`Invalid approach time: "${text}"`, ErrorCode.INVALID_TIMESTAMP, {
      value: text,
    });
  }
  return date;
}

/**
 * Format as `YYYY-MM-DD hh:mm` (UTC)
 */
export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

/**
 * Format the calendar-date part as `YYYY-MM-DD` (UTC)
 */
export function formatDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * Validate a `YYYY-MM-DD` calendar date supplied as a query criterion.
 *
 * @returns The same date, which already sorts and compares as text
 * @throws McpError with code INVALID_ARGUMENT
 */
export function parseCalendarDate(text: string): string {
  const match = CALENDAR_DATE_PATTERN.exec(text);
  const date = match ? buildUtcDate(Number(match[1]), Number(match[2]) - 1, Number(match[3])) : null;

  if (!date) {
    throw McpError.invalidArgument(`Invalid date "${text}", expected YYYY-MM-DD`, { value: text });
  }
  return formatDate(date);
}
