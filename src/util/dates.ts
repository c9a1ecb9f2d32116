/**
 * Date Utilities
 *
 * Game days are calendar dates (YYYY-MM-DD) in a configured time zone,
 * not instants, so arithmetic happens on UTC midnights.
 */

import { isValidDateISO, ValidationError } from './validation.js';

/**
 * Gets the date in YYYY-MM-DD format for the given time zone
 *
 * NBA games are scheduled in Eastern Time by default, so "today" follows the
 * configured zone regardless of the machine's time zone.
 *
 * @param timeZone - IANA zone name (e.g. 'America/New_York')
 * @param now - Instant to convert (defaults to the current time)
 */
export function todayISO(timeZone: string, now: Date = new Date()): string {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });

  const parts = formatter.formatToParts(now);
  const year = parts.find(p => p.type === 'year')?.value;
  const month = parts.find(p => p.type === 'month')?.value;
  const day = parts.find(p => p.type === 'day')?.value;

  return `${year}-${month}-${day}`;
}

/**
 * Shifts a calendar date by a number of days
 *
 * @example
 * addDays('2025-03-01', -1) // '2025-02-28'
 */
export function addDays(dateISO: string, days: number): string {
  if (!isValidDateISO(dateISO)) {
    throw new ValidationError(`Invalid date format: ${dateISO}`, 'dateISO');
  }
  const [y, m, d] = dateISO.split('-').map(Number);
  const shifted = new Date(Date.UTC(y, m - 1, d + days));
  return shifted.toISOString().slice(0, 10);
}

/**
 * Returns `dateISO`, or `today` when the date lies in the future
 */
export function clampToToday(dateISO: string, today: string): string {
  return dateISO > today ? today : dateISO;
}
