/**
 * Validation Utilities
 *
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

export { ValidationError } from '../errors/index.js';

/**
 * Validates a date string in ISO format (YYYY-MM-DD)
 *
 * @param dateISO - Date string to validate
 * @returns True if valid, false otherwise
 */
export function isValidDateISO(dateISO: string): boolean {
  const regex = /^\d{4}-\d{2}-\d{2}$/;
  if (!regex.test(dateISO)) {
    return false;
  }

  // Parse the date components to validate they're actually valid
  const [year, month, day] = dateISO.split('-').map(Number);

  // JavaScript Date is lenient: '2025-02-30' becomes 2025-03-02, so the components must round-trip
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    !isNaN(date.getTime()) &&
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Validates an NBA.com game ID (10-digit numeric string, e.g. "0022300123")
 *
 * @param gameId - Game ID to validate
 * @returns True if valid, false otherwise
 */
export function isValidGameId(gameId: string): boolean {
  return /^\d{10}$/.test(gameId);
}

/**
 * Validates an NBA.com team ID (positive integer, e.g. 1610612747)
 */
export function isValidTeamId(teamId: number): boolean {
  return Number.isInteger(teamId) && teamId > 0;
}

/**
 * Validates a team tricode (2-5 uppercase letters, e.g. "LAL")
 */
export function isValidTricode(tricode: string): boolean {
  return /^[A-Z]{2,5}$/.test(tricode);
}

/**
 * Validates an IANA time zone name
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validates a URL string
 *
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}
