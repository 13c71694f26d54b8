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

  const [year, month, day] = dateISO.split('-').map(Number);

  // JavaScript Date is lenient: '2025-02-30' rolls over to March, so compare components back
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    !isNaN(date.getTime()) &&
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
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

/**
 * Checks that a value is a non-array object (a decoded JSON object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Validates an ISO-8601 instant such as `2025-09-21T23:00:00Z`
 */
export function isValidInstant(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}T/.test(value) && !isNaN(Date.parse(value));
}
