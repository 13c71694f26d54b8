/**
 * Date Utilities
 */

/**
 * Gets a calendar date in YYYY-MM-DD format as seen in the given timezone
 *
 * NHL scoreboards are organized by North American calendar day, so "today"
 * is resolved in a configured zone rather than the server's.
 *
 * @param timeZone - IANA zone, e.g. America/New_York
 * @param now - Instant to convert (defaults to the current time)
 */
export function dateInTimeZone(timeZone: string, now: Date = new Date()): string {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });

  const parts = formatter.formatToParts(now);
  const year = parts.find((p) => p.type === 'year')?.value;
  const month = parts.find((p) => p.type === 'month')?.value;
  const day = parts.find((p) => p.type === 'day')?.value;

  return `${year}-${month}-${day}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
