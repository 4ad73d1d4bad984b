/**
 * Header parsing utilities
 */

const ONE_YEAR_SECONDS = 86400 * 365;

/**
 * Parses the Retry-After header value.
 *
 * The header can be:
 * - A number of seconds (e.g., "120")
 * - An HTTP-date (e.g., "Wed, 21 Oct 2015 07:28:00 GMT")
 *
 * @returns Date when retry is allowed, or null if absent or malformed
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): Date | null {
  if (!header) {
    return null;
  }

  const trimmed = header.trim();

  if (/^\d+$/.test(trimmed)) {
    const seconds = parseInt(trimmed, 10);
    // Cap at 1 year
    if (seconds > ONE_YEAR_SECONDS) {
      return null;
    }
    return new Date(now + seconds * 1000);
  }

  const date = Date.parse(trimmed);
  if (!isNaN(date) && date > now && date < now + ONE_YEAR_SECONDS * 1000) {
    return new Date(date);
  }

  return null;
}

/**
 * Milliseconds until the given Retry-After date, never negative.
 */
export function millisUntil(date: Date, now: number = Date.now()): number {
  return Math.max(0, date.getTime() - now);
}
