import { ForecastValidationError } from './forecast.errors';

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Offset of `timezone` from UTC at the given instant, in milliseconds
 */
function timeZoneOffset(instant: number, timezone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(new Date(instant));

  const value = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value ?? 0);

  const asUtc = Date.UTC(
    value('year'),
    value('month') - 1,
    value('day'),
    value('hour'),
    value('minute'),
    value('second'),
  );

  return asUtc - Math.floor(instant / 1000) * 1000;
}

/**
 * Parse a "YYYY-MM-DD HH:MM:SS" wall-clock time in an IANA timezone into an
 * absolute instant
 */
export function parseZonedTimestamp(timestamp: string, timezone: string): Date {
  const match = TIMESTAMP_PATTERN.exec(timestamp);
  if (!match) {
    throw new ForecastValidationError(
      `Invalid timestamp format. Expected 'YYYY-MM-DD HH:MM:SS': ${timestamp}`,
    );
  }

  if (!isValidTimeZone(timezone)) {
    throw new ForecastValidationError(`Unknown timezone: ${timezone}`);
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => parseInt(part, 10));

  const wallClock = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(wallClock);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    throw new ForecastValidationError(
      `Invalid timestamp. Not a real date and time: ${timestamp}`,
    );
  }

  // Second pass settles instants near a DST transition
  let instant = wallClock - timeZoneOffset(wallClock, timezone);
  instant = wallClock - timeZoneOffset(instant, timezone);

  return new Date(instant);
}
