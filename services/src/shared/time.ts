const HOUR_MS = 3_600_000;

const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i;
const WALL_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;

const zoneParts = (date: Date, timeZone: string, options: Intl.DateTimeFormatOptions) => {
  const parts = new Intl.DateTimeFormat('en-US', { timeZone, ...options }).formatToParts(date);
  const dictionary: Record<string, string> = {};
  for (const part of parts) {
    if (part.type !== 'literal') {
      dictionary[part.type] = part.value;
    }
  }
  return dictionary;
};

// Milliseconds to add to UTC to get wall-clock time in `timeZone` at `instant`.
const zoneOffsetMs = (instant: number, timeZone: string) => {
  const p = zoneParts(new Date(instant), timeZone, {
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  });
  const asUtc = Date.UTC(
    Number(p.year),
    Number(p.month) - 1,
    Number(p.day),
    Number(p.hour),
    Number(p.minute),
    Number(p.second)
  );
  return asUtc - Math.floor(instant / 1000) * 1000;
};

/**
 * Resolves a stored timestamp to an instant. Strings carrying `Z` or an offset are
 * taken as-is; bare `YYYY-MM-DD[THH:mm[:ss]]` strings are wall-clock time in `timeZone`.
 * Returns `undefined` for anything unparseable.
 */
export const normalizeTimestamp = (value: string, timeZone: string): Date | undefined => {
  const trimmed = value.trim();
  if (HAS_OFFSET.test(trimmed)) {
    const parsed = new Date(trimmed);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }

  const match = WALL_TIME.exec(trimmed);
  if (!match) return undefined;
  const [, year, month, day, hour = '00', minute = '00', second = '00'] = match;
  const wall = Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second));
  if (Number.isNaN(wall)) return undefined;

  // A second pass settles wall times that sit next to a DST change.
  const firstGuess = wall - zoneOffsetMs(wall, timeZone);
  const corrected = wall - zoneOffsetMs(firstGuess, timeZone);
  return new Date(corrected);
};

export const wholeHoursBetween = (earlier: Date, later: Date) =>
  Math.floor((later.getTime() - earlier.getTime()) / HOUR_MS);

/** e.g. "October 21, 2026 at 05:00 PM" in the given zone. */
export const formatDeadline = (date: Date, timeZone: string) => {
  const p = zoneParts(date, timeZone, {
    year: 'numeric',
    month: 'long',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hour12: true
  });
  return `${p.month} ${p.day}, ${p.year} at ${p.hour}:${p.minute} ${p.dayPeriod}`;
};

export const formatDate = (date: Date, timeZone: string) => {
  const p = zoneParts(date, timeZone, { year: 'numeric', month: 'long', day: '2-digit' });
  return `${p.month} ${p.day}, ${p.year}`;
};
