/**
 * Calendar helpers for patient-local dates and times.
 * Dates are plain `YYYY-MM-DD` strings; times of day are `HH:MM`.
 */

export interface LocalDateTime {
  date: string;
  hour: number;
  minute: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    getFormatter(timezone);
    return true;
  } catch {
    return false;
  }
}

export function toLocalDateTime(timezone: string, instant: Date): LocalDateTime {
  const parts = getFormatter(timezone).formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '00';

  return {
    date: `${get('year')}-${get('month')}-${get('day')}`,
    hour: Number(get('hour')),
    minute: Number(get('minute')),
  };
}

export function localDate(timezone: string, instant: Date): string {
  return toLocalDateTime(timezone, instant).date;
}

/** Shift a YYYY-MM-DD date by whole days. */
export function shiftDate(date: string, days: number): string {
  const [year, month, day] = date.split('-').map(Number);
  const shifted = new Date(Date.UTC(year ?? 1970, (month ?? 1) - 1, (day ?? 1) + days));
  return shifted.toISOString().slice(0, 10);
}

export interface TimeOfDay {
  hour: number;
  minute: number;
}

/**
 * Parse `H:MM` or `HH:MM` into hour/minute, or null when the text is not a
 * valid 24h time of day.
 */
export function parseTimeOfDay(text: string): TimeOfDay | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(text.trim());
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;

  return { hour, minute };
}

export function formatTimeOfDay({ hour, minute }: TimeOfDay): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

/** Normalise `9:05` to `09:05`; null when not a time of day. */
export function normalizeTimeOfDay(text: string): string | null {
  const parsed = parseTimeOfDay(text);
  return parsed ? formatTimeOfDay(parsed) : null;
}
