export interface LocalDate {
  year: number;
  month: number;
  day: number;
}

export interface LocalDateTime extends LocalDate {
  hour: number;
  minute: number;
  second: number;
}

export interface ZonedDateTime extends LocalDateTime {
  /** 1 = Monday … 7 = Sunday */
  isoWeekday: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0');
}

export function isoWeekdayOf(date: LocalDate): number {
  const weekday = new Date(
    Date.UTC(date.year, date.month - 1, date.day),
  ).getUTCDay();
  return weekday === 0 ? 7 : weekday;
}

export function addDays(date: LocalDate, days: number): LocalDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

export function formatLocalDate(date: LocalDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

/**
 * Wall-clock reading of `date` in `timeZone`.
 */
export function toZonedDateTime(date: Date, timeZone: string): ZonedDateTime {
  const values: Partial<Record<Intl.DateTimeFormatPartTypes, number>> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      values[part.type] = Number(part.value);
    }
  }

  const local: LocalDateTime = {
    year: values.year ?? 0,
    month: values.month ?? 1,
    day: values.day ?? 1,
    hour: (values.hour ?? 0) % 24,
    minute: values.minute ?? 0,
    second: values.second ?? 0,
  };

  return { ...local, isoWeekday: isoWeekdayOf(local) };
}

function zoneOffsetMs(date: Date, timeZone: string): number {
  const local = toZonedDateTime(date, timeZone);
  const wallAsUtc = Date.UTC(
    local.year,
    local.month - 1,
    local.day,
    local.hour,
    local.minute,
    local.second,
  );
  return wallAsUtc - Math.floor(date.getTime() / 1000) * 1000;
}

/**
 * Instant at which the wall clock of `timeZone` shows `local`. A wall time
 * skipped by a DST jump resolves past the jump.
 */
export function fromZonedDateTime(
  local: LocalDateTime,
  timeZone: string,
): Date {
  const wallAsUtc = Date.UTC(
    local.year,
    local.month - 1,
    local.day,
    local.hour,
    local.minute,
    local.second,
  );
  const guessOffset = zoneOffsetMs(new Date(wallAsUtc), timeZone);
  const candidate = wallAsUtc - guessOffset;
  const candidateOffset = zoneOffsetMs(new Date(candidate), timeZone);

  if (candidateOffset === guessOffset) {
    return new Date(candidate);
  }

  const alternative = wallAsUtc - candidateOffset;
  if (zoneOffsetMs(new Date(alternative), timeZone) === candidateOffset) {
    return new Date(alternative);
  }

  return new Date(Math.max(candidate, alternative));
}

/**
 * Formats `date` as `hh:mmAM @ YYYY-MM-DD` on the wall clock of `timeZone`.
 */
export function formatSheetTimestamp(date: Date, timeZone: string): string {
  const local = toZonedDateTime(date, timeZone);
  const meridiem = local.hour < 12 ? 'AM' : 'PM';
  const hour12 = local.hour % 12 === 0 ? 12 : local.hour % 12;
  return `${pad(hour12)}:${pad(local.minute)}${meridiem} @ ${formatLocalDate(local)}`;
}
