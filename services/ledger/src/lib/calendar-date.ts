const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarDay {
  year: number;
  month: number;
  day: number;
}

export function parseIsoDate(value: string): CalendarDay | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));

  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

export function isIsoDate(value: string) {
  return parseIsoDate(value) !== null;
}

/** YYYY-MM-DD to DD-MM-YYYY. */
export function toDisplayDate(isoDate: string) {
  const day = requireDay(isoDate);
  return `${pad(day.day)}-${pad(day.month)}-${day.year}`;
}

export function monthKeyOf(isoDate: string) {
  const day = requireDay(isoDate);
  return {
    key: `${pad(day.month)}-${day.year}`,
    year: day.year,
    month: day.month,
  };
}

export function isoDateOf(instant: Date) {
  return [
    instant.getUTCFullYear(),
    pad(instant.getUTCMonth() + 1),
    pad(instant.getUTCDate()),
  ].join('-');
}

function requireDay(isoDate: string) {
  const day = parseIsoDate(isoDate);
  if (!day) {
    throw new RangeError(`Not a calendar date: ${isoDate}`);
  }
  return day;
}

function pad(value: number) {
  return value.toString().padStart(2, '0');
}
