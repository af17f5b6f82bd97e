import type { CalendarDate } from './types';

const RU_MONTHS: Record<string, number> = {
  января: 1,
  февраля: 2,
  марта: 3,
  апреля: 4,
  мая: 5,
  июня: 6,
  июля: 7,
  августа: 8,
  сентября: 9,
  октября: 10,
  ноября: 11,
  декабря: 12,
};

const DOTTED_PATTERN = /^(\d{1,2})\.(\d{1,2})\.(\d{4})/;
const RU_LONG_PATTERN = /^(\d{1,2})\s+([а-яё]+)\s+(\d{4})/iu;
const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T\s])/;
const SLASHED_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})/;

type DateFormat = (text: string) => CalendarDate | null;

// Tried in this order; day always precedes month.
const FORMATS: DateFormat[] = [
  (text) => {
    const m = text.match(DOTTED_PATTERN);
    return m ? toCalendarDate(Number(m[3]), Number(m[2]), Number(m[1])) : null;
  },
  (text) => {
    const m = text.match(RU_LONG_PATTERN);
    if (!m) return null;
    const month = RU_MONTHS[m[2].toLowerCase()];
    return month ? toCalendarDate(Number(m[3]), month, Number(m[1])) : null;
  },
  (text) => {
    const m = text.match(ISO_PATTERN);
    return m ? toCalendarDate(Number(m[1]), Number(m[2]), Number(m[3])) : null;
  },
  (text) => {
    const m = text.match(SLASHED_PATTERN);
    return m ? toCalendarDate(Number(m[3]), Number(m[2]), Number(m[1])) : null;
  },
];

/**
 * Parses a review date as the marketplace prints it.
 *
 * Accepts `DD.MM.YYYY`, `30 марта 2025`, ISO-8601 and `DD/MM/YYYY`.
 * Returns null when no format yields a real calendar date.
 */
export function parseReviewDate(raw: string | null | undefined): CalendarDate | null {
  if (!raw) return null;
  const text = raw.replace(/\s+/g, ' ').trim();
  if (!text) return null;

  for (const format of FORMATS) {
    const parsed = format(text);
    if (parsed) return parsed;
  }
  return null;
}

export function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
  if (month < 1 || month > 12 || day < 1) return null;

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;

  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

/** UTC calendar date of an instant */
export function calendarDateOf(instant: Date): CalendarDate {
  return instant.toISOString().slice(0, 10);
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}
