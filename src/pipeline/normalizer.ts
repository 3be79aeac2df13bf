/**
 * Conversions from scraped cell text to typed values.
 *
 * Every function here is total: malformed input maps to a fixed sentinel
 * (0, null, or the input itself) instead of throwing, so a single odd cell
 * never costs the rest of the page.
 */

export interface Fraction {
  landed: number;
  attempted: number;
}

export interface FightRecord {
  wins: number | null;
  losses: number | null;
  ties: number | null;
}

const EMPTY_MARKERS = new Set(['', '--', '---']);
const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

function isEmpty(text: string): boolean {
  return EMPTY_MARKERS.has(text);
}

function toNumber(text: string): number | null {
  return NUMERIC.test(text) ? Number(text) : null;
}

/** "4:32" → 272. Blank markers and anything that is not M:SS give 0. */
export function parseControlTime(raw: string): number {
  const text = raw.trim();
  if (isEmpty(text)) return 0;
  const match = text.match(/^(\d+):(\d+)$/);
  if (!match) return 0;
  const [, minutes = '0', seconds = '0'] = match;
  return Number(minutes) * 60 + Number(seconds);
}

/** "12 of 34" → 12/34, a bare "5" → 5/0, anything else → 0/0. */
export function parseFraction(raw: string): Fraction {
  const text = raw.trim();
  const match = text.match(/^(\d+)\s+of\s+(\d+)/);
  if (match) {
    const [, landed = '0', attempted = '0'] = match;
    return { landed: Number(landed), attempted: Number(attempted) };
  }
  if (/^\d+$/.test(text)) return { landed: Number(text), attempted: 0 };
  return { landed: 0, attempted: 0 };
}

/** Whole-number counters such as submission attempts; non-digits give 0. */
export function parseCount(raw: string): number {
  const text = raw.trim();
  return /^\d+$/.test(text) ? Number(text) : 0;
}

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function monthFromName(name: string, allowAbbreviated: boolean): number | null {
  const lower = name.toLowerCase();
  const full = MONTHS.indexOf(lower);
  if (full >= 0) return full + 1;
  if (!allowAbbreviated || lower.length !== 3) return null;
  const short = MONTHS.findIndex((m) => m.startsWith(lower));
  return short >= 0 ? short + 1 : null;
}

function parseCalendarDate(text: string, allowAbbreviated: boolean): CalendarDate | null {
  const match = text.match(/^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/);
  if (!match) return null;
  const [, monthName = '', dayText = '', yearText = ''] = match;
  const month = monthFromName(monthName, allowAbbreviated);
  if (month === null) return null;
  const year = Number(yearText);
  const day = Number(dayText);
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

function isoDate({ year, month, day }: CalendarDate): string {
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * "February 21, 2026" → "2026-02-21". Text that does not parse is returned
 * trimmed but otherwise untouched, so the date column holds either ISO-8601
 * or the site's own wording.
 */
export function parseEventDate(raw: string): string {
  const text = raw.trim();
  const date = parseCalendarDate(text, false);
  return date ? isoDate(date) : text;
}

/** Whole years between a "Jul 19, 1996" style birth date and `today`. */
export function parseAge(rawDob: string | null | undefined, today: Date): number | null {
  const text = rawDob?.trim() ?? '';
  if (isEmpty(text)) return null;
  const dob = parseCalendarDate(text, true);
  if (!dob) return null;

  const month = today.getMonth() + 1;
  const day = today.getDate();
  const beforeBirthday = month < dob.month || (month === dob.month && day < dob.day);
  return today.getFullYear() - dob.year - (beforeBirthday ? 1 : 0);
}

/** "50%" → 0.5 */
export function parsePercentage(raw: string | null | undefined): number | null {
  const text = raw?.trim() ?? '';
  if (isEmpty(text)) return null;
  const value = toNumber(text.replace(/%$/, '').trim());
  return value === null ? null : value / 100;
}

/** Per-minute rates and per-15-minute averages ("3.45"). */
export function parseDecimal(raw: string | null | undefined): number | null {
  const text = raw?.trim() ?? '';
  if (isEmpty(text)) return null;
  return toNumber(text);
}

/** `5' 7"` → 67; a height with no inches part counts as whole feet. */
export function parseHeight(raw: string | null | undefined): number | null {
  const text = raw?.trim().replaceAll('"', '') ?? '';
  if (isEmpty(text)) return null;
  const [feetText = '', inchesText = ''] = text.split("'");
  const feet = feetText.trim();
  const inches = inchesText.trim();
  if (!/^\d+$/.test(feet)) return null;
  if (inches && !/^\d+$/.test(inches)) return null;
  return Number(feet) * 12 + (inches ? Number(inches) : 0);
}

/** "155 lbs." → 155 */
export function parseWeight(raw: string | null | undefined): number | null {
  const text = raw?.trim() ?? '';
  if (isEmpty(text)) return null;
  const value = toNumber(text.replace('lbs.', '').trim());
  return value === null ? null : Math.trunc(value);
}

/** `72"` → 72 */
export function parseReach(raw: string | null | undefined): number | null {
  const text = raw?.trim() ?? '';
  if (isEmpty(text)) return null;
  const value = toNumber(text.replaceAll('"', '').trim());
  return value === null ? null : Math.trunc(value);
}

function leadingInteger(text: string): number | null {
  const match = text.match(/^\s*(\d+)/);
  return match?.[1] ? Number(match[1]) : null;
}

/**
 * "Record: 12-3-1 (1 NC)" → 12/3/1. Missing trailing components count as 0;
 * a component without digits is null.
 */
export function parseRecord(raw: string | null | undefined): FightRecord {
  const text = (raw ?? '').replace(/^\s*Record:\s*/i, '').trim();
  const [wins = '0', losses = '0', ties = '0'] = text.split('-');
  return {
    wins: leadingInteger(wins),
    losses: leadingInteger(losses),
    ties: leadingInteger(ties),
  };
}

/** Trimmed text, or null for blank and "--" placeholders. */
export function cleanText(raw: string | null | undefined): string | null {
  const text = raw?.trim() ?? '';
  return isEmpty(text) ? null : text;
}
