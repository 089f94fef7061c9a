import { addDays, differenceInCalendarDays, differenceInSeconds, format, isValid, parse, parseISO } from "date-fns";

// Two-digit years resolve to the century nearest this date.
const REFERENCE_DATE = new Date(2000, 0, 1);

const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
const DATE_FORMAT = "yyyy-MM-dd";

type Pattern = { test: RegExp; format: string };

const DATE_PATTERNS: Pattern[] = [
  { test: /^\d{4}-\d{1,2}-\d{1,2}$/, format: "yyyy-MM-dd" },
  { test: /^\d{1,2}\/\d{1,2}\/\d{4}$/, format: "MM/dd/yyyy" },
  { test: /^\d{1,2}\/\d{1,2}\/\d{2}$/, format: "MM/dd/yy" }
];

const TIMESTAMP_PATTERNS: Pattern[] = [
  { test: /^\d{4}-\d{1,2}-\d{1,2} \d{1,2}:\d{2}$/, format: "yyyy-MM-dd HH:mm" },
  { test: /^\d{4}-\d{1,2}-\d{1,2} \d{1,2}:\d{2}:\d{2}$/, format: "yyyy-MM-dd HH:mm:ss" },
  { test: /^\d{1,2}\/\d{1,2}\/\d{4} \d{1,2}:\d{2} [AP]M$/, format: "MM/dd/yyyy hh:mm a" },
  { test: /^\d{1,2}\/\d{1,2}\/\d{4} \d{1,2}:\d{2}:\d{2} [AP]M$/, format: "MM/dd/yyyy hh:mm:ss a" },
  { test: /^\d{1,2}\/\d{1,2}\/\d{4} \d{1,2}:\d{2}$/, format: "MM/dd/yyyy HH:mm" },
  { test: /^\d{1,2}\/\d{1,2}\/\d{4} \d{1,2}:\d{2}:\d{2}$/, format: "MM/dd/yyyy HH:mm:ss" }
];

const CLOCK_PATTERNS: Pattern[] = [
  { test: /^\d{1,2}:\d{2} [AP]M$/, format: "hh:mm a" },
  { test: /^\d{1,2}:\d{2}:\d{2} [AP]M$/, format: "hh:mm:ss a" },
  { test: /^\d{1,2}:\d{2}$/, format: "HH:mm" },
  { test: /^\d{1,2}:\d{2}:\d{2}$/, format: "HH:mm:ss" }
];

// Exports stamp wall-clock times; a trailing zone designator is dropped, not applied.
const ZONE_SUFFIX = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(?:Z|[+-]\d{2}:?\d{2})$/;

function cleanText(text: string): string {
  return text
    .trim()
    .replace(/^(\d{4}-\d{1,2}-\d{1,2})T/, "$1 ")
    .replace(/(:\d{2})\.\d+$/, "$1")
    .replace(/\s*([AaPp])\.?([Mm])\.?$/, (_match, a: string, m: string) => ` ${a.toUpperCase()}${m.toUpperCase()}`)
    .replace(/\s+/g, " ");
}

function parseWith(text: string, patterns: Pattern[]): Date | null {
  for (const pattern of patterns) {
    if (!pattern.test.test(text)) continue;
    const parsed = parse(text, pattern.format, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const text = cleanText(value.trim().replace(ZONE_SUFFIX, "$1"));
  return parseWith(text, DATE_PATTERNS) ?? parseWith(text, TIMESTAMP_PATTERNS);
}

/** Parses a calendar date (time of day ignored). Returns `YYYY-MM-DD` or null. */
export function parseCalendarDate(value: unknown): string | null {
  const date = toDate(value);
  return date ? format(date, DATE_FORMAT) : null;
}

/** Parses a date or date-time. Returns a zone-less `YYYY-MM-DDTHH:mm:ss` or null. */
export function parseTimestamp(value: unknown): string | null {
  const date = toDate(value);
  return date ? format(date, TIMESTAMP_FORMAT) : null;
}

/** Parses a time of day, or takes the clock part of a full timestamp. Returns `HH:mm:ss`. */
export function parseClockTime(value: unknown): string | null {
  if (typeof value === "string") {
    const clock = parseWith(cleanText(value), CLOCK_PATTERNS);
    if (clock) {
      return format(clock, "HH:mm:ss");
    }
  }
  const timestamp = parseTimestamp(value);
  return timestamp ? timestamp.slice(11) : null;
}

/**
 * Joins a date field and a time-of-day field. Both must parse, otherwise the
 * result stays unset.
 */
export function combineDateAndTime(dateValue: unknown, timeValue: unknown): string | null {
  const date = parseCalendarDate(dateValue);
  const clock = parseClockTime(timeValue);
  if (!date || !clock) {
    return null;
  }
  return `${date}T${clock}`;
}

type NaiveParts = { date: string; clock: string };

function naiveParts(value: string): NaiveParts {
  const naive = value.slice(0, 19);
  return { date: naive.slice(0, 10), clock: naive.length > 10 ? naive.slice(11).padEnd(8, ":00") : "00:00:00" };
}

/** Whole days from `earlier` to `later`, floored (negative when `later` comes first). */
export function daysBetween(later: string, earlier: string): number | null {
  const a = naiveParts(later);
  const b = naiveParts(earlier);
  const days = differenceInCalendarDays(parseISO(a.date), parseISO(b.date));
  if (Number.isNaN(days)) return null;
  return a.clock < b.clock ? days - 1 : days;
}

// Anchored at UTC so a daylight-saving change between the two never adds or drops an hour.
function wallClock(value: string): Date {
  const { date, clock } = naiveParts(value);
  return parseISO(`${date}T${clock}Z`);
}

export function minutesBetween(later: string, earlier: string): number | null {
  const seconds = differenceInSeconds(wallClock(later), wallClock(earlier));
  return Number.isNaN(seconds) ? null : seconds / 60;
}

export function hoursBetween(later: string, earlier: string): number | null {
  const minutes = minutesBetween(later, earlier);
  return minutes === null ? null : minutes / 60;
}

/** `YYYY-MM-DD` prefix of a stored date or timestamp, or null when it has none. */
export function calendarDateOf(value: string | null | undefined): string | null {
  if (!value) return null;
  const prefix = value.slice(0, 10);
  return /^\d{4}-\d{2}-\d{2}$/.test(prefix) ? prefix : null;
}

export function todayIsoDate(now: Date = new Date()): string {
  return format(now, DATE_FORMAT);
}

export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

export function addDaysIso(isoDate: string, days: number): string {
  return format(addDays(parseISO(isoDate.slice(0, 10)), days), DATE_FORMAT);
}
