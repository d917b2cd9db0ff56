const UNKNOWN = "unbekannt";

const WIND_DIRECTIONS: ReadonlyArray<readonly [label: string, start: number, end: number]> = [
  ["N", 0, 22.5],
  ["NO", 22.5, 67.5],
  ["O", 67.5, 112.5],
  ["SO", 112.5, 157.5],
  ["S", 157.5, 202.5],
  ["SW", 202.5, 247.5],
  ["W", 247.5, 292.5],
  ["NW", 292.5, 337.5],
  ["N", 337.5, 360],
];

// Indexed by Date#getUTCDay(), Sunday first.
const WEEKDAYS_SHORT = ["So", "Mo", "Di", "Mi", "Do", "Fr", "Sa"];
const WEEKDAYS_LONG = [
  "Sonntag",
  "Montag",
  "Dienstag",
  "Mittwoch",
  "Donnerstag",
  "Freitag",
  "Samstag",
];

const ISO_TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(Z|[+-](\d{2}):?(\d{2}))?$/;

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// Daily summaries only name the weekday of a full "YYYY-MM-DD HH:MM:SS+HH:MM" key.
const DAY_KEY_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:Z|[+-](\d{2}):?(\d{2}))$/;

export function windDirectionToText(degrees: number | null | undefined): string {
  if (degrees === null || degrees === undefined || !Number.isFinite(degrees)) {
    return UNKNOWN;
  }

  const normalized = ((degrees % 360) + 360) % 360;
  const match = WIND_DIRECTIONS.find(
    ([, start, end]) => normalized >= start && normalized < end
  );
  return match ? match[0] : "N";
}

function toCalendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

// Wall-clock time as written in the string; no zone conversion.
export function formatTimestamp(isoTimestamp: string | null | undefined): string {
  if (!isoTimestamp) {
    return UNKNOWN;
  }

  const match = ISO_TIMESTAMP_PATTERN.exec(isoTimestamp);
  if (!match) {
    return isoTimestamp;
  }

  const [, year, month, day, hour = "00", minute = "00", second = "00"] = match;
  const [offsetHours, offsetMinutes] = [match[8], match[9]];
  const date = toCalendarDate(Number(year), Number(month), Number(day));
  if (
    !date ||
    Number(hour) > 23 ||
    Number(minute) > 59 ||
    Number(second) > 59 ||
    (offsetHours !== undefined && Number(offsetHours) > 23) ||
    (offsetMinutes !== undefined && Number(offsetMinutes) > 59)
  ) {
    return isoTimestamp;
  }

  const weekday = WEEKDAYS_SHORT[date.getUTCDay()];
  return `${weekday}, ${day}.${month}.${year} ${hour}:${minute}`;
}

export function weekdayName(dayKey: string): string | null {
  const match = DAY_KEY_PATTERN.exec(dayKey);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second, offsetHours = "00", offsetMinutes = "00"] =
    match;
  const date = toCalendarDate(Number(year), Number(month), Number(day));
  if (
    !date ||
    Number(hour) > 23 ||
    Number(minute) > 59 ||
    Number(second) > 59 ||
    Number(offsetHours) > 23 ||
    Number(offsetMinutes) > 59
  ) {
    return null;
  }
  return WEEKDAYS_LONG[date.getUTCDay()] ?? null;
}

function formatDateParts(date: Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return formatter.format(date);
}

export function getLocalDateString(date: Date, timeZone: string): string {
  const safeDate = Number.isNaN(date.getTime()) ? new Date() : date;
  return formatDateParts(safeDate, timeZone);
}

export function addDays(dateLocal: string, days: number): string {
  const match = DATE_KEY_PATTERN.exec(dateLocal);
  const date = match
    ? toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))
    : null;
  if (!date) {
    throw new RangeError(`Invalid date: ${dateLocal}`);
  }
  date.setUTCDate(date.getUTCDate() + days);
  const year = pad(date.getUTCFullYear(), 4);
  return `${year}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

// Half-even on the exact binary value: 0.15 is stored just below and gives 0.1,
// the exact tie 0.25 gives 0.2.
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }

  const exact = Math.abs(value).toFixed(100);
  const point = exact.indexOf(".");
  const kept = exact.slice(0, point) + exact.slice(point + 1, point + 1 + decimals);
  const rest = exact.slice(point + 1 + decimals);

  let units = Number(kept);
  const next = rest.charAt(0);
  const pastHalf = next > "5" || (next === "5" && /[1-9]/.test(rest.slice(1)));
  const tie = next === "5" && !pastHalf;
  if (pastHalf || (tie && units % 2 === 1)) {
    units += 1;
  }

  const rounded = units / 10 ** decimals;
  return value < 0 ? -rounded : rounded;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeoutId);
  }
}
