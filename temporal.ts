/**
 * Host representations for DuckDB's calendar and clock types.
 *
 * JavaScript's Date is an instant with millisecond precision, which fits
 * TIMESTAMP and TIMESTAMPTZ. DATE, TIME, TIMETZ and INTERVAL have no Date
 * equivalent, so they get plain records here.
 */

export const MS_PER_DAY = 86_400_000;
export const MICROS_PER_SECOND = 1_000_000n;
export const MICROS_PER_DAY = 86_400_000_000n;

/** A calendar date with no time or zone. `month` is 1-based. */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
  microsecond: number;
}

/** TIMETZ: a time of day qualified by a UTC offset. There is no date part. */
export interface TimeWithOffset {
  time: TimeOfDay;
  /** Seconds east of UTC. */
  offsetSeconds: number;
}

/** Mirrors DuckDB's INTERVAL layout: months and days are kept apart from the clock part. */
export interface Interval {
  months: number;
  days: number;
  micros: bigint;
}

function checkField(value: number, name: string, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} out of range: ${value} not in [${min}, ${max}]`);
  }
}

export function calendarDate(year: number, month: number, day: number): CalendarDate {
  checkField(month, "month", 1, 12);
  checkField(day, "day", 1, 31);
  checkField(year, "year", -271820, 275759);
  // setUTCFullYear, unlike Date.UTC, does not map years 0-99 onto 1900-1999
  const check = new Date(0);
  check.setUTCFullYear(year, month - 1, day);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new RangeError(`Invalid calendar date: ${year}-${month}-${day}`);
  }
  return { year, month, day };
}

/** The UTC calendar date of an instant. Naive date-times carry their wall time in the UTC fields. */
export function calendarDateOf(date: Date): CalendarDate {
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() };
}

export function toEpochDays(date: CalendarDate): number {
  const d = new Date(0);
  d.setUTCFullYear(date.year, date.month - 1, date.day);
  return Math.floor(d.getTime() / MS_PER_DAY);
}

/** Whether an epoch offset in milliseconds fits a Date. DuckDB's infinities do not. */
export function fitsDate(ms: number): boolean {
  return !Number.isNaN(new Date(ms).getTime());
}

export function fromEpochDays(days: number): CalendarDate {
  return calendarDateOf(new Date(days * MS_PER_DAY));
}

export function timeOfDay(hour: number, minute = 0, second = 0, microsecond = 0): TimeOfDay {
  checkField(hour, "hour", 0, 24);
  checkField(minute, "minute", 0, 59);
  checkField(second, "second", 0, 59);
  checkField(microsecond, "microsecond", 0, 999_999);
  // 24:00:00 is the end of the day; nothing runs past it
  if (hour === 24 && (minute !== 0 || second !== 0 || microsecond !== 0)) {
    throw new RangeError(`Time of day past 24:00:00: 24:${pad(minute)}:${pad(second)}.${pad(microsecond, 6)}`);
  }
  return { hour, minute, second, microsecond };
}

export function toMicrosOfDay(time: TimeOfDay): bigint {
  const seconds = BigInt(time.hour * 3600 + time.minute * 60 + time.second);
  return seconds * MICROS_PER_SECOND + BigInt(time.microsecond);
}

export function fromMicrosOfDay(micros: bigint): TimeOfDay {
  const totalSeconds = Number(micros / MICROS_PER_SECOND);
  return {
    hour: Math.floor(totalSeconds / 3600),
    minute: Math.floor(totalSeconds / 60) % 60,
    second: totalSeconds % 60,
    microsecond: Number(micros % MICROS_PER_SECOND),
  };
}

/** Time of day at UTC, wrapped into [0, 24h). Used when comparing TIMETZ values. */
export function toUtcMicrosOfDay(value: TimeWithOffset): bigint {
  const utc = toMicrosOfDay(value.time) - BigInt(value.offsetSeconds) * MICROS_PER_SECOND;
  return ((utc % MICROS_PER_DAY) + MICROS_PER_DAY) % MICROS_PER_DAY;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** Renders `HH:MM:SS.ffffff+HH:MM`, the text form DuckDB casts to TIMETZ. */
export function formatTimeWithOffset(value: TimeWithOffset): string {
  const { hour, minute, second, microsecond } = value.time;
  const sign = value.offsetSeconds < 0 ? "-" : "+";
  const abs = Math.abs(value.offsetSeconds);
  const offset = `${sign}${pad(Math.floor(abs / 3600))}:${pad(Math.floor(abs / 60) % 60)}`;
  return `${pad(hour)}:${pad(minute)}:${pad(second)}.${pad(microsecond, 6)}${offset}`;
}

export function toEpochMicros(date: Date): bigint {
  return BigInt(date.getTime()) * 1000n;
}

/** Sub-millisecond digits are truncated toward the earlier instant. */
export function fromEpochMicros(micros: bigint): Date {
  const ms = micros >= 0n ? micros / 1000n : (micros - 999n) / 1000n;
  return new Date(Number(ms));
}

/** A duration in milliseconds as days plus a clock part, the way DuckDB normalizes intervals. */
export function intervalFromMillis(ms: number): Interval {
  if (!Number.isInteger(ms)) {
    throw new TypeError(`Interval milliseconds must be an integer, got ${ms}`);
  }
  const days = Math.trunc(ms / MS_PER_DAY);
  const rest = ms - days * MS_PER_DAY;
  return { months: 0, days, micros: BigInt(rest) * 1000n };
}

export function interval(months: number, days: number, micros: bigint): Interval {
  checkField(months, "months", -0x80000000, 0x7fffffff);
  checkField(days, "days", -0x80000000, 0x7fffffff);
  return { months, days, micros };
}
