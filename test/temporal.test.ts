import { describe, it } from "node:test";
import assert from "node:assert";
import {
  calendarDate,
  formatTimeWithOffset,
  fromEpochDays,
  fromEpochMicros,
  fromMicrosOfDay,
  intervalFromMillis,
  timeOfDay,
  fitsDate,
  toEpochDays,
  toEpochMicros,
  toMicrosOfDay,
  toUtcMicrosOfDay,
} from "../temporal.ts";

describe("calendar dates", () => {
  it("converts to and from epoch days", () => {
    assert.strictEqual(toEpochDays({ year: 1970, month: 1, day: 1 }), 0);
    assert.strictEqual(toEpochDays({ year: 2000, month: 1, day: 1 }), 10957);
    assert.deepStrictEqual(fromEpochDays(10957), { year: 2000, month: 1, day: 1 });
    assert.deepStrictEqual(fromEpochDays(-1), { year: 1969, month: 12, day: 31 });
  });

  it("keeps years below 100 as written", () => {
    assert.deepStrictEqual(fromEpochDays(toEpochDays(calendarDate(42, 6, 15))), { year: 42, month: 6, day: 15 });
  });

  it("rejects days past the end of the month", () => {
    assert.throws(() => calendarDate(2023, 2, 29), /Invalid calendar date/);
    assert.throws(() => calendarDate(2024, 13, 1), RangeError);
  });
});

describe("times of day", () => {
  it("converts to and from micros since midnight", () => {
    assert.strictEqual(toMicrosOfDay(timeOfDay(1, 2, 3, 4)), 3723000004n);
    assert.deepStrictEqual(fromMicrosOfDay(3723000004n), { hour: 1, minute: 2, second: 3, microsecond: 4 });
  });

  it("normalizes TIMETZ values to UTC, wrapping around midnight", () => {
    assert.strictEqual(toUtcMicrosOfDay({ time: timeOfDay(1), offsetSeconds: 7200 }), 82800000000n);
    assert.strictEqual(toUtcMicrosOfDay({ time: timeOfDay(10, 30), offsetSeconds: 7200 }), 30600000000n);
    assert.strictEqual(toUtcMicrosOfDay({ time: timeOfDay(8, 30), offsetSeconds: 0 }), 30600000000n);
  });

  it("accepts 24:00:00 as the end of the day and nothing past it", () => {
    assert.deepStrictEqual(timeOfDay(24), { hour: 24, minute: 0, second: 0, microsecond: 0 });
    assert.throws(() => timeOfDay(24, 30), {
      name: "RangeError",
      message: "Time of day past 24:00:00: 24:30:00.000000",
    });
    assert.throws(() => timeOfDay(24, 0, 0, 1), RangeError);
    assert.throws(() => timeOfDay(25), RangeError);
  });

  it("formats TIMETZ text", () => {
    const text = formatTimeWithOffset({ time: timeOfDay(9, 5, 7, 12), offsetSeconds: -(5 * 3600 + 30 * 60) });
    assert.strictEqual(text, "09:05:07.000012-05:30");
  });
});

describe("instants and intervals", () => {
  it("tells which epoch offsets fit a Date", () => {
    assert.strictEqual(fitsDate(8.64e15), true);
    assert.strictEqual(fitsDate(-8.64e15), true);
    assert.strictEqual(fitsDate(8.64e15 + 1), false);
    assert.strictEqual(fitsDate(2147483647 * 86_400_000), false);
  });

  it("converts Dates to epoch micros", () => {
    assert.strictEqual(toEpochMicros(new Date(1500)), 1500000n);
    assert.strictEqual(fromEpochMicros(1500n).getTime(), 1);
  });

  it("floors negative micros to the earlier millisecond", () => {
    assert.strictEqual(fromEpochMicros(-1n).getTime(), -1);
    assert.strictEqual(fromEpochMicros(-1000n).getTime(), -1);
  });

  it("splits milliseconds into days and micros", () => {
    assert.deepStrictEqual(intervalFromMillis(90_000_000), { months: 0, days: 1, micros: 3_600_000_000n });
    assert.throws(() => intervalFromMillis(1.5), TypeError);
  });
});
