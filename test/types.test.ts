import { after, before, describe, it } from "node:test";
import assert from "node:assert";
import { Db } from "../client.ts";
import { Sql, type SqlValue } from "../values.ts";
import type { RowReader } from "../row_reader.ts";
import { closeAllInstances } from "../engine/target.ts";
import { timeOfDay, toUtcMicrosOfDay } from "../temporal.ts";

const db = Db.inMemory("types-test");

/** Writes `values` into a fresh single-column table and reads them back in insertion order. */
async function roundTrip<T>(
  table: string,
  columnType: string,
  values: SqlValue[],
  read: (r: RowReader) => T,
): Promise<T[]> {
  await db.query(`CREATE TABLE ${table} (seq INTEGER, v ${columnType})`).executeNonQuery();
  for (const [i, value] of values.entries()) {
    await db
      .query(`INSERT INTO ${table} VALUES ($seq, $v)`)
      .parameters([["seq", Sql.integer(i)], ["v", value]])
      .executeNonQuery();
  }
  return db.query(`SELECT v FROM ${table} ORDER BY seq`).execute(read);
}

after(() => closeAllInstances());

describe("integer round trips", () => {
  it("TINYINT", async () => {
    const got = await roundTrip("t_tiny", "TINYINT", [Sql.tinyInt(-128), Sql.tinyInt(127)], (r) => r.tinyInt("v"));
    assert.deepStrictEqual(got, [-128, 127]);
  });

  it("SMALLINT", async () => {
    const got = await roundTrip("t_small", "SMALLINT", [Sql.smallInt(-32768), Sql.smallInt(32767)], (r) => r.smallInt("v"));
    assert.deepStrictEqual(got, [-32768, 32767]);
  });

  it("INTEGER", async () => {
    const got = await roundTrip("t_int", "INTEGER", [Sql.integer(-2147483648), Sql.integer(2147483647)], (r) => r.integer("v"));
    assert.deepStrictEqual(got, [-2147483648, 2147483647]);
  });

  it("BIGINT", async () => {
    const got = await roundTrip("t_big", "BIGINT", [Sql.bigInt(-(2n ** 63n)), Sql.bigInt(2n ** 63n - 1n)], (r) => r.bigInt("v"));
    assert.deepStrictEqual(got, [-(2n ** 63n), 2n ** 63n - 1n]);
  });

  it("sorts NULLs last and reads them as absent", async () => {
    await db.query("CREATE TABLE t_nulls (v TINYINT)").executeNonQuery();
    for (const v of [Sql.tinyIntOrNone(3), Sql.tinyIntOrNone(undefined), Sql.tinyIntOrValueNone(1)]) {
      await db.query("INSERT INTO t_nulls VALUES ($v)").parameters([["v", v]]).executeNonQuery();
    }
    const got = await db.query("SELECT v FROM t_nulls ORDER BY v NULLS LAST").execute((r) => r.tinyIntOrNone("v"));
    assert.deepStrictEqual(got, [1, 3, undefined]);
  });
});

describe("floating point and decimal round trips", () => {
  it("FLOAT within float32 precision", async () => {
    const [got] = await roundTrip("t_real", "FLOAT", [Sql.real(3.14)], (r) => r.real("v"));
    assert.ok(Math.abs(got - 3.14) < 1e-6);
  });

  it("DOUBLE exactly", async () => {
    const got = await roundTrip("t_double", "DOUBLE", [Sql.double(Number.MAX_VALUE), Sql.double(-0.1)], (r) => r.double("v"));
    assert.deepStrictEqual(got, [Number.MAX_VALUE, -0.1]);
  });

  it("DECIMAL exactly, at the column's scale", async () => {
    const got = await roundTrip(
      "t_decimal",
      "DECIMAL(18,4)",
      [Sql.decimal("123.45"), Sql.decimal("-0.5"), Sql.decimal("99999999999999.9999")],
      (r) => r.decimal("v"),
    );
    assert.deepStrictEqual(got, ["123.4500", "-0.5000", "99999999999999.9999"]);
  });
});

describe("text, binary and identifier round trips", () => {
  it("BOOLEAN", async () => {
    const got = await roundTrip("t_bool", "BOOLEAN", [Sql.boolean(true), Sql.boolean(false)], (r) => r.boolean("v"));
    assert.deepStrictEqual(got, [true, false]);
  });

  it("BIT", async () => {
    const got = await roundTrip("t_bit", "BIT", [Sql.bit("10110")], (r) => r.bit("v"));
    assert.deepStrictEqual(got, ["10110"]);
  });

  it("VARCHAR, with a missing value stored as the empty string", async () => {
    const got = await roundTrip(
      "t_text",
      "VARCHAR",
      [Sql.varChar("héllo"), Sql.varChar(null), Sql.varChar("")],
      (r) => r.varCharOrNone("v"),
    );
    assert.deepStrictEqual(got, ["héllo", "", ""]);
  });

  it("JSON as text", async () => {
    const got = await roundTrip("t_json", "JSON", [Sql.json('{"a":1}')], (r) => r.json("v"));
    assert.deepStrictEqual(got, ['{"a":1}']);
  });

  it("BLOB", async () => {
    const got = await roundTrip("t_blob", "BLOB", [Sql.blob(new Uint8Array([0, 1, 2, 255])), Sql.blob(new Uint8Array())], (r) => r.blob("v"));
    assert.deepStrictEqual(got, [new Uint8Array([0, 1, 2, 255]), new Uint8Array()]);
  });

  it("UUID exactly", async () => {
    const got = await roundTrip("t_uuid", "UUID", [Sql.uuid("A0EEBC99-9C0B-4EF8-BB6D-6BB9BD380A11")], (r) => r.uuid("v"));
    assert.deepStrictEqual(got, ["a0eebc99-9c0b-4ef8-bb6d-6bb9bd380a11"]);
  });
});

describe("temporal round trips", () => {
  it("DATE", async () => {
    const got = await roundTrip(
      "t_date",
      "DATE",
      [Sql.date({ year: 2024, month: 2, day: 29 }), Sql.date(new Date(Date.UTC(1969, 11, 31, 12)))],
      (r) => r.date("v"),
    );
    assert.deepStrictEqual(got, [{ year: 2024, month: 2, day: 29 }, { year: 1969, month: 12, day: 31 }]);
  });

  it("TIME with microseconds", async () => {
    const got = await roundTrip("t_time", "TIME", [Sql.time(timeOfDay(13, 45, 30, 123456))], (r) => r.time("v"));
    assert.deepStrictEqual(got, [{ hour: 13, minute: 45, second: 30, microsecond: 123456 }]);
  });

  it("TIMETZ, compared by UTC time of day", async () => {
    const written = { time: timeOfDay(10, 30), offsetSeconds: 7200 };
    const [got] = await roundTrip("t_timetz", "TIMETZ", [Sql.timeTz(written)], (r) => r.timeTz("v"));
    assert.strictEqual(toUtcMicrosOfDay(got), toUtcMicrosOfDay(written));
  });

  it("TIMESTAMP", async () => {
    const when = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678));
    const got = await roundTrip("t_ts", "TIMESTAMP", [Sql.timestamp(when)], (r) => r.timestamp("v"));
    assert.deepStrictEqual(got.map((d) => d.getTime()), [when.getTime()]);
  });

  it("TIMESTAMPTZ normalized to UTC", async () => {
    const got = await roundTrip(
      "t_tstz",
      "TIMESTAMPTZ",
      [Sql.timestampTz("2024-03-01T10:00:00+02:00")],
      (r) => r.timestampTz("v"),
    );
    assert.deepStrictEqual(got.map((d) => d.toISOString()), ["2024-03-01T08:00:00.000Z"]);
  });

  it("INTERVAL field by field", async () => {
    const got = await roundTrip(
      "t_interval",
      "INTERVAL",
      [Sql.interval({ months: 14, days: 3, micros: 3_600_000_000n })],
      (r) => r.interval("v"),
    );
    assert.deepStrictEqual(got, [{ months: 14, days: 3, micros: 3_600_000_000n }]);
  });
});

describe("list round trips", () => {
  it("VARCHAR[] keeps null items", async () => {
    const got = await roundTrip("l_text", "VARCHAR[]", [Sql.varCharList(["a", null, "c"]), Sql.varCharList([])], (r) => r.varCharList("v"));
    assert.deepStrictEqual(got, [["a", null, "c"], []]);
  });

  it("INTEGER[]", async () => {
    const got = await roundTrip("l_int", "INTEGER[]", [Sql.integerList([1, -2, 3]), Sql.integerList([])], (r) => r.integerList("v"));
    assert.deepStrictEqual(got, [[1, -2, 3], []]);
  });

  it("SMALLINT[]", async () => {
    const got = await roundTrip("l_small", "SMALLINT[]", [Sql.smallIntList([-32768, 32767])], (r) => r.smallIntList("v"));
    assert.deepStrictEqual(got, [[-32768, 32767]]);
  });

  it("BIGINT[]", async () => {
    const got = await roundTrip("l_big", "BIGINT[]", [Sql.bigIntList([2n ** 62n, -1n])], (r) => r.bigIntList("v"));
    assert.deepStrictEqual(got, [[2n ** 62n, -1n]]);
  });

  it("DOUBLE[]", async () => {
    const got = await roundTrip("l_double", "DOUBLE[]", [Sql.doubleList([1.5, -0.25])], (r) => r.doubleList("v"));
    assert.deepStrictEqual(got, [[1.5, -0.25]]);
  });

  it("DECIMAL[] at the column's scale", async () => {
    const got = await roundTrip("l_decimal", "DECIMAL(18,4)[]", [Sql.decimalList(["123.45", "1"])], (r) => r.decimalList("v"));
    assert.deepStrictEqual(got, [["123.4500", "1.0000"]]);
  });

  it("UUID[]", async () => {
    const ids = ["a0eebc99-9c0b-4ef8-bb6d-6bb9bd380a11", "00000000-0000-0000-0000-000000000000"];
    const got = await roundTrip("l_uuid", "UUID[]", [Sql.uuidList(ids)], (r) => r.uuidList("v"));
    assert.deepStrictEqual(got, [ids]);
  });

  it("NULL lists read as absent", async () => {
    const got = await roundTrip("l_null", "INTEGER[]", [Sql.integerListOrNone(undefined)], (r) => r.integerListOrValueNone("v"));
    assert.deepStrictEqual(got, [null]);
  });
});

describe("typed parameters outside a column", () => {
  const select = <T>(sql: string, value: SqlValue, read: (r: RowReader) => T) =>
    db.query(sql).parameters([["x", value]]).executeRow(read);

  it("keeps UUIDs as UUID", async () => {
    const got = await select("SELECT $x AS x", Sql.uuid("A0EEBC99-9C0B-4EF8-BB6D-6BB9BD380A11"), (r) => r.uuid("x"));
    assert.strictEqual(got, "a0eebc99-9c0b-4ef8-bb6d-6bb9bd380a11");
  });

  it("keeps TIMETZ values and their offset", async () => {
    const written = { time: timeOfDay(10, 30, 15, 250), offsetSeconds: -(3 * 3600 + 30 * 60) };
    assert.deepStrictEqual(await select("SELECT $x AS x", Sql.timeTz(written), (r) => r.timeTz("x")), written);
  });

  it("keeps BIT strings as BIT", async () => {
    assert.strictEqual(await select("SELECT $x AS x", Sql.bit("10110"), (r) => r.bit("x")), "10110");
  });

  it("keeps decimals exact at their own scale", async () => {
    assert.strictEqual(await select("SELECT $x AS x", Sql.decimal("123.450"), (r) => r.decimal("x")), "123.450");
    assert.strictEqual(
      await select("SELECT $x AS x", Sql.decimal("12345678901234567890.123456789"), (r) => r.decimal("x")),
      "12345678901234567890.123456789",
    );
  });

  it("does arithmetic on bound decimals", async () => {
    assert.strictEqual(await select("SELECT $x + 1 AS x", Sql.decimal("1.5"), (r) => r.decimal("x")), "2.5");
  });

  it("keeps decimal and UUID lists typed", async () => {
    assert.deepStrictEqual(
      await select("SELECT $x AS x", Sql.decimalList(["1.5", "-20"]), (r) => r.decimalList("x")),
      ["1.5", "-20.0"],
    );
    const ids = ["a0eebc99-9c0b-4ef8-bb6d-6bb9bd380a11", "00000000-0000-0000-0000-000000000001"];
    assert.deepStrictEqual(await select("SELECT $x AS x", Sql.uuidList(ids), (r) => r.uuidList("x")), ids);
  });
});

describe("temporal values past the range of a Date", () => {
  it("refuses infinite dates and timestamps", async () => {
    await assert.rejects(
      db.query("SELECT 'infinity'::DATE AS d").executeRow((r) => r.date("d")),
      /^RangeError: Column 'd' holds DATE .*outside the range of a JavaScript Date$/,
    );
    await assert.rejects(
      db.query("SELECT '-infinity'::TIMESTAMP AS ts").executeRow((r) => r.timestamp("ts")),
      /^RangeError: Column 'ts' holds TIMESTAMP -infinity, which is outside the range of a JavaScript Date$/,
    );
  });

  it("refuses times past the end of the day before binding", () => {
    assert.throws(() => Sql.time({ hour: 24, minute: 30, second: 0, microsecond: 0 }), RangeError);
  });
});

describe("nullability", () => {
  before(async () => {
    await db.query("CREATE TABLE n (v INTEGER)").executeNonQuery();
    await db.query("INSERT INTO n VALUES ($v)").parameters([["v", Sql.dbnull]]).executeNonQuery();
  });

  it("reads NULL as undefined and null", async () => {
    assert.strictEqual(await db.query("SELECT v FROM n").executeRow((r) => r.integerOrNone("v")), undefined);
    assert.strictEqual(await db.query("SELECT v FROM n").executeRow((r) => r.integerOrValueNone("v")), null);
  });

  it("fails the non-nullable accessor", async () => {
    await assert.rejects(db.query("SELECT v FROM n").executeRow((r) => r.integer("v")), TypeError);
  });
});
