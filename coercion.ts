/**
 * Payload validation for SqlValue constructors.
 * Converts JavaScript values to the host representation fixed by each tag.
 * Throws TypeError/RangeError for values that cannot be represented exactly.
 */

// --- Range constants ---

export const TINYINT_MIN = -0x80;
export const TINYINT_MAX = 0x7f;
export const SMALLINT_MIN = -0x8000;
export const SMALLINT_MAX = 0x7fff;
export const INTEGER_MIN = -0x80000000;
export const INTEGER_MAX = 0x7fffffff;
export const BIGINT_MIN = -(1n << 63n);
export const BIGINT_MAX = (1n << 63n) - 1n;

// --- Range-checked converters ---

function toIntInRange(v: number | bigint, typeName: string, min: number, max: number): number {
  const n = typeof v === "bigint" ? Number(v) : v;
  if (!Number.isFinite(n)) {
    throw new TypeError(`Cannot coerce ${typeof v} "${v}" to ${typeName}`);
  }
  if (!Number.isInteger(n)) {
    throw new TypeError(`Cannot coerce ${typeof v} "${v}" to ${typeName} (expected integer)`);
  }
  if (n < min || n > max) {
    throw new RangeError(`${typeName} out of range: ${v} not in [${min}, ${max}]`);
  }
  return n;
}

export function toBigIntInRange(v: number | bigint, typeName: string, min: bigint, max: bigint): bigint {
  let b: bigint;
  if (typeof v === "number") {
    if (!Number.isFinite(v)) {
      throw new TypeError(`Cannot coerce number "${v}" to ${typeName}`);
    }
    if (!Number.isInteger(v)) {
      throw new TypeError(`Cannot coerce number "${v}" to ${typeName} (expected integer)`);
    }
    if (!Number.isSafeInteger(v)) {
      throw new RangeError(`${typeName} cannot safely represent number "${v}". Use bigint.`);
    }
    b = BigInt(v);
  } else {
    b = v;
  }

  if (b < min || b > max) {
    throw new RangeError(`${typeName} out of range: ${b} not in [${min}, ${max}]`);
  }
  return b;
}

export const toTinyInt = (v: number | bigint) => toIntInRange(v, "TINYINT", TINYINT_MIN, TINYINT_MAX);
export const toSmallInt = (v: number | bigint) => toIntInRange(v, "SMALLINT", SMALLINT_MIN, SMALLINT_MAX);
export const toInteger = (v: number | bigint) => toIntInRange(v, "INTEGER", INTEGER_MIN, INTEGER_MAX);
export const toBigInt = (v: number | bigint) => toBigIntInRange(v, "BIGINT", BIGINT_MIN, BIGINT_MAX);

// --- Floating point ---

export function toDouble(v: number): number {
  if (typeof v !== "number") {
    throw new TypeError(`Cannot coerce ${typeof v} "${v}" to DOUBLE`);
  }
  return v;
}

/** FLOAT holds 32 bits; round now so the bound value equals what is stored. */
export function toReal(v: number): number {
  return Math.fround(toDouble(v));
}

// --- UUID validation ---

const UUID_REGEX =
  /^[0-9a-fA-F]{8}-?[0-9a-fA-F]{4}-?[0-9a-fA-F]{4}-?[0-9a-fA-F]{4}-?[0-9a-fA-F]{12}$/;

/** Validates and returns the canonical lower-case, hyphenated form. */
export function toValidUUID(v: string): string {
  if (typeof v !== "string" || !UUID_REGEX.test(v)) {
    throw new TypeError(`Invalid UUID: "${v}"`);
  }
  const hex = v.replace(/-/g, "").toLowerCase();
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/** The 128-bit unsigned integer a canonical UUID spells in hex. */
export function uuidToUint128(uuid: string): bigint {
  return BigInt(`0x${uuid.replace(/-/g, "")}`);
}

// --- Decimal validation ---

const DECIMAL_REGEX = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** DuckDB's widest DECIMAL. */
export const DECIMAL_MAX_WIDTH = 38;

/**
 * Decimals travel as text so no precision is lost on the way to the engine.
 * Numbers are accepted when their shortest round-trip form is plain notation.
 */
export function toValidDecimal(v: string | number | bigint): string {
  const s = typeof v === "bigint" ? v.toString() : typeof v === "number" ? String(v) : v.trim();
  if (!DECIMAL_REGEX.test(s)) {
    throw new TypeError(`Invalid DECIMAL: "${v}"`);
  }
  parseDecimal(s);
  return s.startsWith("+") ? s.slice(1) : s;
}

/** A decimal as DuckDB stores it: `unscaled / 10^scale`, with `width` digits in all. */
export interface ScaledDecimal {
  unscaled: bigint;
  width: number;
  scale: number;
}

/** Splits validated decimal text into its stored form. Throws RangeError past 38 digits. */
export function parseDecimal(text: string): ScaledDecimal {
  const negative = text.startsWith("-");
  const unsigned = text.replace(/^[+-]/, "");
  const [intPart = "", fracPart = ""] = unsigned.split(".");
  const intDigits = intPart.replace(/^0+/, "");
  const scale = fracPart.length;
  const width = Math.max(intDigits.length + scale, 1);
  if (width > DECIMAL_MAX_WIDTH) {
    throw new RangeError(`DECIMAL "${text}" has ${width} digits; at most ${DECIMAL_MAX_WIDTH} fit`);
  }
  const magnitude = BigInt(`${intDigits}${fracPart}` || "0");
  return { unscaled: negative ? -magnitude : magnitude, width, scale };
}

/**
 * Brings every decimal to one shared width and scale, as a DECIMAL list
 * needs. Throws RangeError when the common type would pass 38 digits.
 */
export function commonDecimal(texts: readonly string[]): { width: number; scale: number; unscaled: bigint[] } {
  const parsed = texts.map(parseDecimal);
  const scale = Math.max(0, ...parsed.map((d) => d.scale));
  const intDigits = Math.max(0, ...parsed.map((d) => d.width - d.scale));
  const width = Math.max(intDigits + scale, 1);
  if (width > DECIMAL_MAX_WIDTH) {
    throw new RangeError(`DECIMAL list needs ${width} digits; at most ${DECIMAL_MAX_WIDTH} fit`);
  }
  const unscaled = parsed.map((d) => d.unscaled * 10n ** BigInt(scale - d.scale));
  return { width, scale, unscaled };
}

// --- BIT validation ---

export function toValidBitString(v: string): string {
  if (typeof v !== "string" || !/^[01]+$/.test(v)) {
    throw new TypeError(`Invalid BIT string: "${v}" (expected one or more 0/1 characters)`);
  }
  return v;
}

// --- Date/time validation ---

export function toValidDate(v: Date, typeName: string): Date {
  if (!(v instanceof Date) || Number.isNaN(v.getTime())) {
    throw new TypeError(`Cannot coerce "${v}" to ${typeName}`);
  }
  return v;
}
