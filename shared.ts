/**
 * Shared helpers for value conversion between DuckDB and JavaScript.
 */

/** Renders an unscaled decimal integer with `scale` fractional digits, e.g. (12345n, 2) → "123.45". */
export function formatScaledBigInt(val: bigint, scale: number): string {
  const neg = val < 0n;
  if (neg) val = -val;
  let str = val.toString();
  if (scale === 0) return neg ? "-" + str : str;
  while (str.length <= scale) str = "0" + str;
  const intP = str.slice(0, -scale);
  const fracP = str.slice(-scale);
  const r = intP + "." + fracP;
  return neg ? "-" + r : r;
}

/**
 * Copy a blob out of a view that may sit anywhere in a larger buffer. Reading
 * always starts at the view's first byte; a buffer holding fewer bytes than
 * the declared length is an error, not a short result.
 */
export function copyBytes(view: Uint8Array, declaredLength: number = view.byteLength): Uint8Array {
  const available = view.buffer.byteLength - view.byteOffset;
  const read = Math.min(declaredLength, available);
  if (read !== declaredLength) {
    throw new Error(`Failed to read all bytes: expected ${declaredLength}, read ${read}`);
  }
  const out = new Uint8Array(declaredLength);
  out.set(new Uint8Array(view.buffer, view.byteOffset, declaredLength));
  return out;
}

export function describeValue(value: unknown): string {
  if (value === null) return "NULL";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}
