import { RayFileError } from "./errors";

const FLOAT_LITERAL = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf(?:inity)?|nan)$/i;
const INTEGER_LITERAL = /^[+-]?\d+$/;

const nonFinite = (value: number, upper: boolean): string | null => {
  let text: string | null = null;
  if (Number.isNaN(value)) text = "nan";
  else if (value === Infinity) text = "inf";
  else if (value === -Infinity) text = "-inf";
  if (text === null) return null;
  return upper ? text.toUpperCase() : text;
};

const isNegativeZero = (value: number) => value === 0 && Object.is(value, -0);

type Decimal = { digits: bigint; scale: number };

/** Exact value of a finite non-negative double as `digits / 10^scale`. */
const exactDecimal = (magnitude: number): Decimal => {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, magnitude);
  const bits = view.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & 0xfffffffffffffn;
  const mantissa = biased === 0 ? fraction : fraction | (1n << 52n);
  const exponent = Math.max(1, biased) - 1075;
  if (exponent >= 0) return { digits: mantissa << BigInt(exponent), scale: 0 };
  return { digits: mantissa * 5n ** BigInt(-exponent), scale: -exponent };
};

/** Parses "123.4567" or "1.234567e+2" into `digits / 10^scale`. */
const decimalOf = (text: string): Decimal => {
  const [significand, exponent = "0"] = text.split("e");
  const [whole, fraction = ""] = significand.split(".");
  return { digits: BigInt(whole + fraction), scale: fraction.length - Number(exponent) };
};

const sameDecimal = (a: Decimal, b: Decimal): boolean => {
  const shift = a.scale - b.scale;
  return shift >= 0 ? a.digits === b.digits * 10n ** BigInt(shift) : a.digits * 10n ** BigInt(-shift) === b.digits;
};

/**
 * Number#toFixed and Number#toExponential round exact ties away from zero. When
 * `longer` (one extra digit) is exactly `magnitude` and ends in 5, the value sits on a
 * tie: keep the truncated text if its last digit is even, else take the rounded-up one.
 */
const resolveTie = (magnitude: number, longer: string, roundedUp: string): string => {
  const exponentAt = longer.indexOf("e");
  const significand = exponentAt < 0 ? longer : longer.slice(0, exponentAt);
  if (!significand.endsWith("5") || !sameDecimal(exactDecimal(magnitude), decimalOf(longer))) return roundedUp;
  const truncated = significand.slice(0, -1).replace(/\.$/, "");
  if (Number(truncated[truncated.length - 1]) % 2 !== 0) return roundedUp;
  return exponentAt < 0 ? truncated : `${truncated}${longer.slice(exponentAt)}`;
};

const roundFixed = (magnitude: number, digits: number): string =>
  resolveTie(magnitude, magnitude.toFixed(digits + 1), magnitude.toFixed(digits));

const roundScientific = (magnitude: number, digits: number): string =>
  resolveTie(magnitude, magnitude.toExponential(digits + 1), magnitude.toExponential(digits));

/**
 * Fixed-point rendering with `digits` decimals. Exact ties round to the even digit.
 * Unlike Number#toFixed this never switches to exponent notation above 1e21 and keeps
 * the sign of negative zero.
 */
export function formatFixed(value: number, digits = 6): string {
  const special = nonFinite(value, false);
  if (special !== null) return special;
  if (isNegativeZero(value)) return `-${(0).toFixed(digits)}`;
  const magnitude = Math.abs(value);
  if (magnitude >= 1e21) {
    // doubles this large are integral, so BigInt holds them exactly
    const integral = BigInt(magnitude).toString();
    const fraction = digits > 0 ? `.${"0".repeat(digits)}` : "";
    return `${value < 0 ? "-" : ""}${integral}${fraction}`;
  }
  const text = roundFixed(magnitude, digits);
  return value < 0 ? `-${text}` : text;
}

/** Scientific notation with a two-digit minimum exponent: 1.000000e-30, 1.234560E+02. Exact ties round to even. */
export function formatScientific(value: number, digits = 6, upper = false): string {
  const special = nonFinite(value, upper);
  if (special !== null) return special;
  let text = roundScientific(Math.abs(value), digits);
  text = text.replace(/e([+-])(\d)$/, "e$10$2");
  if (value < 0 || isNegativeZero(value)) text = `-${text}`;
  return upper ? text.toUpperCase() : text;
}

export function parseFloatToken(token: string, field: string): number {
  if (!FLOAT_LITERAL.test(token)) {
    throw new RayFileError("InvalidNumericField", `${field}: "${token}" is not a number`);
  }
  const lower = token.toLowerCase();
  if (lower.endsWith("nan")) return NaN;
  if (lower.endsWith("inf") || lower.endsWith("infinity")) {
    return token.startsWith("-") ? -Infinity : Infinity;
  }
  return Number(token);
}

export function parseIntegerToken(token: string, field: string): number {
  if (!INTEGER_LITERAL.test(token)) {
    throw new RayFileError("InvalidNumericField", `${field}: "${token}" is not an integer`);
  }
  const value = Number(token);
  if (!Number.isSafeInteger(value)) {
    throw new RayFileError("InvalidNumericField", `${field}: "${token}" is out of range`);
  }
  return value;
}

/** Rounds to float32 and rejects finite values that overflow it. */
export function toFloat32(value: number, field: string): number {
  const rounded = Math.fround(value);
  if (Number.isFinite(value) && !Number.isFinite(rounded)) {
    throw new RayFileError("InvalidNumericField", `${field}: ${value} does not fit in a 32-bit float`);
  }
  return rounded;
}
