import type { IntValue, NumericValue } from "./types.js";

const NUMBER_LITERAL = /^(?:\d+\.?\d*|\.\d+)$/;

export function int(value: bigint): IntValue {
  return { kind: "int", value };
}

export function float(value: number): NumericValue {
  return { kind: "float", value };
}

export function isNumberLiteral(text: string): boolean {
  return NUMBER_LITERAL.test(text);
}

/**
 * Decides the int/float tag once, from the literal text: a decimal point means float.
 * Returns null when the text is not a number literal.
 */
export function parseNumberLiteral(text: string): NumericValue | null {
  if (!isNumberLiteral(text)) return null;
  if (text.includes(".")) return float(Number(text));
  return int(BigInt(text));
}

export function toFloat(v: NumericValue): number {
  if (v.kind === "float") return v.value;
  const converted = Number(v.value);
  if (!Number.isFinite(converted)) {
    throw new RangeError("int too large to convert to float");
  }
  return converted;
}

export function isZero(v: NumericValue): boolean {
  switch (v.kind) {
    case "int":
      return v.value === 0n;
    case "float":
      return v.value === 0;
  }
}

export function isInteger(v: NumericValue): v is IntValue {
  return v.kind === "int";
}

export function add(a: NumericValue, b: NumericValue): NumericValue {
  if (a.kind === "int" && b.kind === "int") return int(a.value + b.value);
  return float(toFloat(a) + toFloat(b));
}

export function subtract(a: NumericValue, b: NumericValue): NumericValue {
  if (a.kind === "int" && b.kind === "int") return int(a.value - b.value);
  return float(toFloat(a) - toFloat(b));
}

export function multiply(a: NumericValue, b: NumericValue): NumericValue {
  if (a.kind === "int" && b.kind === "int") return int(a.value * b.value);
  return float(toFloat(a) * toFloat(b));
}

const MAX_EXACT_INT = 2n ** 53n;
// Quotient bits kept before the single rounding to a double.
const QUOTIENT_BITS = 64;

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

function bitLength(n: bigint): number {
  return n === 0n ? 0 : n.toString(2).length;
}

function scaleByPowerOfTwo(x: number, exponent: number): number {
  let result = x;
  let e = exponent;
  // 2 ** e overflows past 1023, so scale in steps.
  while (e > 1000) {
    result *= 2 ** 1000;
    e -= 1000;
  }
  while (e < -1000) {
    result *= 2 ** -1000;
    e += 1000;
  }
  return result * 2 ** e;
}

/**
 * True division of two ints, rounded once. Operands past 2^53 are divided in
 * bigint space so that `10 ** 400 / 10 ** 399` is 10.0 rather than NaN.
 */
function divideIntegers(a: bigint, b: bigint): number {
  const x = abs(a);
  const y = abs(b);
  const negative = (a < 0n) !== (b < 0n);

  if (x <= MAX_EXACT_INT && y <= MAX_EXACT_INT) {
    return Number(a) / Number(b);
  }

  const shift = QUOTIENT_BITS - (bitLength(x) - bitLength(y));
  const quotient = shift >= 0 ? (x << BigInt(shift)) / y : x / (y << BigInt(-shift));
  const magnitude = scaleByPowerOfTwo(Number(quotient), -shift);
  if (!Number.isFinite(magnitude)) {
    throw new RangeError("integer division result too large for a float");
  }
  return negative ? -magnitude : magnitude;
}

export function divide(a: NumericValue, b: NumericValue): NumericValue {
  if (a.kind === "int" && b.kind === "int") return float(divideIntegers(a.value, b.value));
  return float(toFloat(a) / toFloat(b));
}

// Floor semantics: the quotient rounds toward negative infinity and the
// remainder takes the sign of the divisor.
export function floorDivide(a: IntValue, b: IntValue): IntValue {
  const q = a.value / b.value;
  const inexact = a.value % b.value !== 0n;
  return { kind: "int", value: inexact && (a.value < 0n) !== (b.value < 0n) ? q - 1n : q };
}

export function modulo(a: IntValue, b: IntValue): IntValue {
  const r = a.value % b.value;
  return { kind: "int", value: r !== 0n && (r < 0n) !== (b.value < 0n) ? r + b.value : r };
}

export function power(a: NumericValue, b: NumericValue): NumericValue {
  if (a.kind === "int" && b.kind === "int" && b.value >= 0n) {
    return int(a.value ** b.value);
  }

  const x = toFloat(a);
  const y = toFloat(b);
  if (x === 0 && y < 0) {
    throw new RangeError("0 cannot be raised to a negative power");
  }

  const result = x ** y;
  if (Number.isNaN(result) && !Number.isNaN(x) && !Number.isNaN(y)) {
    throw new RangeError(`${x} ** ${y} is not a real number`);
  }
  if (!Number.isFinite(result) && Number.isFinite(x) && Number.isFinite(y)) {
    throw new RangeError("Numerical result out of range");
  }
  return float(result);
}

export function negate(v: NumericValue): NumericValue {
  return v.kind === "int" ? int(-v.value) : float(-v.value);
}

export function identity(v: NumericValue): NumericValue {
  return v;
}

export function formatValue(v: NumericValue): string {
  if (v.kind === "int") return v.value.toString();
  if (Object.is(v.value, -0)) return "-0.0";
  if (Number.isInteger(v.value) && Math.abs(v.value) < 1e16) return `${v.value}.0`;
  return String(v.value);
}
