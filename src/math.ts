/**
 * Fixed-Point Math
 *
 * Checked integer primitives and the per-interval formulas of the bonding curve.
 * bigint never wraps, so every operation checks its result against the integer
 * width the value is stored in and throws a MathError instead of truncating.
 *
 * Rounding is always explicit. Quotes owed to the protocol round up, quotes
 * paid out by the protocol round down, and base amounts follow the same rule.
 */

import { SCALE, U128_MAX, U16_MAX, U256_MAX, U64_MAX, U8_MAX } from "./constants";
import { mathError } from "./errors";

export enum Rounding {
  Down = 0,
  Up = 1,
}

// ============================================
// Checked Arithmetic
// ============================================

function assertWidth(value: bigint, max: bigint, label: string): bigint {
  if (value < 0n || value > max) {
    throw mathError(`${label} out of range: ${value}`);
  }
  return value;
}

/** Validate a token amount (u64) */
export function assertU64(value: bigint, label: string = "amount"): bigint {
  return assertWidth(value, U64_MAX, label);
}

export function assertU128(value: bigint, label: string = "value"): bigint {
  return assertWidth(value, U128_MAX, label);
}

/** Validate a basis point share (u16) */
export function assertU16(value: number, label: string = "share"): number {
  if (!Number.isInteger(value) || value < 0 || value > U16_MAX) {
    throw mathError(`${label} out of range: ${value}`);
  }
  return value;
}

/** Validate a decimals count (u8) */
export function assertU8(value: number, label: string = "decimals"): number {
  if (!Number.isInteger(value) || value < 0 || value > U8_MAX) {
    throw mathError(`${label} out of range: ${value}`);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint, max: bigint = U128_MAX): bigint {
  return assertWidth(a + b, max, "sum");
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw mathError(`subtraction underflow: ${a} - ${b}`);
  }
  return a - b;
}

export function checkedMul(a: bigint, b: bigint, max: bigint = U128_MAX): bigint {
  return assertWidth(a * b, max, "product");
}

// ============================================
// Division Primitives
// ============================================

/**
 * Compute a * b / denominator with a 256-bit intermediate.
 *
 * @throws CurveError(MathError) on a zero denominator or a result above u128
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint, rounding: Rounding): bigint {
  assertU128(a, "mulDiv a");
  assertU128(b, "mulDiv b");
  if (denominator <= 0n) {
    throw mathError("mulDiv: division by zero");
  }

  const product = a * b;
  let result = product / denominator;
  if (rounding === Rounding.Up && product % denominator !== 0n) {
    result += 1n;
  }

  return assertWidth(result, U128_MAX, "mulDiv result");
}

/**
 * Compute value / denominator, producing a token amount (u64).
 */
export function div(value: bigint, denominator: bigint, rounding: Rounding): bigint {
  assertU128(value, "div value");
  if (denominator <= 0n) {
    throw mathError("div: division by zero");
  }

  let result = value / denominator;
  if (rounding === Rounding.Up && value % denominator !== 0n) {
    result += 1n;
  }

  return assertWidth(result, U64_MAX, "div result");
}

/**
 * Integer square root using Newton's method
 */
export function sqrt(value: bigint, rounding: Rounding): bigint {
  assertWidth(value, U256_MAX, "sqrt value");
  if (value < 2n) return value;

  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }

  if (rounding === Rounding.Up && x * x < value) {
    return x + 1n;
  }
  return x;
}

// ============================================
// Interval Formulas
// ============================================

/**
 * Quote for `deltaBase` of supply inside one interval, starting `offset` units
 * past the interval's lower bound.
 *
 * Area under the line from price0 to price1 between offset and offset + deltaBase:
 *   deltaBase * [(p1 - p0) * (deltaBase + 2 * offset) + 2 * p0 * width] / (2 * SCALE * width)
 *
 * All quantities are in normalized (SCALE) units.
 */
export function getDeltaQuote(
  price0: bigint,
  price1: bigint,
  width: bigint,
  offset: bigint,
  deltaBase: bigint,
  rounding: Rounding
): bigint {
  const deltaPrice = checkedSub(price1, price0);
  const numerator = checkedAdd(
    checkedMul(deltaPrice, checkedAdd(deltaBase, 2n * offset)),
    checkedMul(2n * price0, width)
  );

  return mulDiv(deltaBase, numerator, checkedMul(2n * SCALE, width), rounding);
}

/**
 * Base bought inside one interval with a quote budget.
 *
 * Walks up from `offset`. When the budget covers the rest of the interval the
 * whole remainder is bought; otherwise solves
 *   (p1 - p0) * d^2 + 2 * (p0 * width + (p1 - p0) * offset) * d - 2 * width * SCALE * quote = 0
 * for d, rounded down, and the whole budget is spent.
 *
 * @returns [deltaBase, deltaQuote] in normalized units
 */
export function getDeltaBaseOut(
  price0: bigint,
  price1: bigint,
  width: bigint,
  offset: bigint,
  quoteLeft: bigint
): [bigint, bigint] {
  const remaining = checkedSub(width, offset);
  const maxQuote = getDeltaQuote(price0, price1, width, offset, remaining, Rounding.Up);
  if (quoteLeft >= maxQuote) {
    return [remaining, maxQuote];
  }

  const a = checkedSub(price1, price0);
  const b = 2n * checkedAdd(checkedMul(price0, width), checkedMul(a, offset));
  const c = 2n * checkedMul(checkedMul(width, SCALE, U256_MAX), quoteLeft, U256_MAX);

  let deltaBase: bigint;
  if (a === 0n) {
    // Flat segment: quote is linear in base
    deltaBase = c / b;
  } else {
    const discriminant = assertWidth(b * b + 4n * a * c, U256_MAX, "discriminant");
    deltaBase = (sqrt(discriminant, Rounding.Down) - b) / (2n * a);
  }

  return [deltaBase < remaining ? deltaBase : remaining, quoteLeft];
}

/**
 * Base sold inside one interval to raise a quote target.
 *
 * Walks down from `available` (the supply sold so far within the interval).
 * When the target is at least the payout for the whole [0, available) range
 * everything is sold; otherwise solves
 *   (p1 - p0) * d^2 - 2 * (p0 * width + (p1 - p0) * available) * d + 2 * width * SCALE * quote = 0
 * for the smaller root, rounded up.
 *
 * @returns [deltaBase, deltaQuote] in normalized units
 */
export function getDeltaBaseIn(
  price0: bigint,
  price1: bigint,
  width: bigint,
  available: bigint,
  quoteLeft: bigint
): [bigint, bigint] {
  const maxQuote = getDeltaQuote(price0, price1, width, 0n, available, Rounding.Down);
  if (quoteLeft >= maxQuote) {
    return [available, maxQuote];
  }

  const a = checkedSub(price1, price0);
  const b = 2n * checkedAdd(checkedMul(price0, width), checkedMul(a, available));
  const c = 2n * checkedMul(checkedMul(width, SCALE, U256_MAX), quoteLeft, U256_MAX);

  let deltaBase: bigint;
  if (a === 0n) {
    deltaBase = ceilDiv(c, b);
  } else {
    const discriminant = checkedSub(assertWidth(b * b, U256_MAX, "discriminant"), 4n * a * c);
    deltaBase = ceilDiv(b - sqrt(discriminant, Rounding.Down), 2n * a);
  }

  return [deltaBase < available ? deltaBase : available, quoteLeft];
}

function ceilDiv(value: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw mathError("ceilDiv: division by zero");
  }
  return (value + denominator - 1n) / denominator;
}
