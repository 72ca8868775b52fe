/**
 * @cellar/math — Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint. Every division states its rounding
 * direction; callers round against the party that could extract value.
 *
 * Rules:
 * - No floating-point operations
 * - Operands of mulDiv are non-negative
 * - Division by zero throws, it never yields a sentinel
 */

import { MathError } from "./errors.js";

/** 1.0 in 18-decimal fixed point. */
export const WAD = 10n ** 18n;

/** Largest value representable in 256 bits. Used as the "infinite" sentinel. */
export const MAX_UINT256 = 2n ** 256n - 1n;

export type Rounding = "down" | "up";

function assertNonNegative(value: bigint, label: string): void {
  if (value < 0n) {
    throw new MathError("NEGATIVE_AMOUNT", `${label} must be non-negative, got ${value.toString()}`);
  }
}

/**
 * Compute a * b / d with the requested rounding.
 */
export function mulDiv(a: bigint, b: bigint, d: bigint, rounding: Rounding): bigint {
  assertNonNegative(a, "mulDiv operand a");
  assertNonNegative(b, "mulDiv operand b");
  if (d <= 0n) {
    throw new MathError("DIVISION_BY_ZERO", `mulDiv denominator must be positive, got ${d.toString()}`);
  }

  const product = a * b;
  const quotient = product / d;
  if (rounding === "up" && product % d !== 0n) {
    return quotient + 1n;
  }
  return quotient;
}

export function mulDivDown(a: bigint, b: bigint, d: bigint): bigint {
  return mulDiv(a, b, d, "down");
}

export function mulDivUp(a: bigint, b: bigint, d: bigint): bigint {
  return mulDiv(a, b, d, "up");
}

/**
 * mulDiv that clamps at MAX_UINT256 instead of producing a wider value.
 * A zero denominator yields MAX_UINT256 when the numerator is positive and
 * 0 when it is zero.
 */
export function saturatingMulDiv(a: bigint, b: bigint, d: bigint): bigint {
  assertNonNegative(a, "saturatingMulDiv operand a");
  assertNonNegative(b, "saturatingMulDiv operand b");
  if (d === 0n) {
    return a === 0n || b === 0n ? 0n : MAX_UINT256;
  }
  const result = mulDivDown(a, b, d);
  return result > MAX_UINT256 ? MAX_UINT256 : result;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/**
 * Sum a list of amounts.
 */
export function sumBigInt(values: readonly bigint[]): bigint {
  let total = 0n;
  for (const value of values) {
    total += value;
  }
  return total;
}

/**
 * 10^decimals as bigint.
 */
export function unitOf(decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new MathError("INVALID_AMOUNT", `Decimals must be a non-negative integer, got: ${String(decimals)}`);
  }
  return 10n ** BigInt(decimals);
}
