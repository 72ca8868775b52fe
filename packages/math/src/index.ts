/**
 * @cellar/math — bigint fixed-point arithmetic for share and valuation math.
 *
 * Zero runtime dependencies. No floating point.
 */

export {
  WAD,
  MAX_UINT256,
  mulDiv,
  mulDivDown,
  mulDivUp,
  saturatingMulDiv,
  minBigInt,
  maxBigInt,
  sumBigInt,
  unitOf,
} from "./fixed-point.js";
export type { Rounding } from "./fixed-point.js";

export { parseAmount, formatAmount, parseUint } from "./amounts.js";

export { MathError } from "./errors.js";
export type { MathErrorCode } from "./errors.js";
