/**
 * @cellar/types — Shared domain types for the Cellar stack.
 *
 * Used across all Cellar packages:
 * - Asset, account and position identifiers
 * - Strategist call structures
 * - Error taxonomy
 * - Checkpoint contract for atomic batches
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

export type {
  AssetId,
  AccountId,
  PositionId,
  PositionHash,
  Timestamp,
  JsonValue,
  ConfigData,
  StrategistCall,
  AdaptorCall,
  PositionRecord,
} from "./domain.js";

export type { ErrorCategory, CategorizedError } from "./errors.js";

export type { Checkpointable, Restore } from "./checkpoint.js";

export {
  isJsonValue,
  isPositionId,
  isStrategistCall,
  isAdaptorCall,
} from "./guards.js";
