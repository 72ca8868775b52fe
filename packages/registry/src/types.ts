/**
 * @cellar/registry — Types for the global position registry.
 *
 * Rules:
 * - Positions are created once and never deleted
 * - The only mutation after creation is the one-way distrust flag
 * - Ids are allocated monotonically and never reused
 */

import type {
  ConfigData,
  ErrorCategory,
  PositionHash,
  PositionId,
  PositionRecord,
} from "@cellar/types";

/**
 * What the registry needs to know about an adaptor.
 * The full capability set lives in @cellar/adaptors.
 */
export interface AdaptorIdentity {
  readonly identifier: string;
  isDebt(): boolean;
  /** Throws when the configuration is not usable by this adaptor. */
  validateConfig(configData: ConfigData): void;
}

/**
 * Persistable form of the registry.
 */
export interface RegistrySnapshot {
  readonly version: 1;
  readonly owner: string;
  readonly nextPositionId: PositionId;
  readonly adaptors: readonly { readonly identifier: string; readonly trusted: boolean }[];
  readonly positions: readonly PositionRecord[];
}

export type { PositionHash, PositionId, PositionRecord };

// ─── Error Types ─────────────────────────────────────────────────────────

export type RegistryErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_ADAPTOR"
  | "IDENTIFIER_CONFLICT"
  | "UNKNOWN_ADAPTOR"
  | "ADAPTOR_NOT_TRUSTED"
  | "INVALID_POSITION_CONFIG"
  | "UNKNOWN_POSITION"
  | "POSITION_NOT_TRUSTED"
  | "POSITION_DISTRUSTED"
  | "INVALID_SNAPSHOT";

const CATEGORY: Readonly<Record<RegistryErrorCode, ErrorCategory>> = {
  UNAUTHORIZED: "authorization",
  INVALID_ADAPTOR: "structural",
  IDENTIFIER_CONFLICT: "structural",
  UNKNOWN_ADAPTOR: "authorization",
  ADAPTOR_NOT_TRUSTED: "authorization",
  INVALID_POSITION_CONFIG: "structural",
  UNKNOWN_POSITION: "authorization",
  POSITION_NOT_TRUSTED: "authorization",
  POSITION_DISTRUSTED: "authorization",
  INVALID_SNAPSHOT: "structural",
};

/**
 * Structured error from the registry.
 * Always thrown — never returns error codes silently.
 */
export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.category = CATEGORY[code];
  }
}
