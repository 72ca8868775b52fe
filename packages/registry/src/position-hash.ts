/**
 * @cellar/registry — Content-addressed position identity.
 *
 * A position is identified by the SHA-256 of the RFC 8785 (JCS)
 * canonical form of (adaptor identifier, isDebt, configData). Key order
 * in configData does not change the hash.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ConfigData, PositionHash } from "@cellar/types";

export function computePositionHash(
  identifier: string,
  isDebt: boolean,
  configData: ConfigData,
): PositionHash {
  const canonical = canonicalize({ adaptor: identifier, isDebt, configData });
  return createHash("sha256").update(canonical).digest("hex");
}
