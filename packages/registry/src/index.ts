/**
 * @cellar/registry — Global trust registry for adaptors and positions.
 *
 * Design rules:
 * - Trust is granted by the registry owner only
 * - Positions are content-addressed: (adaptor, isDebt, configData) → hash → id
 * - Distrust blocks new use; it never unwinds existing holdings
 */

export { PositionRegistry } from "./registry.js";
export { computePositionHash } from "./position-hash.js";
export { RegistryError } from "./types.js";
export type {
  AdaptorIdentity,
  RegistrySnapshot,
  RegistryErrorCode,
} from "./types.js";
