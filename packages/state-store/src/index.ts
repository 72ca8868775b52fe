/**
 * @cellar/state-store — Durable, hash-verified state records.
 */

export {
  FileStateStore,
  InMemoryStateStore,
  computeStateHash,
  verifyStateIntegrity,
} from "./state-store.js";
export type { SaveStateOptions, StateStore, StoredState } from "./state-store.js";

export { StateStoreError } from "./errors.js";
export type { StateStoreErrorCode } from "./errors.js";
