/**
 * All-or-nothing execution over a set of checkpointable participants.
 *
 * Every participant is checkpointed before the operation runs. If the
 * operation throws, the checkpoints are restored newest-first and the
 * original error is rethrown unchanged.
 */

import type { Checkpointable, Restore } from "@cellar/types";

export function runAtomically<T>(
  participants: readonly Checkpointable[],
  operation: () => T,
): T {
  const restores: Restore[] = participants.map((p) => p.checkpoint());

  try {
    return operation();
  } catch (err) {
    for (const restore of [...restores].reverse()) {
      restore();
    }
    throw err;
  }
}
