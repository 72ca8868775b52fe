/**
 * Checkpoint contract for atomic batches.
 *
 * A participant captures its mutable state and hands back a closure that
 * puts that state back. Batches checkpoint every participant up front and
 * call the restores, newest first, when any step throws.
 */

/** Restores the state captured by a checkpoint. */
export type Restore = () => void;

export interface Checkpointable {
  checkpoint(): Restore;
}
