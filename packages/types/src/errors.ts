/**
 * Error taxonomy shared by every package.
 *
 * - authorization: the target is missing from a required allow-list tier,
 *   or the caller lacks the role
 * - invariant: a health, liquidity or accounting check failed
 * - external: a collaborator (market, oracle, router) refused the call
 * - structural: the operation is not supported by the target at all
 *
 * None of these is retried. The enclosing batch is rolled back and the
 * caller resubmits a corrected operation.
 */
export type ErrorCategory =
  | "authorization"
  | "invariant"
  | "external"
  | "structural";

/**
 * Shape every domain error in the stack conforms to.
 */
export interface CategorizedError {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly message: string;
}
