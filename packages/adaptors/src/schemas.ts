/**
 * Argument schemas shared by strategist functions.
 *
 * Amounts travel as base-unit integer strings so they survive JSON.
 */

import { z } from "zod";
import type { ZodError } from "zod";

export const AssetIdSchema = z.string().min(1);

export const AccountIdSchema = z.string().min(1);

export const BaseUnitsSchema = z
  .string()
  .regex(/^\d+$/, "expected a base-unit integer string")
  .transform((raw) => BigInt(raw));

/** A base-unit amount, or "max" for "as much as the position allows". */
export const AmountOrMaxSchema = z.union([z.literal("max"), BaseUnitsSchema]);

export type AmountOrMax = z.output<typeof AmountOrMaxSchema>;

/** Range is checked by the adaptor so it can raise INVALID_SUB_ACCOUNT_ID. */
export const SubAccountIdSchema = z.number().int();

export function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
