/**
 * SwapAdaptor — exchanges assets the vault holds through the swap router.
 *
 * Not a position: it holds nothing, so it can be catalogued but never
 * trusted as a position or added to an active list.
 */

import { z } from "zod";
import type { AssetId, ConfigData } from "@cellar/types";
import { BaseAdaptor, functionTable, strategistFunction } from "../base-adaptor.js";
import { AdaptorError } from "../errors.js";
import { AssetIdSchema, BaseUnitsSchema } from "../schemas.js";
import type { AdaptorContext } from "../types.js";

const SwapArgs = z.object({
  exchange: z.enum(["UNIV2", "UNIV3"]),
  path: z.array(AssetIdSchema).min(2),
  poolFees: z.array(z.number().int().nonnegative()).optional(),
  amount: BaseUnitsSchema,
  amountOutMin: BaseUnitsSchema,
  deadline: z.number().int().nonnegative(),
});

export class SwapAdaptor extends BaseAdaptor<never> {
  readonly identifier = "Swap Adaptor V1";
  protected readonly configSchema = z.never();
  protected readonly functionTable = functionTable({
    swap: strategistFunction(SwapArgs, (args, ctx) => {
      this.swap(args, ctx);
    }),
  });

  isDebt(): boolean {
    return false;
  }

  override validateConfig(_configData: ConfigData): void {
    throw this.notAPosition();
  }

  assetOf(_configData: ConfigData): AssetId {
    throw this.notAPosition();
  }

  balanceOf(_configData: ConfigData): bigint {
    throw this.notAPosition();
  }

  private swap(args: z.output<typeof SwapArgs>, ctx: AdaptorContext): void {
    ctx.env.swaps.executeSwap(
      args.exchange,
      {
        path: args.path,
        ...(args.poolFees !== undefined ? { poolFees: args.poolFees } : {}),
        amountIn: args.amount,
        amountOutMin: args.amountOutMin,
        deadline: args.deadline,
      },
      ctx.vault,
    );
  }

  private notAPosition(): AdaptorError {
    return new AdaptorError("NOT_A_POSITION", this.identifier, `${this.identifier} does not hold positions`);
  }
}
