/**
 * VaultShareAdaptor — shares of another tokenized vault (including
 * another Cellar).
 *
 * The balance is the redeem value of the held shares, in the nested
 * vault's asset.
 */

import { z } from "zod";
import type { AccountId, AssetId, ConfigData, JsonValue } from "@cellar/types";
import type { ShareVault } from "@cellar/protocols";
import { BaseAdaptor, functionTable, strategistFunction } from "../base-adaptor.js";
import { AccountIdSchema, AmountOrMaxSchema } from "../schemas.js";
import type { AdaptorContext } from "../types.js";

const VaultShareConfigSchema = z.object({ vault: AccountIdSchema }).strict();

export type VaultShareConfig = z.infer<typeof VaultShareConfigSchema>;

const VaultAmountArgs = z.object({
  vault: AccountIdSchema,
  amount: AmountOrMaxSchema,
});

export class VaultShareAdaptor extends BaseAdaptor<VaultShareConfig> {
  readonly identifier = "Vault Share Adaptor V1";
  protected readonly configSchema = VaultShareConfigSchema;
  protected readonly functionTable = functionTable({
    depositToVault: strategistFunction(VaultAmountArgs, (args, ctx) => {
      this.depositToVault(args, ctx);
    }),
    withdrawFromVault: strategistFunction(VaultAmountArgs, (args, ctx) => {
      this.withdrawFromVault(args, ctx);
    }),
  });

  isDebt(): boolean {
    return false;
  }

  assetOf(configData: ConfigData, ctx: AdaptorContext): AssetId {
    return this.vault(configData, ctx).asset;
  }

  override nestedVaultsOf(configData: ConfigData): readonly AccountId[] {
    return [this.decodeConfig(configData).vault];
  }

  balanceOf(configData: ConfigData, ctx: AdaptorContext): bigint {
    const vault = this.vault(configData, ctx);
    return vault.previewRedeem(vault.balanceOf(ctx.vault));
  }

  override withdrawableFrom(configData: ConfigData, _userConfig: JsonValue, ctx: AdaptorContext): bigint {
    return this.vault(configData, ctx).maxWithdraw(ctx.vault);
  }

  override deposit(assets: bigint, configData: ConfigData, _userConfig: JsonValue, ctx: AdaptorContext): void {
    this.vault(configData, ctx).deposit(ctx.vault, assets, ctx.vault);
  }

  override withdraw(
    assets: bigint,
    receiver: AccountId,
    configData: ConfigData,
    _userConfig: JsonValue,
    ctx: AdaptorContext,
  ): void {
    this.vault(configData, ctx).withdraw(ctx.vault, assets, receiver, ctx.vault);
  }

  // ─── Strategist functions ──────────────────────────────────────────────

  private depositToVault(args: z.output<typeof VaultAmountArgs>, ctx: AdaptorContext): void {
    const configData = { vault: args.vault };
    this.assertPositionUsed(configData, ctx);
    const vault = this.vault(configData, ctx);
    const amount = args.amount === "max" ? ctx.env.tokens.balanceOf(ctx.vault, vault.asset) : args.amount;
    vault.deposit(ctx.vault, amount, ctx.vault);
  }

  private withdrawFromVault(args: z.output<typeof VaultAmountArgs>, ctx: AdaptorContext): void {
    const configData = { vault: args.vault };
    this.assertPositionUsed(configData, ctx);
    const vault = this.vault(configData, ctx);
    const amount = args.amount === "max" ? vault.maxWithdraw(ctx.vault) : args.amount;
    vault.withdraw(ctx.vault, amount, ctx.vault, ctx.vault);
  }

  private vault(configData: ConfigData, ctx: AdaptorContext): ShareVault {
    return ctx.env.vaults.get(this.decodeConfig(configData).vault);
  }
}
