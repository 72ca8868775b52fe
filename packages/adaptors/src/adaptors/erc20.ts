/**
 * Erc20Adaptor — a plain token balance held by the vault.
 *
 * The usual holding position: deposits land here untouched and
 * withdrawals are served straight from it.
 */

import { z } from "zod";
import type { AccountId, AssetId, ConfigData, JsonValue } from "@cellar/types";
import { BaseAdaptor, functionTable } from "../base-adaptor.js";
import { AssetIdSchema } from "../schemas.js";
import type { AdaptorContext } from "../types.js";

const Erc20ConfigSchema = z.object({ token: AssetIdSchema }).strict();

export type Erc20Config = z.infer<typeof Erc20ConfigSchema>;

export class Erc20Adaptor extends BaseAdaptor<Erc20Config> {
  readonly identifier = "ERC20 Adaptor V1";
  protected readonly configSchema = Erc20ConfigSchema;
  protected readonly functionTable = functionTable({});

  isDebt(): boolean {
    return false;
  }

  assetOf(configData: ConfigData): AssetId {
    return this.decodeConfig(configData).token;
  }

  balanceOf(configData: ConfigData, ctx: AdaptorContext): bigint {
    return ctx.env.tokens.balanceOf(ctx.vault, this.decodeConfig(configData).token);
  }

  override withdrawableFrom(configData: ConfigData, _userConfig: JsonValue, ctx: AdaptorContext): bigint {
    return this.balanceOf(configData, ctx);
  }

  /** Tokens already sit in the vault; nothing to move. */
  override deposit(_assets: bigint, configData: ConfigData, _userConfig: JsonValue, _ctx: AdaptorContext): void {
    this.decodeConfig(configData);
  }

  override withdraw(
    assets: bigint,
    receiver: AccountId,
    configData: ConfigData,
    _userConfig: JsonValue,
    ctx: AdaptorContext,
  ): void {
    const { token } = this.decodeConfig(configData);
    ctx.env.tokens.transfer(ctx.vault, receiver, token, assets);
  }
}
