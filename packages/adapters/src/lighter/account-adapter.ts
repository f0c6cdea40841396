/**
 * Lighter Account Adapter
 *
 * Held spot inventory from
 *   GET {baseUrl}/api/v1/account?by=index&value=N
 *
 * `position` is unsigned; `sign` carries the direction (1 long, -1 short).
 */

import { errAsync, okAsync, type ResultAsync } from "neverthrow";

import { requestJson, toMarketDataError } from "../http/http-client";
import { parseNumeric } from "../http/numeric";
import type { InventoryPort, MarketDataError } from "../ports";
import { AccountResponseSchema, type LighterAccountConfig } from "./types";

export class LighterAccountAdapter implements InventoryPort {
  private readonly config: LighterAccountConfig;

  constructor(config: LighterAccountConfig) {
    this.config = config;
  }

  getInventory(symbol: string): ResultAsync<number, MarketDataError> {
    const url = `${this.config.baseUrl}/api/v1/account?by=index&value=${String(this.config.accountIndex)}`;
    const wanted = symbol.toUpperCase();

    return requestJson(this.config, url, AccountResponseSchema)
      .mapErr(toMarketDataError)
      .andThen(res => {
        if (res.code !== 200) {
          return errAsync<number, MarketDataError>({
            type: "invalid_response",
            message: `account code ${String(res.code)}: ${res.message ?? ""}`.trim(),
          });
        }
        const account = res.accounts[0];
        if (!account) {
          return errAsync<number, MarketDataError>({
            type: "not_found",
            message: `account ${String(this.config.accountIndex)} not found`,
          });
        }

        const position = account.positions.find(p => p.symbol.toUpperCase() === wanted);
        if (!position) return okAsync<number, MarketDataError>(0);

        const size = parseNumeric(position.position);
        if (size === null) {
          return errAsync<number, MarketDataError>({
            type: "invalid_response",
            message: `unparseable position for ${wanted}: ${String(position.position)}`,
          });
        }
        const signed = position.sign === -1 ? -size : size;
        return okAsync<number, MarketDataError>(signed === 0 ? 0 : signed);
      });
  }
}
