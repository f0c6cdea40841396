/**
 * Lighter Market Adapter
 *
 * Spot last price and order precision from
 *   GET {baseUrl}/api/v1/orderBookDetails?market_id=N
 *
 * Size / price decimals do not change while the process runs, so they are
 * cached per symbol after the first successful read. Prices are always fetched.
 */

import { errAsync, okAsync, type ResultAsync } from "neverthrow";

import { requestJson, toMarketDataError } from "../http/http-client";
import { parseNumeric } from "../http/numeric";
import type { MarketDataError, SpotMarketPort } from "../ports";
import { OrderBookDetailsResponseSchema, type LighterConfig, type OrderBookDetail } from "./types";

type Precision = { sizeDecimals: number; priceDecimals: number };

export class LighterMarketAdapter implements SpotMarketPort {
  private readonly config: LighterConfig;
  private readonly precisionCache = new Map<string, Precision>();

  constructor(config: LighterConfig) {
    this.config = config;
  }

  /**
   * Resolve a spot symbol to its Lighter market index.
   */
  marketIdOf(symbol: string): number | undefined {
    return this.config.marketIds[symbol.toUpperCase()];
  }

  getLastPrice(symbol: string): ResultAsync<number | null, MarketDataError> {
    return this.fetchDetail(symbol).map(detail => parseNumeric(detail.last_trade_price));
  }

  getSizeDecimals(symbol: string): ResultAsync<number, MarketDataError> {
    return this.getPrecision(symbol).map(p => p.sizeDecimals);
  }

  getPriceDecimals(symbol: string): ResultAsync<number, MarketDataError> {
    return this.getPrecision(symbol).map(p => p.priceDecimals);
  }

  private getPrecision(symbol: string): ResultAsync<Precision, MarketDataError> {
    const key = symbol.toUpperCase();
    const cached = this.precisionCache.get(key);
    if (cached) return okAsync(cached);

    return this.fetchDetail(symbol).map(detail => {
      const precision = { sizeDecimals: detail.size_decimals, priceDecimals: detail.price_decimals };
      this.precisionCache.set(key, precision);
      return precision;
    });
  }

  private fetchDetail(symbol: string): ResultAsync<OrderBookDetail, MarketDataError> {
    const marketId = this.marketIdOf(symbol);
    if (marketId === undefined) {
      return errAsync({ type: "not_found" as const, message: `no Lighter market configured for ${symbol}` });
    }

    const url = `${this.config.baseUrl}/api/v1/orderBookDetails?market_id=${String(marketId)}`;

    return requestJson(this.config, url, OrderBookDetailsResponseSchema)
      .mapErr(toMarketDataError)
      .andThen(res => {
        if (res.code !== 200) {
          return errAsync<OrderBookDetail, MarketDataError>({
            type: "invalid_response",
            message: `orderBookDetails code ${String(res.code)}: ${res.message ?? ""}`.trim(),
          });
        }
        const detail = res.order_book_details[0];
        if (!detail) {
          return errAsync<OrderBookDetail, MarketDataError>({
            type: "not_found",
            message: `market ${String(marketId)} returned no details`,
          });
        }
        return okAsync<OrderBookDetail, MarketDataError>(detail);
      });
  }
}
