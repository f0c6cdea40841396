/**
 * Paradex Greeks Adapter
 *
 * Reads option delta from the public markets summary endpoint:
 *   GET {baseUrl}/markets/summary?market=BTC-USD-100000-C
 *
 * The top-level `delta` is preferred; `greeks.delta` is the fallback.
 */

import type { ResultAsync } from "neverthrow";
import { z } from "zod";

import { requestJson, toMarketDataError, type FetchFn } from "../http/http-client";
import { parseNumeric } from "../http/numeric";
import type { MarketDataError, OptionGreeksPort } from "../ports";

export const DEFAULT_PARADEX_BASE_URL = "https://api.prod.paradex.trade/v1";

export interface ParadexGreeksConfig {
  baseUrl: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

const NumericSchema = z.union([z.string(), z.number()]).nullish();

const MarketSummarySchema = z.object({
  results: z.array(
    z.object({
      symbol: z.string(),
      delta: NumericSchema,
      greeks: z.object({ delta: NumericSchema }).nullish(),
    }),
  ),
});

export type ParadexMarketSummary = z.infer<typeof MarketSummarySchema>;

export class ParadexGreeksAdapter implements OptionGreeksPort {
  private readonly config: ParadexGreeksConfig;

  constructor(config: ParadexGreeksConfig) {
    this.config = config;
  }

  getDelta(symbol: string): ResultAsync<number | null, MarketDataError> {
    const url = `${this.config.baseUrl}/markets/summary?market=${encodeURIComponent(symbol)}`;

    return requestJson(this.config, url, MarketSummarySchema)
      .mapErr(toMarketDataError)
      .map(summary => {
        const entry = summary.results.find(r => r.symbol === symbol) ?? summary.results[0];
        if (!entry) return null;
        return parseNumeric(entry.delta) ?? parseNumeric(entry.greeks?.delta);
      });
  }
}
