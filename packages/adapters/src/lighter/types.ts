/**
 * Lighter Exchange Types
 *
 * Response schemas for the public REST endpoints used by the hedger and
 * the adapter configuration shared by the market, account and execution adapters.
 */

import { z } from "zod";

import type { FetchFn } from "../http/http-client";

export const DEFAULT_LIGHTER_BASE_URL = "https://mainnet.zklighter.elliot.ai";

/**
 * Spot symbol → Lighter market index
 */
export const DEFAULT_LIGHTER_MARKET_IDS: Readonly<Record<string, number>> = {
  ETH: 0,
  BTC: 1,
  SOL: 2,
  HYPE: 24,
};

export interface LighterConfig {
  baseUrl: string;
  timeoutMs: number;
  marketIds: Readonly<Record<string, number>>;
  fetchFn?: FetchFn;
}

export interface LighterAccountConfig extends LighterConfig {
  accountIndex: number;
}

/**
 * Parse "ETH:0,BTC:1" into a market id map.
 */
export const MarketIdsSchema = z
  .string()
  .transform((raw, ctx) => {
    const out: Record<string, number> = {};
    for (const pair of raw.split(",").map(s => s.trim()).filter(s => s.length > 0)) {
      const [symbol, id] = pair.split(":").map(s => s.trim());
      const marketId = Number(id);
      if (!symbol || id === undefined || id === "" || !Number.isInteger(marketId) || marketId < 0) {
        ctx.addIssue({ code: "custom", message: `invalid market id entry: ${pair}` });
        return z.NEVER;
      }
      out[symbol.toUpperCase()] = marketId;
    }
    return out;
  });

const NumericString = z.union([z.string(), z.number()]);

// ─────────────────────────────────────────────────────────────────────────────
// GET /api/v1/orderBookDetails?market_id=N
// ─────────────────────────────────────────────────────────────────────────────

export const OrderBookDetailsResponseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  order_book_details: z
    .array(
      z.object({
        symbol: z.string(),
        market_id: z.number(),
        last_trade_price: NumericString.nullish(),
        size_decimals: z.number().int().nonnegative(),
        price_decimals: z.number().int().nonnegative(),
      }),
    )
    .default([]),
});

export type OrderBookDetailsResponse = z.infer<typeof OrderBookDetailsResponseSchema>;
export type OrderBookDetail = OrderBookDetailsResponse["order_book_details"][number];

// ─────────────────────────────────────────────────────────────────────────────
// GET /api/v1/account?by=index&value=N
// ─────────────────────────────────────────────────────────────────────────────

export const AccountResponseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  accounts: z
    .array(
      z.object({
        positions: z
          .array(
            z.object({
              symbol: z.string(),
              market_id: z.number().optional(),
              position: NumericString,
              sign: z.number().optional(),
            }),
          )
          .default([]),
      }),
    )
    .default([]),
});

export type AccountResponse = z.infer<typeof AccountResponseSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// POST /api/v1/sendTx
// ─────────────────────────────────────────────────────────────────────────────

export const SendTxResponseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  tx_hash: z.string().optional(),
});

export type SendTxResponse = z.infer<typeof SendTxResponseSchema>;
