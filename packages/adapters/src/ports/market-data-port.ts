/**
 * Market Data Ports - Read-only venue data needed by the hedge cycle
 *
 * - OptionGreeksPort: per-contract option delta
 * - SpotMarketPort: spot last trade price and order precision
 * - InventoryPort: held spot inventory for the configured account
 */

import type { ResultAsync } from "neverthrow";

/**
 * Market data adapter errors
 */
export type MarketDataError =
  | { type: "network"; message: string }
  | { type: "timeout"; message: string }
  | { type: "rate_limit"; message: string }
  | { type: "invalid_response"; message: string }
  | { type: "not_found"; message: string };

/**
 * Option greeks provider
 */
export interface OptionGreeksPort {
  /**
   * Delta per contract, or null when the venue reports none for the symbol
   */
  getDelta(symbol: string): ResultAsync<number | null, MarketDataError>;
}

/**
 * Spot market data provider
 */
export interface SpotMarketPort {
  /**
   * Last trade price, or null when the market has not traded
   */
  getLastPrice(symbol: string): ResultAsync<number | null, MarketDataError>;

  getSizeDecimals(symbol: string): ResultAsync<number, MarketDataError>;

  getPriceDecimals(symbol: string): ResultAsync<number, MarketDataError>;
}

/**
 * Venue inventory provider
 *
 * The account is bound in adapter configuration.
 */
export interface InventoryPort {
  /**
   * Signed held quantity (long > 0, short < 0); 0 when there is no position
   */
  getInventory(symbol: string): ResultAsync<number, MarketDataError>;
}
