/**
 * Execution Port - Interface for hedge order submission
 *
 * - Adapters implement this port for venue-specific trading
 * - One call = one submission; adapters never retry
 */

import type { ResultAsync } from "neverthrow";

/**
 * Order side
 */
export type OrderSide = "buy" | "sell";

/**
 * Market order request
 *
 * `size` and `worstPrice` are already rounded to the venue decimals.
 */
export interface MarketOrderRequest {
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  size: string;
  worstPrice: string;
  sizeDecimals: number;
  priceDecimals: number;
  /**
   * Caller deadline. Once aborted the adapter sends nothing further and
   * cancels any request in flight.
   */
  signal?: AbortSignal;
}

/**
 * Venue acknowledgement of an accepted submission
 */
export interface MarketOrderAck {
  txId: string;
  ts: Date;
}

/**
 * Execution adapter errors
 */
export type ExecutionError =
  | { type: "network"; message: string }
  | { type: "timeout"; message: string }
  | { type: "rate_limit"; message: string; retryAfterMs?: number }
  | { type: "auth"; message: string }
  | { type: "invalid_order"; message: string }
  | { type: "insufficient_balance"; message: string }
  | { type: "exchange_error"; message: string; code?: string }
  | { type: "unknown"; message: string };

/**
 * Execution Port interface
 */
export interface ExecutionPort {
  /**
   * Venue name recorded on hedge order records
   */
  readonly venue: string;

  /**
   * Submit a slippage-bounded market order
   */
  submitMarketOrder(request: MarketOrderRequest): ResultAsync<MarketOrderAck, ExecutionError>;
}
