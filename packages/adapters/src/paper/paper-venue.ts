/**
 * Paper Venue
 *
 * In-process venue for paper trading: market orders fill immediately at
 * full size and move the simulated inventory. Implements both the execution
 * and inventory ports so a paper hedge cycle sees its own trades.
 */

import Decimal from "decimal.js";
import { errAsync, okAsync, type ResultAsync } from "neverthrow";
import { v4 as uuidv4 } from "uuid";

import type {
  ExecutionError,
  ExecutionPort,
  InventoryPort,
  MarketDataError,
  MarketOrderAck,
  MarketOrderRequest,
} from "../ports";

export interface PaperFill {
  clientOrderId: string;
  symbol: string;
  side: "buy" | "sell";
  size: string;
  worstPrice: string;
  txId: string;
  ts: Date;
}

export class PaperVenue implements ExecutionPort, InventoryPort {
  readonly venue = "paper";

  private readonly inventory = new Map<string, Decimal>();
  private readonly fills: PaperFill[] = [];

  constructor(initialInventory: Readonly<Record<string, number>> = {}) {
    for (const [symbol, qty] of Object.entries(initialInventory)) {
      this.inventory.set(symbol.toUpperCase(), new Decimal(qty));
    }
  }

  getInventory(symbol: string): ResultAsync<number, MarketDataError> {
    const held = this.inventory.get(symbol.toUpperCase());
    return okAsync(held === undefined || held.isZero() ? 0 : held.toNumber());
  }

  submitMarketOrder(request: MarketOrderRequest): ResultAsync<MarketOrderAck, ExecutionError> {
    if (request.signal?.aborted) {
      return errAsync({ type: "timeout" as const, message: "deadline passed; order not sent" });
    }

    const size = Number(request.size);
    if (!Number.isFinite(size) || size <= 0) {
      return errAsync({ type: "invalid_order" as const, message: `invalid size: ${request.size}` });
    }

    const key = request.symbol.toUpperCase();
    const delta = request.side === "buy" ? new Decimal(request.size) : new Decimal(request.size).neg();
    this.inventory.set(key, (this.inventory.get(key) ?? new Decimal(0)).plus(delta));

    const ack: MarketOrderAck = { txId: `paper-${uuidv4()}`, ts: new Date() };
    this.fills.push({
      clientOrderId: request.clientOrderId,
      symbol: key,
      side: request.side,
      size: request.size,
      worstPrice: request.worstPrice,
      txId: ack.txId,
      ts: ack.ts,
    });
    return okAsync(ack);
  }

  /**
   * Fills in submission order
   */
  getFills(): readonly PaperFill[] {
    return this.fills;
  }
}
