/**
 * In-process stand-ins for the venue ports
 */

import { errAsync, okAsync, type ResultAsync } from "neverthrow";
import type {
  ExecutionError,
  ExecutionPort,
  InventoryPort,
  MarketDataError,
  MarketOrderAck,
  MarketOrderRequest,
  OptionGreeksPort,
  SpotMarketPort,
} from "@delta-hedger/adapters";
import type { HedgeRequirement } from "@delta-hedger/core";

export const networkError = (message = "connection refused"): MarketDataError => ({ type: "network", message });

export class FakeGreeks implements OptionGreeksPort {
  readonly deltas = new Map<string, number | null>();
  readonly failing = new Set<string>();
  calls: string[] = [];

  constructor(deltas: Record<string, number | null> = {}) {
    for (const [symbol, delta] of Object.entries(deltas)) this.deltas.set(symbol, delta);
  }

  getDelta(symbol: string): ResultAsync<number | null, MarketDataError> {
    this.calls.push(symbol);
    if (this.failing.has(symbol)) return errAsync(networkError());
    return okAsync(this.deltas.get(symbol) ?? null);
  }
}

export class FakeMarket implements SpotMarketPort {
  readonly prices = new Map<string, number | null>();
  readonly failingPrices = new Set<string>();
  sizeDecimals = 2;
  priceDecimals = 2;
  precisionError: MarketDataError | null = null;

  constructor(prices: Record<string, number | null> = {}) {
    for (const [symbol, price] of Object.entries(prices)) this.prices.set(symbol, price);
  }

  getLastPrice(symbol: string): ResultAsync<number | null, MarketDataError> {
    if (this.failingPrices.has(symbol)) return errAsync(networkError());
    return okAsync(this.prices.get(symbol) ?? null);
  }

  getSizeDecimals(): ResultAsync<number, MarketDataError> {
    return this.precisionError ? errAsync(this.precisionError) : okAsync(this.sizeDecimals);
  }

  getPriceDecimals(): ResultAsync<number, MarketDataError> {
    return this.precisionError ? errAsync(this.precisionError) : okAsync(this.priceDecimals);
  }
}

export class FakeInventory implements InventoryPort {
  readonly held = new Map<string, number>();
  readonly failing = new Set<string>();

  constructor(held: Record<string, number> = {}) {
    for (const [symbol, qty] of Object.entries(held)) this.held.set(symbol, qty);
  }

  getInventory(symbol: string): ResultAsync<number, MarketDataError> {
    if (this.failing.has(symbol)) return errAsync(networkError("account endpoint down"));
    return okAsync(this.held.get(symbol) ?? 0);
  }
}

type Responder = (request: MarketOrderRequest) => ResultAsync<MarketOrderAck, ExecutionError>;

export class FakeExecution implements ExecutionPort {
  readonly venue = "fake";
  readonly requests: MarketOrderRequest[] = [];
  private responder: Responder;
  private seq = 0;

  constructor(responder?: Responder) {
    this.responder =
      responder ??
      (() => {
        this.seq += 1;
        return okAsync({ txId: `tx-${String(this.seq)}`, ts: new Date("2025-01-15T00:00:00.000Z") });
      });
  }

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  submitMarketOrder(request: MarketOrderRequest): ResultAsync<MarketOrderAck, ExecutionError> {
    this.requests.push(request);
    return this.responder(request);
  }
}

export function requirement(overrides: Partial<HedgeRequirement> = {}): HedgeRequirement {
  return {
    underlying: "SOL",
    netDelta: -2,
    spotPrice: 150,
    targetInventory: 2,
    currentInventory: 0,
    positionDiff: 2,
    thresholdPct: 5,
    thresholdAmount: 0.1,
    thresholdMet: true,
    action: { type: "BUY", amount: 2 },
    ...overrides,
  };
}
