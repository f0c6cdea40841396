/**
 * Core Domain Types
 *
 * Pure type definitions for the hedge engine.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Option contract symbol, e.g. "SOL-USD-215-C" */
export type OptionSymbol = string;

/** Spot asset symbol, e.g. "SOL" */
export type Underlying = string;

/** Milliseconds */
export type Ms = number;

/** Side of a spot order */
export type Side = "buy" | "sell";

// ─────────────────────────────────────────────────────────────────────────────
// Option Book
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One netted lot per option symbol.
 *
 * quantity is signed: positive = long contracts, negative = short contracts.
 * A lot that nets to zero is deleted, never stored at zero.
 */
export interface OptionPosition {
  symbol: OptionSymbol;
  quantity: number;
  /** Cached delta per contract; null when never fetched */
  delta: number | null;
  deltaUpdatedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Net delta per underlying (Σ quantity × delta).
 *
 * Iteration order is the order in which underlyings were first aggregated.
 */
export type DeltaExposure = ReadonlyMap<Underlying, number>;

export type PositionSkipReason = "UNKNOWN_UNDERLYING" | "DELTA_UNAVAILABLE" | "DELTA_STALE";

export interface SkippedPosition {
  symbol: OptionSymbol;
  reason: PositionSkipReason;
}

export interface AggregationResult {
  exposure: DeltaExposure;
  /** Number of positions summed into each underlying */
  contributions: ReadonlyMap<Underlying, number>;
  skipped: SkippedPosition[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Hedge Policy
// ─────────────────────────────────────────────────────────────────────────────

export type NoAction = { type: "NONE" };
export type BuyAction = { type: "BUY"; amount: number };
export type SellAction = { type: "SELL"; amount: number };

export type HedgeAction = NoAction | BuyAction | SellAction;

/**
 * Snapshot of one underlying's hedge state for a single evaluation.
 *
 * Never mutated; a later evaluation supersedes it.
 */
export interface HedgeRequirement {
  underlying: Underlying;
  netDelta: number;
  spotPrice: number;
  /** Spot inventory that fully offsets netDelta */
  targetInventory: number;
  currentInventory: number;
  /** targetInventory - currentInventory */
  positionDiff: number;
  thresholdPct: number;
  thresholdAmount: number;
  thresholdMet: boolean;
  action: HedgeAction;
}

export type RequirementSkipReason = "PRICE_UNAVAILABLE" | "INVENTORY_UNAVAILABLE";

export interface SkippedUnderlying {
  underlying: Underlying;
  reason: RequirementSkipReason;
  message?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Order Planning
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Precision the venue accepts for a spot market
 */
export interface MarketPrecision {
  sizeDecimals: number;
  priceDecimals: number;
}

/**
 * Market order derived from a requirement.
 *
 * size and worstPrice are decimal strings already rounded to the venue precision.
 */
export interface PlannedHedgeOrder {
  type: "ORDER";
  underlying: Underlying;
  side: Side;
  size: string;
  referencePrice: number;
  worstPrice: string;
}

export type OrderSkipReason = "NO_ACTION" | "ROUNDED_TO_ZERO";

export interface SkippedHedgeOrder {
  type: "SKIP";
  underlying: Underlying;
  reason: OrderSkipReason;
}

export type HedgeOrderPlan = PlannedHedgeOrder | SkippedHedgeOrder;

// ─────────────────────────────────────────────────────────────────────────────
// Hedge order journal
// ─────────────────────────────────────────────────────────────────────────────

export type HedgeOrderStatus = "submitted" | "failed";

/**
 * Immutable journal entry for one submission attempt.
 * Numeric fields are decimal strings as sent to the venue.
 */
export interface HedgeOrderRecord {
  id: string;
  decisionId: string;
  ts: Date;
  venue: string;
  symbol: Underlying;
  side: Side;
  quantity: string;
  referencePrice: string;
  worstPrice: string;
  status: HedgeOrderStatus;
  txId: string | null;
  error: string | null;
}
