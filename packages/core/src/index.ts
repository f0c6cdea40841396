/**
 * packages/core - Pure Hedge Logic
 *
 * This package contains all pure business logic for the delta hedger.
 * NO I/O dependencies (DB, HTTP, WS, FS).
 * NO exceptions thrown (uses Result types where needed).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  OptionSymbol,
  Underlying,
  Ms,
  Side,
  // Option book
  OptionPosition,
  DeltaExposure,
  PositionSkipReason,
  SkippedPosition,
  AggregationResult,
  // Policy
  NoAction,
  BuyAction,
  SellAction,
  HedgeAction,
  HedgeRequirement,
  RequirementSkipReason,
  SkippedUnderlying,
  // Order planning
  MarketPrecision,
  PlannedHedgeOrder,
  OrderSkipReason,
  SkippedHedgeOrder,
  HedgeOrderPlan,
  // Journal
  HedgeOrderStatus,
  HedgeOrderRecord,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Underlying Resolution
// ─────────────────────────────────────────────────────────────────────────────
export type { UnderlyingError } from "./underlying";
export {
  DEFAULT_SUPPORTED_UNDERLYINGS,
  isValidOptionSymbol,
  resolveUnderlying,
  parseUnderlyingList,
} from "./underlying";

// ─────────────────────────────────────────────────────────────────────────────
// Lot Netting
// ─────────────────────────────────────────────────────────────────────────────
export type { LotChange, LotError } from "./lot-netting";
export { netAddLot, netRemoveLot } from "./lot-netting";

// ─────────────────────────────────────────────────────────────────────────────
// Position Aggregator
// ─────────────────────────────────────────────────────────────────────────────
export type { AggregateOptions } from "./position-aggregator";
export { aggregateExposure, toNumber } from "./position-aggregator";

// ─────────────────────────────────────────────────────────────────────────────
// Hedge Policy
// ─────────────────────────────────────────────────────────────────────────────
export type { HedgeRequirementInput } from "./hedge-policy";
export { computeHedgeRequirement, actionableRequirements, isValidThresholdPct } from "./hedge-policy";

// ─────────────────────────────────────────────────────────────────────────────
// Order Planner
// ─────────────────────────────────────────────────────────────────────────────
export { DEFAULT_PRICE_TOLERANCE_PCT, roundSize, computeWorstPrice, planHedgeOrder } from "./order-planner";
