/**
 * Order Planner - Requirement → market order parameters
 *
 * - BUY → bid with a price ceiling, SELL → ask with a price floor
 * - worst price = reference × (1 ± tolerance), rounded toward the reference
 *   so the bound stays inside the tolerance band
 * - size rounded half-up to the venue size decimals; zero → skip
 *
 * This module is pure (no I/O, no throw).
 */

import Decimal from "decimal.js";

import type { HedgeOrderPlan, HedgeRequirement, MarketPrecision, Side } from "./types";

/**
 * Default slippage tolerance for market orders (1%)
 */
export const DEFAULT_PRICE_TOLERANCE_PCT = 1;

/**
 * Round a trade amount to the venue's size precision.
 */
export function roundSize(amount: number, sizeDecimals: number): Decimal {
  return new Decimal(amount).abs().toDecimalPlaces(sizeDecimals, Decimal.ROUND_HALF_UP);
}

/**
 * Worst acceptable execution price for a market order.
 */
export function computeWorstPrice(
  side: Side,
  referencePrice: number,
  tolerancePct: number,
  priceDecimals: number,
): Decimal {
  const tolerance = new Decimal(tolerancePct).div(100);
  const reference = new Decimal(referencePrice);

  if (side === "buy") {
    return reference.times(new Decimal(1).plus(tolerance)).toDecimalPlaces(priceDecimals, Decimal.ROUND_DOWN);
  }
  return reference.times(new Decimal(1).minus(tolerance)).toDecimalPlaces(priceDecimals, Decimal.ROUND_UP);
}

/**
 * Plan the market order for a requirement.
 */
export function planHedgeOrder(
  requirement: HedgeRequirement,
  precision: MarketPrecision,
  tolerancePct: number = DEFAULT_PRICE_TOLERANCE_PCT,
): HedgeOrderPlan {
  const { action, underlying } = requirement;
  if (action.type === "NONE") {
    return { type: "SKIP", underlying, reason: "NO_ACTION" };
  }

  const size = roundSize(action.amount, precision.sizeDecimals);
  if (size.isZero()) {
    return { type: "SKIP", underlying, reason: "ROUNDED_TO_ZERO" };
  }

  const side: Side = action.type === "BUY" ? "buy" : "sell";
  const worstPrice = computeWorstPrice(side, requirement.spotPrice, tolerancePct, precision.priceDecimals);

  return {
    type: "ORDER",
    underlying,
    side,
    size: size.toFixed(precision.sizeDecimals),
    referencePrice: requirement.spotPrice,
    worstPrice: worstPrice.toFixed(precision.priceDecimals),
  };
}
