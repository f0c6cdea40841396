/**
 * Hedge Policy - Deadband decision per underlying
 *
 * target    = -netDelta
 * diff      = target - current
 * threshold = |target| × thresholdPct / 100
 * act when |diff| > threshold: BUY if diff > 0, SELL otherwise
 *
 * A zero target gives a zero threshold, so any drift away from a flat hedge
 * is actionable.
 *
 * This module is pure (no I/O, no throw).
 */

import Decimal from "decimal.js";

import { toNumber } from "./position-aggregator";
import type { HedgeAction, HedgeRequirement, Underlying } from "./types";

export interface HedgeRequirementInput {
  underlying: Underlying;
  netDelta: number;
  spotPrice: number;
  currentInventory: number;
  thresholdPct: number;
}

/**
 * Check the threshold percentage range (0 < t ≤ 100).
 */
export function isValidThresholdPct(thresholdPct: number): boolean {
  return Number.isFinite(thresholdPct) && thresholdPct > 0 && thresholdPct <= 100;
}

/**
 * Compute the hedge requirement for one underlying.
 *
 * Deterministic: identical inputs always produce an identical requirement.
 */
export function computeHedgeRequirement(input: HedgeRequirementInput): HedgeRequirement {
  const netDelta = new Decimal(input.netDelta);
  const target = netDelta.isZero() ? new Decimal(0) : netDelta.neg();
  const current = new Decimal(input.currentInventory);
  const diff = target.minus(current);
  const thresholdAmount = target.abs().times(input.thresholdPct).div(100);
  const thresholdMet = diff.abs().gt(thresholdAmount);

  let action: HedgeAction = { type: "NONE" };
  if (thresholdMet) {
    const amount = toNumber(diff.abs());
    action = diff.gt(0) ? { type: "BUY", amount } : { type: "SELL", amount };
  }

  return {
    underlying: input.underlying,
    netDelta: toNumber(netDelta),
    spotPrice: input.spotPrice,
    targetInventory: toNumber(target),
    currentInventory: toNumber(current),
    positionDiff: toNumber(diff),
    thresholdPct: input.thresholdPct,
    thresholdAmount: toNumber(thresholdAmount),
    thresholdMet,
    action,
  };
}

/**
 * Requirements that need a trade, preserving input order.
 */
export function actionableRequirements(requirements: readonly HedgeRequirement[]): HedgeRequirement[] {
  return requirements.filter(r => r.action.type !== "NONE");
}
