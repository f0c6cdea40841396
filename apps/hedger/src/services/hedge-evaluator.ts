/**
 * Hedge Evaluator - Exposure → hedge requirements
 *
 * For each underlying in exposure order:
 * - fetch spot price (missing / non-positive → skip PRICE_UNAVAILABLE)
 * - fetch held inventory (failed fetch → skip INVENTORY_UNAVAILABLE)
 * - apply the pure deadband policy
 *
 * Read only: never touches the position store or the venue account.
 */

import {
  computeHedgeRequirement,
  type DeltaExposure,
  type HedgeRequirement,
  type SkippedUnderlying,
  type Underlying,
} from "@delta-hedger/core";
import type { InventoryPort, SpotMarketPort } from "@delta-hedger/adapters";
import { logger } from "@delta-hedger/utils";

export interface EvaluationResult {
  requirements: HedgeRequirement[];
  skipped: SkippedUnderlying[];
}

export class HedgeEvaluator {
  private readonly market: SpotMarketPort;
  private readonly inventory: InventoryPort;
  private readonly thresholdPct: () => number;

  constructor(market: SpotMarketPort, inventory: InventoryPort, thresholdPct: () => number) {
    this.market = market;
    this.inventory = inventory;
    this.thresholdPct = thresholdPct;
  }

  async evaluate(exposure: DeltaExposure): Promise<EvaluationResult> {
    const requirements: HedgeRequirement[] = [];
    const skipped: SkippedUnderlying[] = [];
    // Read once so every underlying in a batch sees the same threshold
    const thresholdPct = this.thresholdPct();

    for (const [underlying, netDelta] of exposure) {
      const outcome = await this.evaluateOne(underlying, netDelta, thresholdPct);
      if (outcome.type === "skipped") {
        logger.warn("Underlying skipped", { underlying, reason: outcome.skip.reason, error: outcome.skip.message });
        skipped.push(outcome.skip);
        continue;
      }

      const req = outcome.requirement;
      logger.debug("Hedge requirement", {
        underlying,
        netDelta: req.netDelta,
        spot: req.spotPrice,
        target: req.targetInventory,
        current: req.currentInventory,
        diff: req.positionDiff,
        threshold: req.thresholdAmount,
        action: req.action.type,
      });
      requirements.push(req);
    }

    return { requirements, skipped };
  }

  private async evaluateOne(
    underlying: Underlying,
    netDelta: number,
    thresholdPct: number,
  ): Promise<{ type: "ok"; requirement: HedgeRequirement } | { type: "skipped"; skip: SkippedUnderlying }> {
    const price = await this.market.getLastPrice(underlying);
    if (price.isErr()) {
      return { type: "skipped", skip: { underlying, reason: "PRICE_UNAVAILABLE", message: price.error.message } };
    }
    if (price.value === null || !(price.value > 0)) {
      return { type: "skipped", skip: { underlying, reason: "PRICE_UNAVAILABLE", message: "no positive last price" } };
    }

    const held = await this.inventory.getInventory(underlying);
    if (held.isErr()) {
      return { type: "skipped", skip: { underlying, reason: "INVENTORY_UNAVAILABLE", message: held.error.message } };
    }

    return {
      type: "ok",
      requirement: computeHedgeRequirement({
        underlying,
        netDelta,
        spotPrice: price.value,
        currentInventory: held.value,
        thresholdPct,
      }),
    };
  }
}
