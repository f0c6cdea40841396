/**
 * Position Aggregator - Net delta per underlying
 *
 * Sign convention:
 * - quantity is signed (long > 0, short < 0)
 * - delta is the per-contract delta from the greeks provider (calls > 0, puts < 0)
 * - contribution = quantity × delta
 *
 * So a long call adds positive delta (hedged by selling spot) and a short call
 * adds negative delta (hedged by buying spot).
 *
 * This module is pure (no I/O, no throw).
 */

import Decimal from "decimal.js";

import type {
  AggregationResult,
  Ms,
  OptionPosition,
  SkippedPosition,
  Underlying,
} from "./types";
import { resolveUnderlying } from "./underlying";

export interface AggregateOptions {
  supportedUnderlyings: ReadonlySet<Underlying>;
  nowMs: Ms;
  /**
   * Deltas refreshed longer ago than this are treated as unavailable.
   * Omit to accept any cached delta.
   */
  deltaMaxAgeMs?: Ms;
}

/**
 * Convert a Decimal to number without producing -0.
 */
export function toNumber(value: Decimal): number {
  return value.isZero() ? 0 : value.toNumber();
}

/**
 * Aggregate option positions into a DeltaExposure.
 *
 * Positions are processed in symbol order so the output order is deterministic.
 * Unresolvable or delta-less positions are reported in `skipped` and excluded.
 * An underlying with at least one contributing position is always present,
 * even when its net delta is exactly zero.
 */
export function aggregateExposure(
  positions: readonly OptionPosition[],
  options: AggregateOptions,
): AggregationResult {
  const sums = new Map<Underlying, Decimal>();
  const contributions = new Map<Underlying, number>();
  const skipped: SkippedPosition[] = [];

  const ordered = [...positions].sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0));

  for (const position of ordered) {
    const underlying = resolveUnderlying(position.symbol, options.supportedUnderlyings);
    if (underlying.isErr()) {
      skipped.push({ symbol: position.symbol, reason: "UNKNOWN_UNDERLYING" });
      continue;
    }

    if (position.delta === null || !Number.isFinite(position.delta)) {
      skipped.push({ symbol: position.symbol, reason: "DELTA_UNAVAILABLE" });
      continue;
    }

    if (options.deltaMaxAgeMs !== undefined) {
      const updatedMs = position.deltaUpdatedAt?.getTime();
      if (updatedMs === undefined || options.nowMs - updatedMs > options.deltaMaxAgeMs) {
        skipped.push({ symbol: position.symbol, reason: "DELTA_STALE" });
        continue;
      }
    }

    const key = underlying.value;
    const contribution = new Decimal(position.quantity).times(position.delta);
    sums.set(key, (sums.get(key) ?? new Decimal(0)).plus(contribution));
    contributions.set(key, (contributions.get(key) ?? 0) + 1);
  }

  const exposure = new Map<Underlying, number>();
  for (const [key, sum] of sums) {
    exposure.set(key, toNumber(sum));
  }

  return { exposure, contributions, skipped };
}
