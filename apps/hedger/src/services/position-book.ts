/**
 * Position Book - Option lots plus their cached deltas
 *
 * Wraps the position store and the greeks provider:
 * - addLot / removeLot net against the stored lot (atomic per symbol in the store)
 * - deltas are fetched on add and refreshed on demand or per hedge cycle
 * - aggregate() applies the pure aggregator to the active lots
 */

import { errAsync, okAsync, ResultAsync } from "neverthrow";
import {
  aggregateExposure,
  type AggregationResult,
  type LotChange,
  type Ms,
  type OptionPosition,
  type OptionSymbol,
  type Underlying,
} from "@delta-hedger/core";
import type { MarketDataError, OptionGreeksPort } from "@delta-hedger/adapters";
import type {
  OptionPositionRepository,
  OptionPositionRepositoryError,
  RepositoryDbError,
} from "@delta-hedger/repositories";
import { logger } from "@delta-hedger/utils";

export type PositionBookError =
  | OptionPositionRepositoryError
  | { type: "DELTA_UNAVAILABLE"; message: string }
  | { type: "MARKET_DATA_ERROR"; message: string; cause: MarketDataError };

export interface DeltaRefreshSummary {
  updated: number;
  failed: number;
}

export interface PositionBookConfig {
  supportedUnderlyings: ReadonlySet<Underlying>;
  deltaMaxAgeMs?: Ms;
  now?: () => Date;
}

export class PositionBook {
  private readonly repo: OptionPositionRepository;
  private readonly greeks: OptionGreeksPort;
  private readonly config: PositionBookConfig;
  private readonly now: () => Date;

  constructor(repo: OptionPositionRepository, greeks: OptionGreeksPort, config: PositionBookConfig) {
    this.repo = repo;
    this.greeks = greeks;
    this.config = config;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Add a signed lot. The option must have a delta on the greeks provider;
   * a symbol the provider does not know is rejected before anything is stored.
   */
  addLot(symbol: OptionSymbol, signedQty: number): ResultAsync<LotChange, PositionBookError> {
    if (!Number.isInteger(signedQty) || signedQty === 0) {
      return errAsync<LotChange, PositionBookError>({
        type: "INVALID_QUANTITY",
        message: `quantity must be a non-zero integer: ${String(signedQty)}`,
      });
    }

    return this.observeDelta(symbol)
      .andThen(delta => this.repo.applyLot(symbol, signedQty, { delta, at: this.now() }))
      .map(change => {
        logger.info("Lot added", { symbol, quantity: signedQty, result: change.type });
        return change;
      });
  }

  /**
   * Close `qty` contracts of a lot. The delta of a surviving lot is refreshed;
   * a failed refresh only leaves the previous delta cached.
   */
  removeLot(symbol: OptionSymbol, qty: number): ResultAsync<LotChange, PositionBookError> {
    return this.repo.reduceLot(symbol, qty).andThen(change => {
      logger.info("Lot removed", { symbol, quantity: qty, result: change.type });
      if (change.type === "CLOSED") {
        return okAsync<LotChange, PositionBookError>(change);
      }
      return ResultAsync.fromSafePromise<LotChange, PositionBookError>(
        this.refreshDelta(symbol).match(
          () => change,
          e => {
            logger.warn("Delta refresh after remove failed", { symbol, error: e.message });
            return change;
          },
        ),
      );
    });
  }

  /**
   * Fetch and cache the current delta of one lot.
   * Resolves false when the symbol has no lot.
   */
  refreshDelta(symbol: OptionSymbol): ResultAsync<boolean, PositionBookError> {
    return this.observeDelta(symbol).andThen(delta => this.repo.updateDelta(symbol, { delta, at: this.now() }));
  }

  /**
   * Refresh every active lot. Failures are counted, logged and leave the
   * previous delta in place.
   */
  refreshAllDeltas(): ResultAsync<DeltaRefreshSummary, RepositoryDbError> {
    return this.repo.listActive().andThen(positions =>
      ResultAsync.fromSafePromise(this.refreshEach(positions.map(p => p.symbol))),
    );
  }

  aggregate(): ResultAsync<AggregationResult, RepositoryDbError> {
    return this.repo.listActive().map(positions => {
      const result = aggregateExposure(positions, {
        supportedUnderlyings: this.config.supportedUnderlyings,
        nowMs: this.now().getTime(),
        deltaMaxAgeMs: this.config.deltaMaxAgeMs,
      });
      for (const skipped of result.skipped) {
        logger.warn("Position excluded from exposure", { symbol: skipped.symbol, reason: skipped.reason });
      }
      return result;
    });
  }

  listActive(): ResultAsync<OptionPosition[], RepositoryDbError> {
    return this.repo.listActive();
  }

  get(symbol: OptionSymbol): ResultAsync<OptionPosition | null, RepositoryDbError> {
    return this.repo.get(symbol);
  }

  clear(): ResultAsync<number, RepositoryDbError> {
    return this.repo.clear().map(count => {
      logger.info("Positions cleared", { count });
      return count;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Current delta of a symbol; a symbol without one is an error.
   */
  private observeDelta(symbol: OptionSymbol): ResultAsync<number, PositionBookError> {
    return this.greeks
      .getDelta(symbol)
      .mapErr(
        (cause): PositionBookError => ({
          type: "MARKET_DATA_ERROR",
          message: `delta fetch failed for ${symbol}: ${cause.message}`,
          cause,
        }),
      )
      .andThen(delta =>
        delta === null
          ? errAsync<number, PositionBookError>({ type: "DELTA_UNAVAILABLE", message: `no delta available for ${symbol}` })
          : okAsync<number, PositionBookError>(delta),
      );
  }

  private async refreshEach(symbols: readonly OptionSymbol[]): Promise<DeltaRefreshSummary> {
    const summary: DeltaRefreshSummary = { updated: 0, failed: 0 };

    for (const symbol of symbols) {
      const result = await this.observeDelta(symbol).andThen(delta =>
        this.repo.updateDelta(symbol, { delta, at: this.now() }).map(() => delta),
      );

      if (result.isOk()) {
        summary.updated += 1;
        logger.debug("Delta refreshed", { symbol, delta: result.value });
      } else {
        summary.failed += 1;
        logger.warn("Delta refresh failed", { symbol, error: result.error.message });
      }
    }

    return summary;
  }
}
