/**
 * Hedge Order Executor - Requirement → one market order
 *
 * - NONE → skipped, nothing sent
 * - size rounded to venue precision; zero after rounding → skipped, nothing sent
 * - worst price bounded by the tolerance band
 * - exactly one submission per call, never retried
 * - every submission outcome is journaled right after the venue responds
 *
 * The only component that changes venue account state.
 */

import { err, ResultAsync, type Result } from "neverthrow";
import { v4 as uuidv4 } from "uuid";
import {
  planHedgeOrder,
  type HedgeOrderRecord,
  type HedgeRequirement,
  type MarketPrecision,
  type Underlying,
} from "@delta-hedger/core";
import type { ExecutionError, ExecutionPort, MarketDataError, SpotMarketPort } from "@delta-hedger/adapters";
import { logger } from "@delta-hedger/utils";

import type { HedgeOrderJournal } from "./hedge-order-journal";

export type ExecutionSkipReason = "NO_ACTION" | "PRECISION_UNAVAILABLE" | "ROUNDED_TO_ZERO";

export type ExecutionOutcome =
  | { type: "skipped"; underlying: Underlying; reason: ExecutionSkipReason; message?: string }
  | { type: "submitted"; underlying: Underlying; record: HedgeOrderRecord }
  | { type: "failed"; underlying: Underlying; record: HedgeOrderRecord; error: ExecutionError };

export interface HedgeOrderExecutorConfig {
  priceTolerancePct: number;
  /** Upper bound on one venue submission */
  timeoutMs: number;
  now?: () => Date;
}

/**
 * Resolve a venue call as a timeout error when it does not settle in time.
 * The signal handed to `op` aborts at the deadline, so the adapter stops
 * before sending anything further.
 */
export function withTimeout<T>(
  op: (signal: AbortSignal) => ResultAsync<T, ExecutionError>,
  timeoutMs: number,
): ResultAsync<T, ExecutionError> {
  const deadline = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<Result<T, ExecutionError>>(resolve => {
    timer = setTimeout(() => {
      deadline.abort();
      resolve(err<T, ExecutionError>({ type: "timeout", message: `venue did not respond within ${String(timeoutMs)}ms` }));
    }, timeoutMs);
  });

  return new ResultAsync(
    Promise.race([op(deadline.signal), timeout]).finally(() => {
      clearTimeout(timer);
    }),
  );
}

export class HedgeOrderExecutor {
  private readonly market: SpotMarketPort;
  private readonly execution: ExecutionPort;
  private readonly journal: HedgeOrderJournal;
  private readonly config: HedgeOrderExecutorConfig;
  private readonly now: () => Date;

  constructor(
    market: SpotMarketPort,
    execution: ExecutionPort,
    journal: HedgeOrderJournal,
    config: HedgeOrderExecutorConfig,
  ) {
    this.market = market;
    this.execution = execution;
    this.journal = journal;
    this.config = config;
    this.now = config.now ?? (() => new Date());
  }

  async execute(requirement: HedgeRequirement): Promise<ExecutionOutcome> {
    const { underlying } = requirement;
    if (requirement.action.type === "NONE") {
      return { type: "skipped", underlying, reason: "NO_ACTION" };
    }

    const precision = await this.fetchPrecision(underlying);
    if (precision.isErr()) {
      logger.warn("Hedge order skipped: precision unavailable", { underlying, error: precision.error.message });
      return { type: "skipped", underlying, reason: "PRECISION_UNAVAILABLE", message: precision.error.message };
    }

    const plan = planHedgeOrder(requirement, precision.value, this.config.priceTolerancePct);
    if (plan.type === "SKIP") {
      logger.info("Hedge order skipped", {
        underlying,
        reason: plan.reason,
        amount: requirement.action.amount,
        sizeDecimals: precision.value.sizeDecimals,
      });
      return { type: "skipped", underlying, reason: plan.reason };
    }

    // Earlier records whose append failed go in first
    const stillPending = await this.journal.flush();
    if (stillPending > 0) {
      logger.warn("Hedge order records still pending persistence", { count: stillPending });
    }

    const decisionId = uuidv4();
    logger.info("Submitting hedge order", {
      decisionId,
      venue: this.execution.venue,
      symbol: underlying,
      side: plan.side,
      size: plan.size,
      referencePrice: plan.referencePrice,
      worstPrice: plan.worstPrice,
    });

    const result = await withTimeout(
      signal =>
        this.execution.submitMarketOrder({
          clientOrderId: decisionId,
          symbol: underlying,
          side: plan.side,
          size: plan.size,
          worstPrice: plan.worstPrice,
          sizeDecimals: precision.value.sizeDecimals,
          priceDecimals: precision.value.priceDecimals,
          signal,
        }),
      this.config.timeoutMs,
    );

    const record: HedgeOrderRecord = {
      id: uuidv4(),
      decisionId,
      ts: this.now(),
      venue: this.execution.venue,
      symbol: underlying,
      side: plan.side,
      quantity: plan.size,
      referencePrice: String(plan.referencePrice),
      worstPrice: plan.worstPrice,
      status: result.isOk() ? "submitted" : "failed",
      txId: result.isOk() ? result.value.txId : null,
      error: result.isErr() ? `${result.error.type}: ${result.error.message}` : null,
    };
    await this.journal.record(record);

    if (result.isErr()) {
      logger.error("Hedge order failed", { decisionId, symbol: underlying, error: record.error });
      return { type: "failed", underlying, record, error: result.error };
    }

    logger.info("Hedge order submitted", { decisionId, symbol: underlying, txId: result.value.txId });
    return { type: "submitted", underlying, record };
  }

  private async fetchPrecision(underlying: Underlying): Promise<Result<MarketPrecision, MarketDataError>> {
    const sizeDecimals = await this.market.getSizeDecimals(underlying);
    if (sizeDecimals.isErr()) return err(sizeDecimals.error);
    return (await this.market.getPriceDecimals(underlying)).map(priceDecimals => ({
      sizeDecimals: sizeDecimals.value,
      priceDecimals,
    }));
  }
}
