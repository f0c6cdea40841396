/**
 * HedgeOrderExecutor Unit Tests
 *
 * Fake venue + in-memory journal.
 */

import { errAsync, ResultAsync, type Result } from "neverthrow";
import { beforeEach, describe, expect, it } from "vitest";
import type { MarketOrderAck, ExecutionError } from "@delta-hedger/adapters";
import { createInMemoryHedgeOrderRepository } from "@delta-hedger/repositories";

import { HedgeOrderExecutor, withTimeout } from "../../src/services/hedge-order-executor";
import { HedgeOrderJournal } from "../../src/services/hedge-order-journal";
import { FakeExecution, FakeMarket, requirement } from "./fakes";

const NOW = new Date("2025-01-15T12:00:00.000Z");

describe("HedgeOrderExecutor", () => {
  let market: FakeMarket;
  let venue: FakeExecution;
  let journal: HedgeOrderJournal;
  let executor: HedgeOrderExecutor;

  beforeEach(() => {
    market = new FakeMarket({ SOL: 150 });
    venue = new FakeExecution();
    journal = new HedgeOrderJournal(createInMemoryHedgeOrderRepository());
    executor = new HedgeOrderExecutor(market, venue, journal, {
      priceTolerancePct: 1,
      timeoutMs: 1_000,
      now: () => NOW,
    });
  });

  it("does nothing for a requirement without action", async () => {
    const outcome = await executor.execute(requirement({ thresholdMet: false, action: { type: "NONE" } }));

    expect(outcome).toEqual({ type: "skipped", underlying: "SOL", reason: "NO_ACTION" });
    expect(venue.requests).toEqual([]);
  });

  it("submits a bounded buy and journals it", async () => {
    const outcome = await executor.execute(requirement());

    expect(venue.requests).toHaveLength(1);
    const request = venue.requests[0];
    expect(request).toMatchObject({
      symbol: "SOL",
      side: "buy",
      size: "2.00",
      worstPrice: "151.50",
      sizeDecimals: 2,
      priceDecimals: 2,
    });

    expect(outcome.type).toBe("submitted");
    const records = (await journal.listRecent(10))._unsafeUnwrap();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      decisionId: request?.clientOrderId,
      ts: NOW,
      venue: "fake",
      symbol: "SOL",
      side: "buy",
      quantity: "2.00",
      referencePrice: "150",
      worstPrice: "151.50",
      status: "submitted",
      txId: "tx-1",
      error: null,
    });
  });

  it("floors the price of a sell", async () => {
    await executor.execute(
      requirement({ positionDiff: -0.333, action: { type: "SELL", amount: 0.333 }, spotPrice: 99.99 }),
    );

    // 99.99 × 0.99 = 98.9901, rounded up toward the reference
    expect(venue.requests[0]).toMatchObject({ side: "sell", size: "0.33", worstPrice: "99.00" });
  });

  it("skips an amount that rounds to zero without submitting or journaling", async () => {
    const outcome = await executor.execute(requirement({ action: { type: "BUY", amount: 0.004 } }));

    expect(outcome).toEqual({ type: "skipped", underlying: "SOL", reason: "ROUNDED_TO_ZERO" });
    expect(venue.requests).toEqual([]);
    expect((await journal.listRecent(10))._unsafeUnwrap()).toEqual([]);
  });

  it("skips when the venue precision is unavailable", async () => {
    market.precisionError = { type: "not_found", message: "no market for SOL" };

    const outcome = await executor.execute(requirement());

    expect(outcome).toEqual({
      type: "skipped",
      underlying: "SOL",
      reason: "PRECISION_UNAVAILABLE",
      message: "no market for SOL",
    });
    expect(venue.requests).toEqual([]);
  });

  it("journals a venue rejection as failed", async () => {
    venue.respondWith(() => errAsync({ type: "insufficient_balance" as const, message: "not enough USDC" }));

    const outcome = await executor.execute(requirement());

    expect(outcome.type).toBe("failed");
    const [stored] = (await journal.listRecent(10))._unsafeUnwrap();
    expect(stored?.status).toBe("failed");
    expect(stored?.txId).toBeNull();
    expect(stored?.error).toBe("insufficient_balance: not enough USDC");
  });

  it("fails a submission that outlives the timeout and does not retry", async () => {
    const slow = new HedgeOrderExecutor(market, venue, journal, { priceTolerancePct: 1, timeoutMs: 20 });
    venue.respondWith(() => new ResultAsync(new Promise<Result<MarketOrderAck, ExecutionError>>(() => undefined)));

    const outcome = await slow.execute(requirement());

    expect(outcome.type).toBe("failed");
    if (outcome.type === "failed") {
      expect(outcome.error).toEqual({ type: "timeout", message: "venue did not respond within 20ms" });
    }
    expect(venue.requests).toHaveLength(1);
    // the adapter was told to stop at the deadline
    expect(venue.requests[0]?.signal?.aborted).toBe(true);
  });

  it("uses a fresh decision id per submission", async () => {
    await executor.execute(requirement());
    await executor.execute(requirement());

    const ids = venue.requests.map(r => r.clientOrderId);
    expect(new Set(ids).size).toBe(2);
    expect((await journal.listRecent(10))._unsafeUnwrap()).toHaveLength(2);
  });
});

describe("withTimeout", () => {
  it("passes through a result that settles in time", async () => {
    const ack: MarketOrderAck = { txId: "tx-9", ts: NOW };
    const op = ResultAsync.fromSafePromise<MarketOrderAck, ExecutionError>(Promise.resolve(ack));

    expect((await withTimeout(() => op, 1_000))._unsafeUnwrap()).toBe(ack);
  });

  it("aborts the signal handed to the call at the deadline", async () => {
    let seen: AbortSignal | undefined;
    const result = await withTimeout<MarketOrderAck>(signal => {
      seen = signal;
      return new ResultAsync(new Promise<Result<MarketOrderAck, ExecutionError>>(() => undefined));
    }, 10);

    expect(result._unsafeUnwrapErr().type).toBe("timeout");
    expect(seen?.aborted).toBe(true);
  });

  it("leaves the signal alone when the call settles in time", async () => {
    let seen: AbortSignal | undefined;
    const op = ResultAsync.fromSafePromise<MarketOrderAck, ExecutionError>(Promise.resolve({ txId: "tx-1", ts: NOW }));

    await withTimeout(signal => {
      seen = signal;
      return op;
    }, 1_000);

    expect(seen?.aborted).toBe(false);
  });
});
