/**
 * OptionPositionRepository Unit Tests
 *
 * In-memory implementation plus the Postgres row mapping.
 */

import { beforeEach, describe, expect, it } from "vitest";

import type { OptionPositionRepository } from "../src/interfaces";
import { createInMemoryOptionPositionRepository } from "../src/memory";
import * as postgres from "../src/postgres";
import { toOptionPosition } from "../src/postgres";

const T0 = new Date("2025-01-15T00:00:00.000Z");
const T1 = new Date("2025-01-15T00:01:00.000Z");

describe("InMemoryOptionPositionRepository", () => {
  let repo: OptionPositionRepository;
  let clock: Date;

  beforeEach(() => {
    clock = T0;
    repo = createInMemoryOptionPositionRepository({ now: () => clock });
  });

  it("creates a lot with the observed delta", async () => {
    const change = await repo.applyLot("SOL-USD-215-C", -2, { delta: 0.4, at: T0 });

    expect(change._unsafeUnwrap()).toEqual({ type: "CREATED", quantity: -2 });
    expect((await repo.get("SOL-USD-215-C"))._unsafeUnwrap()).toEqual({
      symbol: "SOL-USD-215-C",
      quantity: -2,
      delta: 0.4,
      deltaUpdatedAt: T0,
      createdAt: T0,
      updatedAt: T0,
    });
  });

  it("nets an add against the existing lot and keeps createdAt", async () => {
    await repo.applyLot("SOL-USD-215-C", -2, { delta: 0.4, at: T0 });
    clock = T1;

    await repo.applyLot("SOL-USD-215-C", 5, { delta: 0.42, at: T1 });

    const position = (await repo.get("SOL-USD-215-C"))._unsafeUnwrap();
    expect(position?.quantity).toBe(3);
    expect(position?.delta).toBe(0.42);
    expect(position?.createdAt).toEqual(T0);
    expect(position?.updatedAt).toEqual(T1);
  });

  it("deletes a lot that nets to zero", async () => {
    await repo.applyLot("BTC-USD-100000-C", 1);

    const change = await repo.applyLot("BTC-USD-100000-C", -1);

    expect(change._unsafeUnwrap()).toEqual({ type: "CLOSED", previousQuantity: 1 });
    expect((await repo.get("BTC-USD-100000-C"))._unsafeUnwrap()).toBeNull();
    expect((await repo.listActive())._unsafeUnwrap()).toEqual([]);
  });

  it("reduces toward zero and refuses to over-remove", async () => {
    await repo.applyLot("ETH-USD-4000-P", -3);

    expect((await repo.reduceLot("ETH-USD-4000-P", 1))._unsafeUnwrap()).toEqual({
      type: "UPDATED",
      previousQuantity: -3,
      quantity: -2,
    });
    expect((await repo.reduceLot("ETH-USD-4000-P", 5))._unsafeUnwrapErr().type).toBe("EXCEEDS_POSITION");
    expect((await repo.get("ETH-USD-4000-P"))._unsafeUnwrap()?.quantity).toBe(-2);
  });

  it("reports a missing lot on remove", async () => {
    expect((await repo.reduceLot("ETH-USD-4000-P", 1))._unsafeUnwrapErr().type).toBe("NOT_FOUND");
  });

  it("lists positions ordered by symbol", async () => {
    await repo.applyLot("SOL-USD-200-C", 1);
    await repo.applyLot("BTC-USD-100000-C", 1);
    await repo.applyLot("ETH-USD-4000-C", 1);

    const symbols = (await repo.listActive())._unsafeUnwrap().map(p => p.symbol);
    expect(symbols).toEqual(["BTC-USD-100000-C", "ETH-USD-4000-C", "SOL-USD-200-C"]);
  });

  it("updates the cached delta of an existing lot only", async () => {
    await repo.applyLot("SOL-USD-200-C", 1);

    expect((await repo.updateDelta("SOL-USD-200-C", { delta: 0.3, at: T1 }))._unsafeUnwrap()).toBe(true);
    expect((await repo.updateDelta("SOL-USD-999-C", { delta: 0.3, at: T1 }))._unsafeUnwrap()).toBe(false);

    const position = (await repo.get("SOL-USD-200-C"))._unsafeUnwrap();
    expect(position?.delta).toBe(0.3);
    expect(position?.deltaUpdatedAt).toEqual(T1);
  });

  it("returns copies, not live rows", async () => {
    await repo.applyLot("SOL-USD-200-C", 1);

    const first = (await repo.get("SOL-USD-200-C"))._unsafeUnwrap();
    if (first) first.quantity = 99;

    expect((await repo.get("SOL-USD-200-C"))._unsafeUnwrap()?.quantity).toBe(1);
  });

  it("clears every position", async () => {
    await repo.applyLot("SOL-USD-200-C", 1);
    await repo.applyLot("BTC-USD-100000-C", -1);

    expect((await repo.clear())._unsafeUnwrap()).toBe(2);
    expect((await repo.listActive())._unsafeUnwrap()).toEqual([]);
  });

  it("applies concurrent lot changes one at a time", async () => {
    const results = await Promise.all([
      repo.applyLot("SOL-USD-215-C", 3),
      repo.reduceLot("SOL-USD-215-C", 2),
      repo.applyLot("SOL-USD-215-C", 1),
      repo.reduceLot("SOL-USD-215-C", 2),
    ]);

    expect(results.map(r => r._unsafeUnwrap())).toEqual([
      { type: "CREATED", quantity: 3 },
      { type: "UPDATED", previousQuantity: 3, quantity: 1 },
      { type: "UPDATED", previousQuantity: 1, quantity: 2 },
      { type: "CLOSED", previousQuantity: 2 },
    ]);
    expect((await repo.get("SOL-USD-215-C"))._unsafeUnwrap()).toBeNull();
  });
});

describe("Postgres option position mapping", () => {
  it("exports createPostgresOptionPositionRepository", () => {
    expect(typeof postgres.createPostgresOptionPositionRepository).toBe("function");
  });

  it("parses the numeric delta column", () => {
    const row = {
      symbol: "BTC-USD-90000-P",
      quantity: -1,
      delta: "-0.2500",
      deltaUpdatedAt: T0,
      createdAt: T0,
      updatedAt: T1,
    };

    expect(toOptionPosition(row)).toEqual({ ...row, delta: -0.25 });
    expect(toOptionPosition({ ...row, delta: null }).delta).toBeNull();
  });
});
