import { describe, expect, test } from "vitest";

import { PaperVenue } from "../src/paper/paper-venue";

const order = {
  clientOrderId: "decision-1",
  symbol: "SOL",
  side: "buy" as const,
  size: "0.50",
  worstPrice: "151.50",
  sizeDecimals: 2,
  priceDecimals: 2,
};

describe("PaperVenue", () => {
  test("fills market orders into the simulated inventory", async () => {
    const venue = new PaperVenue({ ETH: -1 });

    await venue.submitMarketOrder(order);
    await venue.submitMarketOrder({ ...order, clientOrderId: "decision-2", side: "sell", size: "0.20" });

    expect((await venue.getInventory("SOL"))._unsafeUnwrap()).toBe(0.3);
    expect((await venue.getInventory("eth"))._unsafeUnwrap()).toBe(-1);
    expect((await venue.getInventory("BTC"))._unsafeUnwrap()).toBe(0);
  });

  test("acknowledges with a paper tx id and records the fill", async () => {
    const venue = new PaperVenue();

    const ack = (await venue.submitMarketOrder(order))._unsafeUnwrap();

    expect(ack.txId).toMatch(/^paper-[0-9a-f-]{36}$/);
    expect(venue.getFills()).toEqual([
      {
        clientOrderId: "decision-1",
        symbol: "SOL",
        side: "buy",
        size: "0.50",
        worstPrice: "151.50",
        txId: ack.txId,
        ts: ack.ts,
      },
    ]);
  });

  test("rejects a non-positive size", async () => {
    const venue = new PaperVenue();

    const result = await venue.submitMarketOrder({ ...order, size: "0" });

    expect(result._unsafeUnwrapErr().type).toBe("invalid_order");
    expect(venue.getFills()).toHaveLength(0);
  });

  test("sends nothing once the deadline has passed", async () => {
    const venue = new PaperVenue();
    const deadline = new AbortController();
    deadline.abort();

    const result = await venue.submitMarketOrder({ ...order, signal: deadline.signal });

    expect(result._unsafeUnwrapErr()).toEqual({ type: "timeout", message: "deadline passed; order not sent" });
    expect(venue.getFills()).toEqual([]);
    expect((await venue.getInventory("SOL"))._unsafeUnwrap()).toBe(0);
  });
});
