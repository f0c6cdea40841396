/**
 * Lot Netting Unit Tests
 *
 * - add nets long and short contracts into one signed quantity
 * - remove always moves toward zero and never crosses it
 */

import { describe, expect, test } from "vitest";

import { netAddLot, netRemoveLot } from "../src/lot-netting";

describe("netAddLot", () => {
  test("creates a lot for a new symbol", () => {
    expect(netAddLot(null, -2)._unsafeUnwrap()).toEqual({ type: "CREATED", quantity: -2 });
  });

  test("adds to an existing lot", () => {
    expect(netAddLot(3, 2)._unsafeUnwrap()).toEqual({ type: "UPDATED", previousQuantity: 3, quantity: 5 });
  });

  test("opposite side reduces and can flip the lot", () => {
    expect(netAddLot(3, -5)._unsafeUnwrap()).toEqual({ type: "UPDATED", previousQuantity: 3, quantity: -2 });
  });

  test("closes the lot when the sum is zero", () => {
    expect(netAddLot(-4, 4)._unsafeUnwrap()).toEqual({ type: "CLOSED", previousQuantity: -4 });
  });

  test("rejects zero and fractional quantities", () => {
    expect(netAddLot(1, 0)._unsafeUnwrapErr().type).toBe("INVALID_QUANTITY");
    expect(netAddLot(1, 1.5)._unsafeUnwrapErr().type).toBe("INVALID_QUANTITY");
  });
});

describe("netRemoveLot", () => {
  test("reduces a long lot", () => {
    expect(netRemoveLot(5, 2)._unsafeUnwrap()).toEqual({ type: "UPDATED", previousQuantity: 5, quantity: 3 });
  });

  test("reduces a short lot toward zero", () => {
    expect(netRemoveLot(-5, 2)._unsafeUnwrap()).toEqual({ type: "UPDATED", previousQuantity: -5, quantity: -3 });
  });

  test("closes the lot on a full removal", () => {
    expect(netRemoveLot(-2, 2)._unsafeUnwrap()).toEqual({ type: "CLOSED", previousQuantity: -2 });
  });

  test("refuses to remove more than held", () => {
    expect(netRemoveLot(2, 3)._unsafeUnwrapErr()).toEqual({
      type: "EXCEEDS_POSITION",
      message: "cannot remove 3 contracts, only 2 held",
    });
  });

  test("fails for a missing lot", () => {
    expect(netRemoveLot(null, 1)._unsafeUnwrapErr().type).toBe("NOT_FOUND");
  });

  test("rejects non-positive quantities", () => {
    expect(netRemoveLot(3, 0)._unsafeUnwrapErr().type).toBe("INVALID_QUANTITY");
    expect(netRemoveLot(3, -1)._unsafeUnwrapErr().type).toBe("INVALID_QUANTITY");
  });
});
