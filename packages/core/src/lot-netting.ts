/**
 * Lot Netting - Pure rules for adding to / reducing an option lot
 *
 * Stores call these inside their per-symbol critical section so that
 * the read-modify-write of a lot is atomic.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

/**
 * Outcome of netting a change against the stored quantity
 */
export type LotChange =
  | { type: "CREATED"; quantity: number }
  | { type: "UPDATED"; previousQuantity: number; quantity: number }
  | { type: "CLOSED"; previousQuantity: number };

export type LotError =
  | { type: "INVALID_QUANTITY"; message: string }
  | { type: "NOT_FOUND"; message: string }
  | { type: "EXCEEDS_POSITION"; message: string };

/**
 * Net a signed quantity into the current lot.
 *
 * @param current - stored quantity, or null when the symbol has no lot
 * @param signedQty - positive adds long contracts, negative adds short contracts
 */
export function netAddLot(current: number | null, signedQty: number): Result<LotChange, LotError> {
  if (!Number.isInteger(signedQty) || signedQty === 0) {
    return err({ type: "INVALID_QUANTITY", message: `quantity must be a non-zero integer: ${String(signedQty)}` });
  }

  if (current === null) {
    return ok({ type: "CREATED", quantity: signedQty });
  }

  const next = current + signedQty;
  if (next === 0) {
    return ok({ type: "CLOSED", previousQuantity: current });
  }
  return ok({ type: "UPDATED", previousQuantity: current, quantity: next });
}

/**
 * Close `qty` contracts of the current lot, moving it toward zero
 * whichever side it is on.
 */
export function netRemoveLot(current: number | null, qty: number): Result<LotChange, LotError> {
  if (!Number.isInteger(qty) || qty <= 0) {
    return err({ type: "INVALID_QUANTITY", message: `quantity must be a positive integer: ${String(qty)}` });
  }

  if (current === null) {
    return err({ type: "NOT_FOUND", message: "no active position" });
  }

  const held = Math.abs(current);
  if (qty > held) {
    return err({
      type: "EXCEEDS_POSITION",
      message: `cannot remove ${String(qty)} contracts, only ${String(held)} held`,
    });
  }

  const next = current > 0 ? current - qty : current + qty;
  if (next === 0) {
    return ok({ type: "CLOSED", previousQuantity: current });
  }
  return ok({ type: "UPDATED", previousQuantity: current, quantity: next });
}
