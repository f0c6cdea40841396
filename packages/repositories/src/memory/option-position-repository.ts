/**
 * In-memory Option Position Repository
 *
 * Used in paper mode without DATABASE_URL and in tests.
 * Netting runs synchronously between awaits, which makes each lot change atomic
 * on the single event loop.
 */

import { errAsync, okAsync } from "neverthrow";
import { netAddLot, netRemoveLot, type OptionPosition, type OptionSymbol } from "@delta-hedger/core";

import type { OptionPositionRepository } from "../interfaces/option-position-repository";

export interface InMemoryRepositoryOptions {
  now?: () => Date;
}

export function createInMemoryOptionPositionRepository(
  options: InMemoryRepositoryOptions = {},
): OptionPositionRepository {
  const now = options.now ?? (() => new Date());
  const rows = new Map<OptionSymbol, OptionPosition>();

  const snapshot = (p: OptionPosition): OptionPosition => ({ ...p });

  return {
    applyLot(symbol, signedQty, observation) {
      const current = rows.get(symbol) ?? null;
      const result = netAddLot(current?.quantity ?? null, signedQty);
      if (result.isErr()) return errAsync(result.error);

      const change = result.value;
      const ts = now();
      const deltaFields = observation ? { delta: observation.delta, deltaUpdatedAt: observation.at } : {};

      switch (change.type) {
        case "CREATED":
          rows.set(symbol, {
            symbol,
            quantity: change.quantity,
            delta: null,
            deltaUpdatedAt: null,
            ...deltaFields,
            createdAt: ts,
            updatedAt: ts,
          });
          break;
        case "UPDATED":
          if (current) rows.set(symbol, { ...current, quantity: change.quantity, ...deltaFields, updatedAt: ts });
          break;
        case "CLOSED":
          rows.delete(symbol);
          break;
      }
      return okAsync(change);
    },

    reduceLot(symbol, qty) {
      const current = rows.get(symbol) ?? null;
      const result = netRemoveLot(current?.quantity ?? null, qty);
      if (result.isErr()) return errAsync(result.error);

      const change = result.value;
      if (change.type === "CLOSED") {
        rows.delete(symbol);
      } else if (change.type === "UPDATED" && current) {
        rows.set(symbol, { ...current, quantity: change.quantity, updatedAt: now() });
      }
      return okAsync(change);
    },

    get(symbol) {
      const row = rows.get(symbol);
      return okAsync(row ? snapshot(row) : null);
    },

    listActive() {
      const list = [...rows.values()]
        .map(snapshot)
        .sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0));
      return okAsync(list);
    },

    updateDelta(symbol, observation) {
      const row = rows.get(symbol);
      if (!row) return okAsync(false);
      rows.set(symbol, { ...row, delta: observation.delta, deltaUpdatedAt: observation.at });
      return okAsync(true);
    },

    clear() {
      const count = rows.size;
      rows.clear();
      return okAsync(count);
    },
  };
}
