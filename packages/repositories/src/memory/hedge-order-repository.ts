/**
 * In-memory Hedge Order Repository
 */

import { okAsync } from "neverthrow";
import type { HedgeOrderRecord } from "@delta-hedger/core";

import type { HedgeOrderRepository } from "../interfaces/hedge-order-repository";

export function createInMemoryHedgeOrderRepository(): HedgeOrderRepository {
  const records: HedgeOrderRecord[] = [];
  const decisionIds = new Set<string>();

  return {
    append(record) {
      if (!decisionIds.has(record.decisionId)) {
        decisionIds.add(record.decisionId);
        records.push({ ...record });
      }
      return okAsync(undefined);
    },

    listRecent(limit) {
      // Stable for equal timestamps: later appends first
      const ordered = records
        .map((record, index) => ({ record, index }))
        .sort((a, b) => b.record.ts.getTime() - a.record.ts.getTime() || b.index - a.index)
        .slice(0, Math.max(0, limit))
        .map(({ record }) => ({ ...record }));
      return okAsync(ordered);
    },
  };
}
