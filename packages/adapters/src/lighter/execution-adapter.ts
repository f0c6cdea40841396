/**
 * Lighter Execution Adapter
 *
 * - Market order (IOC) with a worst execution price
 * - Scales decimal size / price into Lighter integer units
 * - Signs through LighterTxSigner, submits via POST {baseUrl}/api/v1/sendTx
 * - Nothing is sent once the request's signal has aborted
 * - Venue error messages mapped onto ExecutionError
 */

import Decimal from "decimal.js";
import { Result, errAsync, okAsync, type ResultAsync } from "neverthrow";

import { requestJson, toExecutionError } from "../http/http-client";
import type { ExecutionError, ExecutionPort, MarketOrderAck, MarketOrderRequest } from "../ports";
import type { LighterTxSigner } from "./tx-signer";
import { SendTxResponseSchema, type LighterConfig, type SendTxResponse } from "./types";

// 48 bits of the id keep the index inside Number.MAX_SAFE_INTEGER
const CLIENT_ORDER_INDEX_HEX_CHARS = 12;

/**
 * Derive Lighter's integer client order index from a UUID client order id.
 * The same id always yields the same index.
 */
export function clientOrderIndexOf(clientOrderId: string): number {
  const hex = clientOrderId.replace(/[^0-9a-f]/gi, "");
  if (hex.length >= CLIENT_ORDER_INDEX_HEX_CHARS) {
    return Number.parseInt(hex.slice(0, CLIENT_ORDER_INDEX_HEX_CHARS), 16);
  }

  // FNV-1a for ids that are not hex
  let hash = 0x811c9dc5;
  for (let i = 0; i < clientOrderId.length; i++) {
    hash ^= clientOrderId.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Scale a decimal string to integer units (e.g. "0.50" with 2 decimals → 50).
 */
export const toScaledInteger = Result.fromThrowable(
  (value: string, decimals: number): number => {
    const scaled = new Decimal(value).times(new Decimal(10).pow(decimals));
    if (!scaled.isInteger() || scaled.lte(0)) {
      throw new Error(`${value} is not a positive multiple of 1e-${String(decimals)}`);
    }
    return scaled.toNumber();
  },
  (error): ExecutionError => ({
    type: "invalid_order",
    message: error instanceof Error ? error.message : String(error),
  }),
);

/**
 * Map a non-200 sendTx response onto ExecutionError.
 */
export function mapSendTxError(res: SendTxResponse): ExecutionError {
  const message = res.message ?? `sendTx code ${String(res.code)}`;
  const lower = message.toLowerCase();

  if (res.code === 429 || lower.includes("rate limit") || lower.includes("too many")) {
    return { type: "rate_limit", message };
  }
  if (lower.includes("insufficient") || lower.includes("not enough")) {
    return { type: "insufficient_balance", message };
  }
  if (lower.includes("signature") || lower.includes("api key") || lower.includes("nonce")) {
    return { type: "auth", message };
  }
  if (lower.includes("invalid") || lower.includes("price") || lower.includes("amount")) {
    return { type: "invalid_order", message };
  }
  return { type: "exchange_error", message, code: String(res.code) };
}

export class LighterExecutionAdapter implements ExecutionPort {
  readonly venue = "lighter";

  private readonly config: LighterConfig;
  private readonly signer: LighterTxSigner;
  private readonly now: () => Date;

  constructor(config: LighterConfig, signer: LighterTxSigner, now: () => Date = () => new Date()) {
    this.config = config;
    this.signer = signer;
    this.now = now;
  }

  submitMarketOrder(request: MarketOrderRequest): ResultAsync<MarketOrderAck, ExecutionError> {
    const marketIndex = this.config.marketIds[request.symbol.toUpperCase()];
    if (marketIndex === undefined) {
      return errAsync({ type: "invalid_order" as const, message: `no Lighter market configured for ${request.symbol}` });
    }

    const scaled = Result.combine([
      toScaledInteger(request.size, request.sizeDecimals),
      toScaledInteger(request.worstPrice, request.priceDecimals),
    ]);
    if (scaled.isErr()) {
      return errAsync(scaled.error);
    }
    const [baseAmount, price] = scaled.value;

    const { signal } = request;
    return this.signer
      .signCreateOrder(
        {
          marketIndex,
          clientOrderIndex: clientOrderIndexOf(request.clientOrderId),
          baseAmount,
          price,
          isAsk: request.side === "sell",
        },
        signal,
      )
      .andThen(signed => {
        // A signature that arrives after the deadline is dropped unsent
        if (signal?.aborted) {
          return errAsync<SendTxResponse, ExecutionError>({
            type: "timeout",
            message: "deadline passed after signing; order not sent",
          });
        }
        return requestJson(this.config, `${this.config.baseUrl}/api/v1/sendTx`, SendTxResponseSchema, {
          method: "POST",
          headers: { "Content-Type": "application/x-www-form-urlencoded" },
          body: new URLSearchParams({ tx_type: String(signed.txType), tx_info: signed.txInfo }).toString(),
          signal,
        }).mapErr(toExecutionError);
      })
      .andThen(res => {
        if (res.code !== 200) {
          return errAsync<MarketOrderAck, ExecutionError>(mapSendTxError(res));
        }
        if (!res.tx_hash) {
          return errAsync<MarketOrderAck, ExecutionError>({ type: "unknown", message: "sendTx returned no tx_hash" });
        }
        return okAsync<MarketOrderAck, ExecutionError>({ txId: res.tx_hash, ts: this.now() });
      });
  }
}
