/**
 * Lighter transaction signing
 *
 * Lighter orders are signed with the account's API key by the venue's signer
 * library, which has no npm distribution. The hedger talks to a signer
 * sidecar over HTTP instead and only submits the signed payload itself.
 *
 * Sidecar contract:
 *   POST {signerUrl}/sign/create-order  (JSON body below)
 *   → { "tx_type": number, "tx_info": string }
 */

import type { ResultAsync } from "neverthrow";
import { z } from "zod";

import { requestJson, toExecutionError, type FetchFn } from "../http/http-client";
import type { ExecutionError } from "../ports";

/**
 * Create-order parameters in Lighter integer units
 */
export interface LighterCreateOrder {
  marketIndex: number;
  clientOrderIndex: number;
  /** size × 10^sizeDecimals */
  baseAmount: number;
  /** worst price × 10^priceDecimals */
  price: number;
  isAsk: boolean;
}

export interface SignedTx {
  txType: number;
  txInfo: string;
}

export interface LighterTxSigner {
  signCreateOrder(order: LighterCreateOrder, signal?: AbortSignal): ResultAsync<SignedTx, ExecutionError>;
}

export interface HttpTxSignerConfig {
  signerUrl: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

const SignedTxResponseSchema = z.object({
  tx_type: z.number().int(),
  tx_info: z.string().min(1),
});

export class HttpTxSigner implements LighterTxSigner {
  private readonly config: HttpTxSignerConfig;

  constructor(config: HttpTxSignerConfig) {
    this.config = config;
  }

  signCreateOrder(order: LighterCreateOrder, signal?: AbortSignal): ResultAsync<SignedTx, ExecutionError> {
    const body = JSON.stringify({
      market_index: order.marketIndex,
      client_order_index: order.clientOrderIndex,
      base_amount: order.baseAmount,
      price: order.price,
      is_ask: order.isAsk,
      order_type: "market",
      time_in_force: "immediate_or_cancel",
      reduce_only: false,
    });

    return requestJson(this.config, `${this.config.signerUrl}/sign/create-order`, SignedTxResponseSchema, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
      signal,
    })
      .mapErr(toExecutionError)
      .map(res => ({ txType: res.tx_type, txInfo: res.tx_info }));
  }
}
