/**
 * packages/adapters - Venue Adapters
 *
 * - Port interfaces for venue-agnostic hedging
 * - Paradex (option greeks), Lighter (spot market, account, execution)
 * - Paper venue for simulated execution
 */

// Port interfaces
export * from "./ports";

// HTTP plumbing
export type { FetchFn, HttpClientOptions, HttpError } from "./http/http-client";
export { requestJson, toExecutionError, toMarketDataError } from "./http/http-client";
export { parseNumeric } from "./http/numeric";

// Paradex
export type { ParadexGreeksConfig, ParadexMarketSummary } from "./paradex/greeks-adapter";
export { DEFAULT_PARADEX_BASE_URL, ParadexGreeksAdapter } from "./paradex/greeks-adapter";

// Lighter
export type { LighterAccountConfig, LighterConfig } from "./lighter/types";
export { DEFAULT_LIGHTER_BASE_URL, DEFAULT_LIGHTER_MARKET_IDS, MarketIdsSchema } from "./lighter/types";
export { LighterMarketAdapter } from "./lighter/market-adapter";
export { LighterAccountAdapter } from "./lighter/account-adapter";
export type { HttpTxSignerConfig, LighterCreateOrder, LighterTxSigner, SignedTx } from "./lighter/tx-signer";
export { HttpTxSigner } from "./lighter/tx-signer";
export { LighterExecutionAdapter, clientOrderIndexOf, mapSendTxError, toScaledInteger } from "./lighter/execution-adapter";

// Paper
export type { PaperFill } from "./paper/paper-venue";
export { PaperVenue } from "./paper/paper-venue";
