/**
 * Port interfaces for adapters
 *
 * - Defines venue-agnostic interfaces
 * - Adapters implement these ports
 */

export type { InventoryPort, MarketDataError, OptionGreeksPort, SpotMarketPort } from "./market-data-port";

export type {
  ExecutionError,
  ExecutionPort,
  MarketOrderAck,
  MarketOrderRequest,
  OrderSide,
} from "./execution-port";
