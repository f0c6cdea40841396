/**
 * Repository Interfaces
 */

export type {
  DeltaObservation,
  OptionPositionRepository,
  OptionPositionRepositoryError,
  RepositoryDbError,
} from "./option-position-repository";
export type { HedgeOrderRepository } from "./hedge-order-repository";
