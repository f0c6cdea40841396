export type { InMemoryRepositoryOptions } from "./option-position-repository";
export { createInMemoryOptionPositionRepository } from "./option-position-repository";
export { createInMemoryHedgeOrderRepository } from "./hedge-order-repository";
