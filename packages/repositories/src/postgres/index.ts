export { createPostgresOptionPositionRepository, toOptionPosition } from "./option-position-repository";
export { createPostgresHedgeOrderRepository, toHedgeOrderRecord } from "./hedge-order-repository";
