// Schema
export * from "./schema";

// Connection helper (Node-only)
export { getDb, closeDb } from "./get-db";
export type { Db } from "./get-db";
