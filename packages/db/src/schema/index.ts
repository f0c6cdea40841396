/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - timestamptz(UTC) everywhere
 */

// Option book (1行/シンボル)
export * from "./option-position";

// Hedge order journal (append-only)
export * from "./hedge-order";
