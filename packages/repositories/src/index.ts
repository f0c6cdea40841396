/**
 * packages/repositories - Shared Repository Layer
 *
 * - Interface-based repository pattern
 * - Postgres (drizzle) and in-memory implementations behind the same interfaces
 */

export * from "./interfaces";
export * from "./postgres";
export * from "./memory";
