/**
 * packages/db - DB connection helper
 *
 * `Pool` / `drizzle` の初期化を 1 箇所に集約します。
 * `connectionString` を渡せば schema が紐づいた `db` を返します。
 * 終了時は `closeDb(db)` で pool を閉じてください。
 */

import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import * as schema from "./schema";

export type Db = ReturnType<typeof drizzle<typeof schema>>;

export interface GetDbOptions {
  /** pool size (default 4: the hedger runs one cycle at a time) */
  maxConnections?: number;
}

export function getDb(connectionString: string, options: GetDbOptions = {}): Db {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString, max: options.maxConnections ?? 4 });
  return drizzle(pool, { schema });
}

export async function closeDb(db: Db): Promise<void> {
  await db.$client.end();
}
