import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  pool: pg.Pool;
}

export function connectDatabase(connectionString: string): DatabaseConnection {
  const pool = new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
  });
  pool.on("error", (err) => {
    console.error("Unexpected database pool error:", err);
  });
  const db = drizzle(pool, { schema });
  return { db, pool };
}
