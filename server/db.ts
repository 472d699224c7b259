import * as schema from "@shared/schema";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: pg.Pool;
  db: Database;
}

export function createDatabase(connectionString: string, production: boolean): DatabaseHandle {
  const pool = new Pool({
    connectionString,
    ssl: production ? { rejectUnauthorized: false } : false,
  });

  pool.on("error", (err) => {
    console.error("[DB] Idle client error:", err.message);
  });

  return { pool, db: drizzle(pool, { schema }) };
}
