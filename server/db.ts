import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

export type Database = NodePgDatabase<typeof schema>;
export type DatabasePool = InstanceType<typeof pg.Pool>;

// Connection string comes from the entrypoint's config; dotenv is not loaded here.
export function createDatabase(connectionString: string): { db: Database; pool: DatabasePool } {
  const pool = new pg.Pool({ connectionString });
  return { db: drizzle(pool, { schema }), pool };
}
