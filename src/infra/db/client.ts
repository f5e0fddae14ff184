import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Builds both typed ORM and raw SQL clients; the raw client serves health checks and shutdown.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, {
    max: 10,
    connect_timeout: 10,
  });
  const db = drizzle(sql);
  return { db, sql };
};
