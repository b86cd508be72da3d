import { Pool } from "pg";
import { createTables } from "./schema";

export async function initDb(databaseUrl: string): Promise<Pool> {
  const pool = new Pool({ connectionString: databaseUrl });
  try {
    await createTables(pool);
  } catch (error) {
    await pool.end();
    throw error;
  }
  return pool;
}
