import type { Pool } from "pg";
import { GENESIS_BLOCK, GENESIS_ID } from "../ledger/entities";

export async function createTables(pool: Pool) {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS blocks (
      id TEXT PRIMARY KEY,
      parent TEXT NOT NULL,
      height INTEGER NOT NULL,
      body JSONB NOT NULL,
      created_at TIMESTAMP DEFAULT NOW()
    );
  `);

  await pool.query(`CREATE INDEX IF NOT EXISTS blocks_parent_idx ON blocks (parent);`);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS chain_head (
      singleton BOOLEAN PRIMARY KEY DEFAULT TRUE CHECK (singleton),
      block_id TEXT NOT NULL REFERENCES blocks(id),
      updated_at TIMESTAMP DEFAULT NOW()
    );
  `);

  await pool.query(
    'INSERT INTO blocks (id, parent, height, body) VALUES ($1, $2, $3, $4) ON CONFLICT (id) DO NOTHING',
    [GENESIS_ID, GENESIS_BLOCK.parent, GENESIS_BLOCK.number, JSON.stringify(GENESIS_BLOCK.body)]
  );
  await pool.query(
    'INSERT INTO chain_head (singleton, block_id) VALUES (TRUE, $1) ON CONFLICT (singleton) DO NOTHING',
    [GENESIS_ID]
  );
}
