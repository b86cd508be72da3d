import { z } from "zod";
import type { Block, BlockId } from "../interfaces";
import { TransactionSchema } from "../ledger/schemas";
import type { BlockRepository } from "./blockRepository";

/** The part of a pg `Pool` the repository uses. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const BlockRowSchema = z.object({
  parent: z.string(),
  height: z.number().int().nonnegative(),
  body: z.array(TransactionSchema),
});

const HeadRowSchema = z.object({ block_id: z.string() });

const AncestorRowSchema = z.object({ id: z.string() });

/** Block tree in PostgreSQL; see `db/schema.ts` for the tables. */
export class PgBlockRepository implements BlockRepository {
  constructor(private readonly pool: Queryable) {}

  async get(id: BlockId): Promise<Block | undefined> {
    const result = await this.pool.query('SELECT parent, height, body FROM blocks WHERE id = $1', [id]);
    if (result.rows.length === 0) return undefined;
    const row = BlockRowSchema.parse(result.rows[0]);
    return { parent: row.parent, number: row.height, body: row.body };
  }

  async put(id: BlockId, block: Block): Promise<void> {
    await this.pool.query(
      'INSERT INTO blocks (id, parent, height, body) VALUES ($1, $2, $3, $4) ON CONFLICT (id) DO NOTHING',
      [id, block.parent, block.number, JSON.stringify(block.body)]
    );
  }

  async bestId(): Promise<BlockId> {
    const result = await this.pool.query('SELECT block_id FROM chain_head WHERE singleton = TRUE');
    if (result.rows.length === 0) throw new Error("chain_head is empty; was the schema created?");
    return HeadRowSchema.parse(result.rows[0]).block_id;
  }

  async setBest(id: BlockId): Promise<void> {
    await this.pool.query('UPDATE chain_head SET block_id = $1, updated_at = NOW() WHERE singleton = TRUE', [id]);
  }

  async ancestorAt(tip: BlockId, height: number): Promise<BlockId | undefined> {
    const result = await this.pool.query(`
      WITH RECURSIVE ancestry AS (
        SELECT id, parent, height FROM blocks WHERE id = $1
        UNION ALL
        SELECT b.id, b.parent, b.height
        FROM blocks b
        JOIN ancestry a ON b.id = a.parent
        WHERE a.height > $2
      )
      SELECT id FROM ancestry WHERE height = $2
    `, [tip, height]);
    if (result.rows.length === 0) return undefined;
    return AncestorRowSchema.parse(result.rows[0]).id;
  }
}
