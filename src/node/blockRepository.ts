import type { Block, BlockId } from "../interfaces";
import { GENESIS_BLOCK, GENESIS_ID } from "../ledger/entities";

/**
 * Storage for a block tree plus the id of the block currently marked best.
 * Every stored block except genesis has its parent stored too.
 */
export interface BlockRepository {
  get(id: BlockId): Promise<Block | undefined>;
  put(id: BlockId, block: Block): Promise<void>;
  bestId(): Promise<BlockId>;
  setBest(id: BlockId): Promise<void>;
  /** Id of the ancestor of `tip` (or `tip` itself) at `height`. */
  ancestorAt(tip: BlockId, height: number): Promise<BlockId | undefined>;
}

export class MemoryBlockRepository implements BlockRepository {
  private readonly blocks = new Map<BlockId, Block>([[GENESIS_ID, GENESIS_BLOCK]]);
  private best: BlockId = GENESIS_ID;

  async get(id: BlockId): Promise<Block | undefined> {
    return this.blocks.get(id);
  }

  async put(id: BlockId, block: Block): Promise<void> {
    this.blocks.set(id, block);
  }

  async bestId(): Promise<BlockId> {
    return this.best;
  }

  async setBest(id: BlockId): Promise<void> {
    this.best = id;
  }

  async ancestorAt(tip: BlockId, height: number): Promise<BlockId | undefined> {
    let id = tip;
    let block = this.blocks.get(id);
    if (!block || height > block.number) return undefined;

    while (block.number !== height) {
      id = block.parent;
      const parent = this.blocks.get(id);
      if (!parent) return undefined;
      block = parent;
    }
    return id;
  }
}
