import type { Block, BlockId, LedgerSource, Transaction } from "../interfaces";
import { blockId } from "../ledger/entities";
import { LedgerNodeError } from "../errors";
import { MemoryBlockRepository, type BlockRepository } from "./blockRepository";

export type LedgerQuery = "bestBlockAtHeight" | "wholeBlock";

/**
 * Counts ledger queries. Owned by whoever measures (usually a test), so the
 * node itself carries no mutable bookkeeping beyond its blocks.
 */
export class QueryCounter {
  private readonly counts: Record<LedgerQuery, number> = { bestBlockAtHeight: 0, wholeBlock: 0 };

  record(query: LedgerQuery): void {
    this.counts[query]++;
  }

  count(query?: LedgerQuery): number {
    return query ? this.counts[query] : this.counts.bestBlockAtHeight + this.counts.wholeBlock;
  }
}

export interface ChainEntry {
  id: BlockId;
  height: number;
}

/**
 * A block tree with a manually chosen best block.
 *
 * There is no fork choice: the best block only changes through `setBest`,
 * so a shorter branch can become canonical. Orphaned blocks stay fetchable.
 */
export class LedgerNode implements LedgerSource {
  constructor(
    private readonly repository: BlockRepository = new MemoryBlockRepository(),
    private readonly counter?: QueryCounter,
  ) {}

  async bestBlockAtHeight(height: number): Promise<BlockId | undefined> {
    this.counter?.record("bestBlockAtHeight");
    return this.repository.ancestorAt(await this.repository.bestId(), height);
  }

  async wholeBlock(id: BlockId): Promise<Block | undefined> {
    this.counter?.record("wholeBlock");
    return this.repository.get(id);
  }

  async addBlock(parent: BlockId, body: readonly Transaction[]): Promise<BlockId> {
    const parentBlock = await this.repository.get(parent);
    if (!parentBlock) {
      throw new LedgerNodeError(`Cannot build on unknown block ${parent}`);
    }

    const block: Block = { parent, number: parentBlock.number + 1, body };
    const id = blockId(block);
    await this.repository.put(id, block);
    return id;
  }

  async setBest(id: BlockId): Promise<void> {
    if (!(await this.repository.get(id))) {
      throw new LedgerNodeError(`Cannot mark unknown block ${id} as best`);
    }
    await this.repository.setBest(id);
  }

  async addBlockAsBest(parent: BlockId, body: readonly Transaction[]): Promise<BlockId> {
    const id = await this.addBlock(parent, body);
    await this.setBest(id);
    return id;
  }

  /** Height of a stored block, without counting as a ledger query. */
  async heightOf(id: BlockId): Promise<number | undefined> {
    return (await this.repository.get(id))?.number;
  }

  async bestId(): Promise<BlockId> {
    return this.repository.bestId();
  }

  /** Canonical chain from genesis to the best block. */
  async canonicalChain(): Promise<ChainEntry[]> {
    const chain: ChainEntry[] = [];
    let id = await this.repository.bestId();
    let block = await this.repository.get(id);
    while (block) {
      chain.push({ id, height: block.number });
      if (block.number === 0) break;
      id = block.parent;
      block = await this.repository.get(id);
    }
    return chain.reverse();
  }
}
