import type { Address, Block, BlockId, ChainCursor, Coin, CoinId, LedgerSource, SyncReport } from "../interfaces";
import { GENESIS_ID, coinId, transactionId } from "../ledger/entities";
import { silentLogger, type Logger } from "../logger";
import { err, ok, type Result } from "../result";
import type { UtxoStore } from "./utxoStore";

/**
 * `undo-log` keeps one undo record per applied block and unwinds to the fork
 * point. `rescan` keeps none and replays from genesis on any mismatch.
 */
export type RollbackPolicy = "undo-log" | "rescan";

export interface SynchronizerOptions {
  rollbackPolicy?: RollbackPolicy;
  /** Undo records kept before the oldest is dropped. Unbounded by default. */
  undoDepth?: number;
  /** Rollback/rollforward rounds per call when the chain moves mid-pass. */
  maxPasses?: number;
  logger?: Logger;
}

interface UndoRecord {
  height: number;
  blockId: BlockId;
  parent: BlockId;
  inserted: CoinId[];
  removed: Array<[CoinId, Coin]>;
}

type Progress = Omit<SyncReport, "height" | "blockId">;

type Forward = "caught-up" | "diverged" | "interrupted";

const GENESIS_CURSOR: ChainCursor = { height: 0, blockId: GENESIS_ID };

export class Synchronizer {
  private cursor: ChainCursor = GENESIS_CURSOR;
  private undoLog: UndoRecord[] = [];
  private readonly policy: RollbackPolicy;
  private readonly undoDepth: number;
  private readonly maxPasses: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: UtxoStore,
    private readonly addresses: ReadonlySet<Address>,
    options: SynchronizerOptions = {},
  ) {
    this.policy = options.rollbackPolicy ?? "undo-log";
    this.undoDepth = options.undoDepth ?? Number.POSITIVE_INFINITY;
    this.maxPasses = options.maxPasses ?? 8;
    this.logger = options.logger ?? silentLogger;
  }

  get position(): ChainCursor {
    return this.cursor;
  }

  get undoRecords(): number {
    return this.undoLog.length;
  }

  async sync(ledger: LedgerSource): Promise<SyncReport> {
    const progress: Progress = { rolledBack: 0, applied: 0, rescanned: false, interrupted: false };
    let caughtUp = false;

    for (let pass = 0; pass < this.maxPasses; pass++) {
      if (!(await this.rollback(ledger, progress))) {
        progress.interrupted = true;
        break;
      }

      const forward = await this.rollforward(ledger, progress);
      if (forward === "interrupted") {
        progress.interrupted = true;
        break;
      }
      if (forward === "caught-up") {
        caughtUp = true;
        break;
      }

      this.logger.debug({ height: this.cursor.height, pass }, "canonical chain moved during sync, reconciling again");
    }

    if (!caughtUp && !progress.interrupted) {
      this.logger.warn({ height: this.cursor.height, passes: this.maxPasses }, "canonical chain kept moving, sync pass stopped");
      progress.interrupted = true;
    }

    const report: SyncReport = { height: this.cursor.height, blockId: this.cursor.blockId, ...progress };
    if (report.applied > 0 || report.rolledBack > 0 || report.rescanned) {
      this.logger.info(report, "wallet synced");
    } else {
      this.logger.debug(report, "wallet already at canonical tip");
    }
    return report;
  }

  /** Forget every applied block. The next sync replays from genesis. */
  reset(): void {
    this.store.clear();
    this.undoLog = [];
    this.cursor = GENESIS_CURSOR;
  }

  /** Resolves false when the ledger could not be queried. */
  private async rollback(ledger: LedgerSource, progress: Progress): Promise<boolean> {
    while (this.cursor.height > 0) {
      const height = this.cursor.height;
      const canonical = await this.query("bestBlockAtHeight", () => ledger.bestBlockAtHeight(height));
      if (!canonical.ok) return false;
      if (canonical.value === this.cursor.blockId) return true;

      const record = this.undoLog.pop();
      if (record === undefined || record.height !== height) {
        this.logger.info({ height, policy: this.policy }, "no undo record for diverged block, rescanning from genesis");
        progress.rolledBack += height;
        progress.rescanned = true;
        this.reset();
        return true;
      }

      this.revert(record);
      progress.rolledBack++;
    }
    return true;
  }

  private async rollforward(ledger: LedgerSource, progress: Progress): Promise<Forward> {
    for (;;) {
      const height = this.cursor.height + 1;
      const canonical = await this.query("bestBlockAtHeight", () => ledger.bestBlockAtHeight(height));
      if (!canonical.ok) return "interrupted";
      if (canonical.value === undefined) return "caught-up";

      const id = canonical.value;
      const fetched = await this.query("wholeBlock", () => ledger.wholeBlock(id));
      if (!fetched.ok) return "interrupted";
      if (fetched.value === undefined) {
        this.logger.warn({ height, blockId: id }, "ledger reported a canonical block it cannot serve");
        return "interrupted";
      }

      const block = fetched.value;
      if (block.parent !== this.cursor.blockId || block.number !== height) return "diverged";

      this.apply(block, id, height);
      progress.applied++;
    }
  }

  private apply(block: Block, id: BlockId, height: number): void {
    const inserted = new Set<CoinId>();
    const removed: Array<[CoinId, Coin]> = [];

    // Listed order matters: a transaction may spend an output of an earlier one in the same block.
    for (const tx of block.body) {
      for (const input of tx.inputs) {
        const spent = this.store.remove(input.coinId);
        if (spent === undefined) continue;
        if (inserted.has(input.coinId)) {
          inserted.delete(input.coinId);
        } else {
          removed.push([input.coinId, spent]);
        }
      }

      const txId = transactionId(tx);
      tx.outputs.forEach((coin, index) => {
        if (!this.addresses.has(coin.owner)) return;
        const outputId = coinId(txId, height, index);
        this.store.insert(outputId, coin);
        inserted.add(outputId);
      });
    }

    this.cursor = { height, blockId: id };

    if (this.policy === "undo-log") {
      this.undoLog.push({ height, blockId: id, parent: block.parent, inserted: [...inserted], removed });
      if (this.undoLog.length > this.undoDepth) this.undoLog.shift();
    }
  }

  private revert(record: UndoRecord): void {
    for (const id of record.inserted) this.store.remove(id);
    for (const [id, coin] of record.removed) this.store.insert(id, coin);
    this.cursor = { height: record.height - 1, blockId: record.parent };
  }

  private async query<T>(operation: string, request: () => Promise<T>): Promise<Result<T, unknown>> {
    try {
      return ok(await request());
    } catch (error) {
      this.logger.warn({ err: error, operation, height: this.cursor.height }, "ledger query failed, sync pass stopped");
      return err(error);
    }
  }
}
