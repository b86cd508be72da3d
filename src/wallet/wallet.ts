import type { Address, BlockId, Coin, CoinBalance, CoinId, LedgerSource, SyncReport, Transaction } from "../interfaces";
import { silentLogger, type Logger } from "../logger";
import { err, ok, type Result } from "../result";
import { WalletError, WalletErrorCode } from "../errors";
import { Synchronizer, type RollbackPolicy } from "./synchronizer";
import { TransactionBuilder } from "./transactionBuilder";
import { UtxoStore, compareIds } from "./utxoStore";

export interface WalletOptions {
  rollbackPolicy?: RollbackPolicy;
  undoDepth?: number;
  logger?: Logger;
}

/**
 * A light wallet over a set of tracked addresses.
 *
 * Queries answer from local state as of the last sync; only `sync` talks to a
 * ledger. Concurrent `sync` and `reset` calls run one after another.
 */
export class Wallet {
  private readonly tracked: ReadonlySet<Address>;
  private readonly store = new UtxoStore();
  private readonly synchronizer: Synchronizer;
  private readonly builder: TransactionBuilder;
  private tail: Promise<void> = Promise.resolve();

  constructor(addresses: Iterable<Address>, options: WalletOptions = {}) {
    this.tracked = new Set(addresses);
    const logger = options.logger ?? silentLogger;
    this.synchronizer = new Synchronizer(this.store, this.tracked, {
      rollbackPolicy: options.rollbackPolicy,
      undoDepth: options.undoDepth,
      logger,
    });
    this.builder = new TransactionBuilder(this.store, this.tracked);
  }

  addresses(): Address[] {
    return [...this.tracked].sort(compareIds);
  }

  bestHeight(): number {
    return this.synchronizer.position.height;
  }

  bestHash(): BlockId {
    return this.synchronizer.position.blockId;
  }

  totalAssetsOf(address: Address): Result<number, WalletError> {
    if (!this.tracked.has(address)) return foreignAddress(address);
    return ok(this.store.sumOwnedBy(address));
  }

  netWorth(): number {
    return this.store.total();
  }

  allCoinsOf(address: Address): Result<CoinBalance[], WalletError> {
    if (!this.tracked.has(address)) return foreignAddress(address);
    return ok(this.store.valuesOwnedBy(address));
  }

  coinDetails(id: CoinId): Result<Coin, WalletError> {
    const coin = this.store.get(id);
    if (!coin) {
      return err(new WalletError(WalletErrorCode.UnknownCoin, `Coin ${id} is not in the wallet`, { coinId: id }));
    }
    return ok(coin);
  }

  createManualTransaction(inputCoinIds: readonly CoinId[], outputCoins: readonly Coin[]): Result<Transaction, WalletError> {
    return this.builder.createManual(inputCoinIds, outputCoins);
  }

  createAutomaticTransaction(recipient: Address, paymentAmount: number, tip: number): Result<Transaction, WalletError> {
    return this.builder.createAutomatic(recipient, paymentAmount, tip);
  }

  sync(ledger: LedgerSource): Promise<SyncReport> {
    return this.enqueue(() => this.synchronizer.sync(ledger));
  }

  /** Drops all synced state once pending syncs finish; the next sync starts from genesis. */
  reset(): Promise<void> {
    return this.enqueue(() => this.synchronizer.reset());
  }

  private enqueue<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The caller sees a failure through `run`; the queue only needs to know it settled.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

function foreignAddress(address: Address): Result<never, WalletError> {
  return err(new WalletError(WalletErrorCode.ForeignAddress, `Address ${address} is not tracked by this wallet`, { address }));
}
