import type { Address, Coin, CoinBalance, CoinId } from "../interfaces";

/**
 * Unspent coins owned by tracked addresses, keyed by coin id.
 *
 * Derived state: the synchronizer is the only writer, and everything in here
 * can be rebuilt by replaying the canonical chain from genesis.
 */
export class UtxoStore {
  private readonly coins = new Map<CoinId, Coin>();

  get size(): number {
    return this.coins.size;
  }

  insert(id: CoinId, coin: Coin): void {
    this.coins.set(id, coin);
  }

  remove(id: CoinId): Coin | undefined {
    const coin = this.coins.get(id);
    if (coin !== undefined) {
      this.coins.delete(id);
    }
    return coin;
  }

  get(id: CoinId): Coin | undefined {
    return this.coins.get(id);
  }

  has(id: CoinId): boolean {
    return this.coins.has(id);
  }

  /** Sorted by coin id. */
  valuesOwnedBy(address: Address): CoinBalance[] {
    const owned: CoinBalance[] = [];
    for (const [coinId, coin] of this.coins) {
      if (coin.owner === address) owned.push({ coinId, value: coin.value });
    }
    return owned.sort((a, b) => compareIds(a.coinId, b.coinId));
  }

  sumOwnedBy(address: Address): number {
    let total = 0;
    for (const coin of this.coins.values()) {
      if (coin.owner === address) total += coin.value;
    }
    return total;
  }

  total(): number {
    let total = 0;
    for (const coin of this.coins.values()) total += coin.value;
    return total;
  }

  entries(): Array<[CoinId, Coin]> {
    return [...this.coins.entries()];
  }

  clear(): void {
    this.coins.clear();
  }
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
