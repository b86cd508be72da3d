import type { Coin, CoinId } from "../interfaces";
import { compareIds } from "./utxoStore";

export interface Candidate {
  coinId: CoinId;
  coin: Coin;
}

export interface CoinSelection {
  selected: Candidate[];
  total: number;
  sufficient: boolean;
}

/**
 * Greedy smallest-first selection until `target` is reached.
 * Ties on value are broken by coin id so the same store always yields the same pick.
 */
export function selectCoins(candidates: readonly Candidate[], target: number): CoinSelection {
  const sorted = [...candidates].sort(
    (a, b) => a.coin.value - b.coin.value || compareIds(a.coinId, b.coinId),
  );

  const selected: Candidate[] = [];
  let total = 0;
  for (const candidate of sorted) {
    if (total >= target) break;
    selected.push(candidate);
    total += candidate.coin.value;
  }

  return { selected, total, sufficient: total >= target };
}
