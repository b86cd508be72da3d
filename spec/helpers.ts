import type { Coin, CoinId, Transaction } from "../src/interfaces";
import { coinId, dummyInput, transactionId } from "../src/ledger/entities";
import type { Result } from "../src/result";
import type { WalletError } from "../src/errors";

/** A transaction that creates `outputs` out of nothing. */
export function mint(...outputs: Coin[]): Transaction {
  return { inputs: [dummyInput()], outputs };
}

/** Spends `coinIds` with invalid signatures; the wallet never checks them. */
export function spend(coinIds: CoinId[], outputs: Coin[]): Transaction {
  return {
    inputs: coinIds.map((id) => ({ coinId: id, signature: { type: "invalid" } })),
    outputs,
  };
}

/** Placed on the new side of a fork so the branches never hash alike. */
export function markerTx(): Transaction {
  return mint({ value: 123, owner: "marker" });
}

export function coinOf(tx: Transaction, height: number, index: number): CoinId {
  return coinId(transactionId(tx), height, index);
}

export function errorCode<T>(result: Result<T, WalletError>): string | undefined {
  return result.ok ? undefined : result.error.code;
}

export function hexId(char: string): string {
  return char.repeat(64);
}
