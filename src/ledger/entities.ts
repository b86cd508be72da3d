import { createHash } from "crypto";
import type { Block, BlockId, Coin, CoinId, Input, Signature, Transaction, TransactionId } from "../interfaces";
import { err, ok, type Result } from "../result";
import { WalletError, WalletErrorCode } from "../errors";

// Ids hash JSON arrays, never objects, so key order cannot change a digest.

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

function signatureTuple(signature: Signature): [string, string] {
  return signature.type === "valid" ? ["valid", signature.address] : ["invalid", ""];
}

function transactionTuple(tx: Transaction) {
  return [
    tx.inputs.map((input) => [input.coinId, signatureTuple(input.signature)]),
    tx.outputs.map((coin) => [coin.value, coin.owner]),
  ];
}

export function transactionId(tx: Transaction): TransactionId {
  return sha256(JSON.stringify(transactionTuple(tx)));
}

export function coinId(txId: TransactionId, blockHeight: number, outputIndex: number): CoinId {
  return sha256(JSON.stringify([txId, blockHeight, outputIndex]));
}

/** Ids of the coins `tx` creates when included at `blockHeight`, in output order. */
export function outputCoinIds(tx: Transaction, blockHeight: number): CoinId[] {
  const txId = transactionId(tx);
  return tx.outputs.map((_, index) => coinId(txId, blockHeight, index));
}

export function blockId(block: Block): BlockId {
  return sha256(JSON.stringify([block.parent, block.number, block.body.map(transactionTuple)]));
}

export const GENESIS_PARENT: BlockId = "0".repeat(64);

export const GENESIS_BLOCK: Block = Object.freeze({
  parent: GENESIS_PARENT,
  number: 0,
  body: Object.freeze([]),
});

export const GENESIS_ID: BlockId = blockId(GENESIS_BLOCK);

const DUMMY_COIN_ID: CoinId = sha256("dummy-input");

/** An input spending a coin nobody owns, for minting coins in fixtures. */
export function dummyInput(): Input {
  return { coinId: DUMMY_COIN_ID, signature: { type: "invalid" } };
}

export function createCoin(value: number, owner: string): Result<Coin, WalletError> {
  if (value === 0) {
    return err(new WalletError(WalletErrorCode.ZeroCoinValue, "Coin value must be greater than zero", { owner }));
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    return err(new WalletError(WalletErrorCode.InvalidAmount, "Coin value must be a positive integer", { owner, value }));
  }
  return ok({ value, owner });
}
