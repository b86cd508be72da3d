import { describe, expect, test } from "vitest";
import {
  GENESIS_BLOCK,
  GENESIS_ID,
  GENESIS_PARENT,
  blockId,
  coinId,
  createCoin,
  dummyInput,
  outputCoinIds,
  transactionId,
} from "../src/ledger/entities";
import { errorCode, mint } from "./helpers";

describe("entity identifiers", () => {
  test("transaction ids depend only on content", () => {
    const a = mint({ value: 10, owner: "alice" });
    const b = mint({ value: 10, owner: "alice" });
    const c = mint({ value: 11, owner: "alice" });

    expect(transactionId(a)).toBe(transactionId(b));
    expect(transactionId(a)).not.toBe(transactionId(c));
    expect(transactionId(a)).toMatch(/^[0-9a-f]{64}$/);
  });

  test("signatures are part of the transaction id", () => {
    const coin = dummyInput().coinId;
    const signed = { inputs: [{ coinId: coin, signature: { type: "valid" as const, address: "alice" } }], outputs: [] };
    const unsigned = { inputs: [{ coinId: coin, signature: { type: "invalid" as const } }], outputs: [] };

    expect(transactionId(signed)).not.toBe(transactionId(unsigned));
  });

  test("coin ids change with height and output index", () => {
    const txId = transactionId(mint({ value: 10, owner: "alice" }));

    expect(coinId(txId, 1, 0)).toBe(coinId(txId, 1, 0));
    expect(coinId(txId, 1, 0)).not.toBe(coinId(txId, 2, 0));
    expect(coinId(txId, 1, 0)).not.toBe(coinId(txId, 1, 1));
  });

  test("outputCoinIds lists one id per output in order", () => {
    const tx = mint({ value: 10, owner: "alice" }, { value: 20, owner: "bob" });
    const txId = transactionId(tx);

    expect(outputCoinIds(tx, 4)).toEqual([coinId(txId, 4, 0), coinId(txId, 4, 1)]);
  });

  test("block ids cover parent, number and body", () => {
    const empty = { parent: GENESIS_ID, number: 1, body: [] };
    const withTx = { parent: GENESIS_ID, number: 1, body: [mint({ value: 1, owner: "alice" })] };

    expect(blockId(empty)).toBe(blockId({ parent: GENESIS_ID, number: 1, body: [] }));
    expect(blockId(empty)).not.toBe(blockId(withTx));
    expect(blockId(empty)).not.toBe(blockId({ ...empty, number: 2 }));
  });

  test("genesis is fixed", () => {
    expect(GENESIS_BLOCK).toEqual({ parent: GENESIS_PARENT, number: 0, body: [] });
    expect(GENESIS_PARENT).toBe("0".repeat(64));
    expect(GENESIS_ID).toBe(blockId({ parent: "0".repeat(64), number: 0, body: [] }));
  });

  test("dummy inputs are stable and unsigned", () => {
    expect(dummyInput()).toEqual(dummyInput());
    expect(dummyInput().signature).toEqual({ type: "invalid" });
  });
});

describe("createCoin", () => {
  test("rejects zero value", () => {
    expect(errorCode(createCoin(0, "alice"))).toBe("ZERO_COIN_VALUE");
  });

  test("rejects negative and fractional values", () => {
    expect(errorCode(createCoin(-7, "alice"))).toBe("INVALID_AMOUNT");
    expect(errorCode(createCoin(2.5, "alice"))).toBe("INVALID_AMOUNT");
    expect(errorCode(createCoin(Number.NaN, "alice"))).toBe("INVALID_AMOUNT");
  });

  test("builds a coin", () => {
    expect(createCoin(5, "alice")).toEqual({ ok: true, value: { value: 5, owner: "alice" } });
  });
});
