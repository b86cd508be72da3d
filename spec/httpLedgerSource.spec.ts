import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../src/app";
import { LedgerUnavailableError } from "../src/errors";
import { GENESIS_ID } from "../src/ledger/entities";
import { HttpLedgerSource, type FetchLike } from "../src/node/httpLedgerSource";
import { LedgerNode } from "../src/node/ledgerNode";
import { Wallet } from "../src/wallet/wallet";
import { hexId, mint } from "./helpers";

const BASE_URL = "http://ledger.test";

describe("HttpLedgerSource", () => {
  let node: LedgerNode;
  let app: FastifyInstance;
  let requested: string[];

  /** Routes requests into the in-process app; the first `failures` answer 503. */
  function throughApp(failures = 0): FetchLike {
    let remaining = failures;
    return async (url) => {
      requested.push(url);
      if (remaining > 0) {
        remaining--;
        return new Response(null, { status: 503 });
      }
      const response = await app.inject({ method: "GET", url: new URL(url).pathname });
      return new Response(response.body, { status: response.statusCode });
    };
  }

  beforeEach(async () => {
    node = new LedgerNode();
    app = await buildApp({ node, wallet: new Wallet([]), ledger: node });
    requested = [];
  });

  afterEach(async () => {
    await app.close();
  });

  test("answers the same as the node it fronts", async () => {
    const b1 = await node.addBlockAsBest(GENESIS_ID, [mint({ value: 5, owner: "alice" })]);
    const source = new HttpLedgerSource({ baseUrl: `${BASE_URL}/`, fetch: throughApp(), retryDelayMs: 0 });

    expect(await source.bestBlockAtHeight(1)).toBe(b1);
    expect(await source.wholeBlock(b1)).toEqual(await node.wholeBlock(b1));
    expect(requested).toEqual([`${BASE_URL}/ledger/best/1`, `${BASE_URL}/ledger/blocks/${b1}`]);
  });

  test("maps 404 to a missing block", async () => {
    const source = new HttpLedgerSource({ baseUrl: BASE_URL, fetch: throughApp(), retryDelayMs: 0 });

    expect(await source.bestBlockAtHeight(7)).toBeUndefined();
    expect(await source.wholeBlock(hexId("e"))).toBeUndefined();
    expect(requested).toHaveLength(2);
  });

  test("retries a failed request", async () => {
    const source = new HttpLedgerSource({ baseUrl: BASE_URL, fetch: throughApp(1), retryDelayMs: 0 });

    expect(await source.bestBlockAtHeight(0)).toBe(GENESIS_ID);
    expect(requested).toHaveLength(2);
  });

  test("gives up after the retry budget", async () => {
    const source = new HttpLedgerSource({ baseUrl: BASE_URL, fetch: throughApp(10), retries: 2, retryDelayMs: 0 });

    await expect(source.bestBlockAtHeight(0)).rejects.toBeInstanceOf(LedgerUnavailableError);
    expect(requested).toHaveLength(3);
  });

  test("keeps the last network error as the cause", async () => {
    const refused = new TypeError("fetch failed");
    const source = new HttpLedgerSource({
      baseUrl: BASE_URL,
      retries: 0,
      fetch: async () => {
        throw refused;
      },
    });

    const failure = await source.wholeBlock(GENESIS_ID).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(LedgerUnavailableError);
    expect(failure instanceof Error ? failure.cause : undefined).toBe(refused);
  });

  test("rejects answers that do not match the block format", async () => {
    const source = new HttpLedgerSource({
      baseUrl: BASE_URL,
      fetch: async () => new Response(JSON.stringify({ height: 1, blockId: "nope" }), { status: 200 }),
    });

    await expect(source.bestBlockAtHeight(1)).rejects.toThrow();
  });

  test("a wallet syncs through it", async () => {
    const b1 = await node.addBlockAsBest(GENESIS_ID, [mint({ value: 5, owner: "alice" })]);
    const b2 = await node.addBlockAsBest(b1, [mint({ value: 6, owner: "alice" })]);
    const wallet = new Wallet(["alice"]);

    const report = await wallet.sync(new HttpLedgerSource({ baseUrl: BASE_URL, fetch: throughApp(), retryDelayMs: 0 }));

    expect(report).toEqual({ height: 2, blockId: b2, rolledBack: 0, applied: 2, rescanned: false, interrupted: false });
    expect(wallet.totalAssetsOf("alice")).toEqual({ ok: true, value: 11 });
  });

  test("a wallet reports an unreachable ledger as an interrupted sync", async () => {
    await node.addBlockAsBest(GENESIS_ID, []);
    const wallet = new Wallet(["alice"]);
    const source = new HttpLedgerSource({ baseUrl: BASE_URL, fetch: throughApp(10), retries: 1, retryDelayMs: 0 });

    const report = await wallet.sync(source);

    expect(report).toEqual({
      height: 0,
      blockId: GENESIS_ID,
      rolledBack: 0,
      applied: 0,
      rescanned: false,
      interrupted: true,
    });
    expect(requested).toHaveLength(2);
  });
});

