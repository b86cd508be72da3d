import { setTimeout as delay } from "timers/promises";
import type { Block, BlockId, LedgerSource } from "../interfaces";
import { BestBlockResponseSchema, BlockSchema } from "../ledger/schemas";
import { LedgerUnavailableError } from "../errors";
import { silentLogger, type Logger } from "../logger";

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface HttpLedgerSourceOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** Extra attempts after the first failure. */
  retries?: number;
  retryDelayMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Ledger source backed by a node's `/ledger` routes.
 *
 * A 404 is an answer ("no such block"). Anything else that is not a 200 is a
 * failure: retried, then surfaced as `LedgerUnavailableError` so the wallet
 * stops its sync pass instead of mistaking an outage for a shorter chain.
 */
export class HttpLedgerSource implements LedgerSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly fetch: FetchLike;
  private readonly logger: Logger;

  constructor(options: HttpLedgerSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 200;
    this.fetch = options.fetch ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  async bestBlockAtHeight(height: number): Promise<BlockId | undefined> {
    const body = await this.getJson(`/ledger/best/${height}`);
    if (body === undefined) return undefined;
    return BestBlockResponseSchema.parse(body).blockId;
  }

  async wholeBlock(id: BlockId): Promise<Block | undefined> {
    const body = await this.getJson(`/ledger/blocks/${encodeURIComponent(id)}`);
    if (body === undefined) return undefined;
    return BlockSchema.parse(body);
  }

  private async getJson(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (attempt > 0 && this.retryDelayMs > 0) await delay(this.retryDelayMs);
      try {
        const response = await this.fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
        if (response.status === 404) return undefined;
        if (response.ok) return await response.json();
        lastError = new Error(`GET ${path} answered ${response.status}`);
      } catch (error) {
        lastError = error;
      }
      this.logger.debug({ url, attempt, err: lastError }, "ledger request failed");
    }

    throw new LedgerUnavailableError(`Ledger at ${this.baseUrl} did not answer GET ${path}`, lastError);
  }
}
