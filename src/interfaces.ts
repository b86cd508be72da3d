export type Address = string;

/** Hex SHA-256 digests. */
export type BlockId = string;
export type TransactionId = string;
export type CoinId = string;

export interface Coin {
  readonly value: number;
  readonly owner: Address;
}

/** Mock authorization tag. Nothing in the wallet verifies it. */
export type Signature =
  | { readonly type: "valid"; readonly address: Address }
  | { readonly type: "invalid" };

export interface Input {
  readonly coinId: CoinId;
  readonly signature: Signature;
}

export interface Transaction {
  readonly inputs: readonly Input[];
  readonly outputs: readonly Coin[];
}

export interface Block {
  readonly parent: BlockId;
  readonly number: number;
  readonly body: readonly Transaction[];
}

export interface CoinBalance {
  readonly coinId: CoinId;
  readonly value: number;
}

export interface ChainCursor {
  readonly height: number;
  readonly blockId: BlockId;
}

/**
 * Read-only view of a ledger's canonical chain.
 *
 * Resolving to `undefined` means the block does not exist. Rejecting means the
 * answer is currently unavailable.
 */
export interface LedgerSource {
  bestBlockAtHeight(height: number): Promise<BlockId | undefined>;
  wholeBlock(id: BlockId): Promise<Block | undefined>;
}

export interface SyncReport {
  height: number;
  blockId: BlockId;
  rolledBack: number;
  applied: number;
  rescanned: boolean;
  interrupted: boolean;
}
