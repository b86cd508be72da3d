export const WalletErrorCode = {
  ForeignAddress: "FOREIGN_ADDRESS",
  UnknownCoin: "UNKNOWN_COIN",
  NoOwnedAddresses: "NO_OWNED_ADDRESSES",
  InsufficientFunds: "INSUFFICIENT_FUNDS",
  ZeroCoinValue: "ZERO_COIN_VALUE",
  ZeroInputs: "ZERO_INPUTS",
  InvalidAmount: "INVALID_AMOUNT",
} as const;

export type WalletErrorCode = (typeof WalletErrorCode)[keyof typeof WalletErrorCode];

export class WalletError extends Error {
  readonly code: WalletErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: WalletErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "WalletError";
    this.code = code;
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return { code: this.code, error: this.message, details: this.details };
  }
}

/** Raised by a ledger node asked to build on, or point at, a block it does not hold. */
export class LedgerNodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LedgerNodeError";
  }
}

/** A remote ledger did not answer within its timeout and retry budget. */
export class LedgerUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "LedgerUnavailableError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
