import type { Address, Coin, CoinId, Input, Transaction } from "../interfaces";
import { createCoin } from "../ledger/entities";
import { err, ok, type Result } from "../result";
import { WalletError, WalletErrorCode } from "../errors";
import { selectCoins, type Candidate } from "./coinSelection";
import { compareIds, type UtxoStore } from "./utxoStore";

/**
 * Builds spend transactions from the wallet's unspent coins.
 *
 * Reads the store, never writes it: a built transaction only affects the
 * wallet once it is included in a block and synced.
 */
export class TransactionBuilder {
  constructor(
    private readonly store: UtxoStore,
    private readonly addresses: ReadonlySet<Address>,
  ) {}

  createManual(inputCoinIds: readonly CoinId[], outputCoins: readonly Coin[]): Result<Transaction, WalletError> {
    if (inputCoinIds.length === 0) {
      return err(new WalletError(WalletErrorCode.ZeroInputs, "A transaction needs at least one input"));
    }

    const outputs: Coin[] = [];
    for (const coin of outputCoins) {
      const created = createCoin(coin.value, coin.owner);
      if (!created.ok) return created;
      outputs.push(created.value);
    }

    const inputs: Input[] = [];
    for (const coinId of inputCoinIds) {
      const coin = this.store.get(coinId);
      if (!coin) {
        return err(new WalletError(WalletErrorCode.UnknownCoin, `Coin ${coinId} is not in the wallet`, { coinId }));
      }
      inputs.push(signedInput(coinId, coin));
    }

    return ok({ inputs, outputs });
  }

  createAutomatic(recipient: Address, paymentAmount: number, tip: number): Result<Transaction, WalletError> {
    const payment = createCoin(paymentAmount, recipient);
    if (!payment.ok) return payment;
    if (!Number.isSafeInteger(tip) || tip < 0) {
      return err(new WalletError(WalletErrorCode.InvalidAmount, "Tip must be a non-negative integer", { tip }));
    }

    const required = paymentAmount + tip;
    const candidates: Candidate[] = this.store.entries().map(([coinId, coin]) => ({ coinId, coin }));
    const selection = selectCoins(candidates, required);
    if (!selection.sufficient) {
      return err(
        new WalletError(WalletErrorCode.InsufficientFunds, "Not enough funds for payment and tip", {
          required,
          available: selection.total,
        }),
      );
    }

    const outputs: Coin[] = [payment.value];
    const surplus = selection.total - required;
    if (surplus > 0) {
      const changeAddress = this.changeAddress();
      if (changeAddress === undefined) {
        return err(new WalletError(WalletErrorCode.NoOwnedAddresses, "No owned address to receive change"));
      }
      outputs.push({ value: surplus, owner: changeAddress });
    }

    return ok({
      inputs: selection.selected.map(({ coinId, coin }) => signedInput(coinId, coin)),
      outputs,
    });
  }

  private changeAddress(): Address | undefined {
    return [...this.addresses].sort(compareIds)[0];
  }
}

function signedInput(coinId: CoinId, coin: Coin): Input {
  return { coinId, signature: { type: "valid", address: coin.owner } };
}
