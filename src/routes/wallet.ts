import type { FastifyInstance } from "fastify";
import type { LedgerSource, Transaction } from "../interfaces";
import { transactionId } from "../ledger/entities";
import { AutomaticTransactionBodySchema, ManualTransactionBodySchema } from "../ledger/schemas";
import type { Wallet } from "../wallet/wallet";
import { sendInvalidRequest, sendWalletError } from "./replies";

function transactionReply(transaction: Transaction) {
  return { id: transactionId(transaction), transaction };
}

export async function registerWalletRoutes(app: FastifyInstance, wallet: Wallet, ledger: LedgerSource) {
  app.get('/wallet', async () => {
    return {
      height: wallet.bestHeight(),
      hash: wallet.bestHash(),
      netWorth: wallet.netWorth(),
      addresses: wallet.addresses(),
    };
  });

  app.get<{ Params: { address: string } }>('/wallet/coins/:address', async (request, reply) => {
    const { address } = request.params;
    const coins = wallet.allCoinsOf(address);
    if (!coins.ok) {
      return sendWalletError(reply, coins.error);
    }
    return { address, coins: coins.value };
  });

  app.get<{ Params: { coinId: string } }>('/wallet/coin/:coinId', async (request, reply) => {
    const coin = wallet.coinDetails(request.params.coinId);
    if (!coin.ok) {
      return sendWalletError(reply, coin.error);
    }
    return coin.value;
  });

  app.post('/wallet/sync', async (_request, reply) => {
    try {
      return await wallet.sync(ledger);
    } catch (error) {
      app.log.error({ err: error }, 'wallet sync failed');
      return reply.status(500).send({ error: 'Sync failed', details: String(error) });
    }
  });

  app.post('/wallet/transactions/manual', async (request, reply) => {
    const body = ManualTransactionBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendInvalidRequest(reply, body.error);
    }

    const transaction = wallet.createManualTransaction(body.data.inputs, body.data.outputs);
    if (!transaction.ok) {
      return sendWalletError(reply, transaction.error);
    }
    return transactionReply(transaction.value);
  });

  app.post('/wallet/transactions/automatic', async (request, reply) => {
    const body = AutomaticTransactionBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendInvalidRequest(reply, body.error);
    }

    const { recipient, amount, tip } = body.data;
    const transaction = wallet.createAutomaticTransaction(recipient, amount, tip);
    if (!transaction.ok) {
      return sendWalletError(reply, transaction.error);
    }
    return transactionReply(transaction.value);
  });
}
