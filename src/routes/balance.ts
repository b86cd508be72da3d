import type { FastifyInstance } from "fastify";
import type { Wallet } from "../wallet/wallet";
import { sendWalletError } from "./replies";

export async function registerBalanceRoutes(app: FastifyInstance, wallet: Wallet) {
  app.get<{ Params: { address: string } }>('/balance/:address', async (request, reply) => {
    const { address } = request.params;
    const balance = wallet.totalAssetsOf(address);
    if (!balance.ok) {
      return sendWalletError(reply, balance.error);
    }
    return { address, balance: balance.value };
  });
}
