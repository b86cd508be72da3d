import type { FastifyInstance } from "fastify";
import type { Wallet } from "../wallet/wallet";

export async function registerResetRoutes(app: FastifyInstance, wallet: Wallet) {
  app.post('/reset', async (_request, reply) => {
    try {
      await wallet.reset();

      return {
        status: 'Reset successful',
        height: wallet.bestHeight(),
        hash: wallet.bestHash(),
        netWorth: wallet.netWorth(),
      };
    } catch (error) {
      app.log.error({ err: error }, 'wallet reset failed');
      return reply.status(500).send({ error: 'Reset failed', details: String(error) });
    }
  });
}
