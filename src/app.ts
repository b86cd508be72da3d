import Fastify, { type FastifyInstance } from 'fastify';
import type { LedgerSource } from './interfaces';
import type { LogLevel } from './logger';
import type { LedgerNode } from './node/ledgerNode';
import type { Wallet } from './wallet/wallet';
import { registerRootRoutes } from './routes/root';
import { registerLedgerRoutes } from './routes/ledger';
import { registerBalanceRoutes } from './routes/balance';
import { registerWalletRoutes } from './routes/wallet';
import { registerResetRoutes } from './routes/reset';

export interface AppDependencies {
  node: LedgerNode;
  wallet: Wallet;
  /** What the wallet syncs against: the local node or a remote ledger. */
  ledger: LedgerSource;
  logLevel?: LogLevel;
}

export async function buildApp({ node, wallet, ledger, logLevel = 'silent' }: AppDependencies): Promise<FastifyInstance> {
  const app = Fastify({ logger: logLevel === 'silent' ? false : { level: logLevel } });

  await registerRootRoutes(app);
  await registerLedgerRoutes(app, node);
  await registerBalanceRoutes(app, wallet);
  await registerWalletRoutes(app, wallet, ledger);
  await registerResetRoutes(app, wallet);

  return app;
}
