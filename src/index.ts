import type { Pool } from 'pg';
import { buildApp } from './app';
import { loadConfig } from './config';
import { initDb } from './db/pool';
import { createLogger } from './logger';
import { MemoryBlockRepository } from './node/blockRepository';
import { HttpLedgerSource } from './node/httpLedgerSource';
import { LedgerNode } from './node/ledgerNode';
import { PgBlockRepository } from './node/pgBlockRepository';
import { Wallet } from './wallet/wallet';

const bootLogger = createLogger('info', { component: 'boot' });
let pool: Pool | undefined;

try {
  const config = loadConfig();
  const logger = createLogger(config.LOG_LEVEL);

  if (config.DATABASE_URL) {
    pool = await initDb(config.DATABASE_URL);
  }
  const node = new LedgerNode(pool ? new PgBlockRepository(pool) : new MemoryBlockRepository());

  const ledger = config.LEDGER_URL
    ? new HttpLedgerSource({
        baseUrl: config.LEDGER_URL,
        timeoutMs: config.LEDGER_TIMEOUT_MS,
        retries: config.LEDGER_RETRIES,
        logger: logger.child({ component: 'ledger-client' }),
      })
    : node;

  const wallet = new Wallet(config.WALLET_ADDRESSES, {
    rollbackPolicy: config.ROLLBACK_POLICY,
    undoDepth: config.UNDO_DEPTH,
    logger: logger.child({ component: 'wallet' }),
  });

  const fastify = await buildApp({ node, wallet, ledger, logLevel: config.LOG_LEVEL });

  process.once('SIGTERM', () => {
    fastify.close()
      .then(() => pool?.end())
      .then(() => process.exit(0), (err) => {
        bootLogger.error({ err }, 'shutdown failed');
        process.exit(1);
      });
  });

  await fastify.listen({ port: config.PORT, host: config.HOST });
} catch (err) {
  bootLogger.error({ err }, 'startup failed');
  await pool?.end();
  process.exit(1);
}
