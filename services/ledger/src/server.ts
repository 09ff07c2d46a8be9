import { buildApp } from './app';
import { applySchema, createPool } from './db/pool';
import { env } from './env';

async function start() {
  const pool = createPool(env);
  const app = await buildApp({ pool });

  try {
    await applySchema(pool);
    await app.listen({ port: env.PORT, host: env.HOST });
    app.log.info(`ledger service listening on port ${env.PORT}`);
  } catch (error) {
    app.log.error(error, 'failed to start ledger service');
    process.exitCode = 1;
    await app.close();
  }
}

void start();
