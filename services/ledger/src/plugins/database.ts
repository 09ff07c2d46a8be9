import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import type { Pool } from 'pg';

export interface DatabasePluginOptions {
  pool: Pool;
}

const databasePlugin: FastifyPluginAsync<DatabasePluginOptions> = async (fastify, opts) => {
  fastify.addHook('onClose', async (instance) => {
    instance.log.info('closing database pool');
    await opts.pool.end();
  });
};

export default fp(databasePlugin, {
  name: 'database-plugin',
});
