import fs from 'node:fs/promises';
import path from 'node:path';
import { Pool, types } from 'pg';

import type { Env } from '../env';

const PG_DATE_OID = 1082;

// Calendar days stay as YYYY-MM-DD strings instead of local-midnight Dates.
types.setTypeParser(PG_DATE_OID, (value: string) => value);

const SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'db', 'schema.sql');

export function createPool(env: Pick<Env, 'DATABASE_URL' | 'DATABASE_POOL_MAX'>) {
  return new Pool({
    connectionString: env.DATABASE_URL,
    max: env.DATABASE_POOL_MAX,
  });
}

export async function applySchema(pool: Pool) {
  const sql = await fs.readFile(SCHEMA_PATH, 'utf8');
  await pool.query(sql);
}
