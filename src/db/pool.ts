import { Pool, PoolConfig } from 'pg';
import { config } from '../config';
import { logger } from '../utils/logger';

if (!config.DB_CONNECTION_STRING) {
  throw new Error('DB_CONNECTION_STRING environment variable is required');
}

const poolConfig: PoolConfig = {
  connectionString: config.DB_CONNECTION_STRING,
  max: config.DB_POOL_MAX,
  idleTimeoutMillis: config.DB_POOL_IDLE_TIMEOUT,
  connectionTimeoutMillis: config.DB_POOL_CONNECTION_TIMEOUT,
};

export const pool = new Pool(poolConfig);

pool.on('error', (err) => {
  logger.fatal({ err }, 'unexpected error on idle database client');
  process.exit(-1);
});
