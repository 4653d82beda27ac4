import { config } from './config';
import { buildApp } from './app';
import { pool } from './db/pool';
import { PgJobStore } from './db/job-store';
import { createIntakeService, createPipelineDependencies, registerPipelineHandler } from './services/pipeline';
import { logger } from './utils/logger';

async function start() {
  const store = new PgJobStore();
  registerPipelineHandler(createPipelineDependencies(store));
  const server = await buildApp({ intake: createIntakeService(store) });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'shutting down');
    await server.close();
    await pool.end();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await pool.query('SELECT NOW()');
    logger.info('connected to PostgreSQL database');

    const interrupted = await store.failInterruptedRuns();
    if (interrupted > 0) {
      logger.warn({ interrupted }, 'runs left active by a previous process marked FAILED');
    }

    await server.listen({ port: config.PORT, host: config.HOST });
  } catch (err) {
    logger.fatal({ err }, 'server failed to start');
    await pool.end();
    process.exit(1);
  }
}

void start();
