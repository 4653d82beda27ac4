import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { config } from './config';
import { certificateRoutes } from './routes/certificates';
import type { IntakeService } from './services/pipeline/intake';

export interface BuildAppOptions {
  intake: IntakeService;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const server = Fastify({
    logger: config.NODE_ENV === 'test' ? false : { level: config.LOG_LEVEL },
    bodyLimit: 1048576,
  });

  server.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      const json: unknown = body === '' ? {} : JSON.parse(body.toString());
      done(null, json);
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)), undefined);
    }
  });

  await server.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
  await server.register(helmet, { global: true });

  await server.register(certificateRoutes, { intake: options.intake });

  server.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  return server;
}
