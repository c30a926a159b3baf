import cors from '@fastify/cors';
import Fastify, { type FastifyInstance } from 'fastify';

import type { NoteStore } from '../core/repository-factory.js';
import type { Logger } from '../utils/logger.js';
import { registerRoutes } from './routes.js';

/**
 * Build the notes HTTP service around an initialized store. The caller owns
 * `listen()` and `close()`.
 */
export async function buildServer(store: NoteStore, logger: Logger): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // Using pino logger directly
  });

  await app.register(cors, {
    origin: true,
  });

  await registerRoutes(app, store, logger.child({ component: 'http' }));

  return app;
}
