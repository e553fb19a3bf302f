// HTTP server assembly; src/index.ts starts it, tests inject into it

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { answerRoutes } from './routes/answer.js';
import { toolRoutes } from './routes/tools.js';
import type { QuestionAnswerer } from './services/orchestrator/index.js';
import { toolRegistry, type ToolRegistry } from './services/tools/index.js';

export const API_VERSION = '1.0.0';

export interface BuildServerOptions {
  answerer: QuestionAnswerer;
  registry?: ToolRegistry;
  logger?: FastifyServerOptions['logger'];
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: options.logger ?? false });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    };
  });

  await server.register(answerRoutes, { prefix: '/v1', answerer: options.answerer });
  await server.register(toolRoutes, { prefix: '/v1', registry: options.registry ?? toolRegistry });

  return server;
}
