// HTTP server assembly
// Routes are mounted under /v1; index.ts only listens.

import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { env } from './env.js';
import { agentRoutes } from './routes/agent.js';
import type { RouteDependencies } from './routes/dependencies.js';
import { providerRoutes } from './routes/providers.js';
import { researchRoutes } from './routes/research.js';

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];
  dependencies?: RouteDependencies;
}

export function defaultServerLogger(): FastifyServerOptions['logger'] {
  if (env.NODE_ENV === 'production') {
    return { level: env.LOG_LEVEL };
  }
  return {
    level: env.LOG_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

export async function buildServer(options: BuildServerOptions = {}) {
  const server = Fastify({
    logger: options.logger ?? defaultServerLogger(),
  });

  await server.register(cors, {
    origin: env.CORS_ORIGINS,
    credentials: true,
  });

  // Main health endpoint with /v1 prefix
  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    };
  });

  // Legacy redirect
  server.get('/health', async (_request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  const dependencies = options.dependencies ?? {};
  await server.register(providerRoutes, { prefix: '/v1' });
  await server.register(agentRoutes, { prefix: '/v1', ...dependencies });
  await server.register(researchRoutes, { prefix: '/v1', ...dependencies });

  return server;
}
