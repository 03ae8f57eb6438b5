import type { FastifyInstance } from 'fastify';
import { env } from '../env.js';
import { listProviders } from '../providers/index.js';

export async function providerRoutes(server: FastifyInstance) {
  // Public: presets with whether each one has credentials configured
  server.get('/providers', async () => {
    return {
      defaultProvider: env.DEFAULT_PROVIDER,
      providers: listProviders(),
    };
  });
}
