// Parallel Research API
// Port: 3838 (localhost only by default)

// Load environment variables from .env file
import 'dotenv/config';

import { env, logConfiguration } from './env.js';
import { getLogger } from './logger.js';
import { buildServer } from './server.js';

const server = await buildServer({ dependencies: { logger: getLogger() } });

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  console.log(`Parallel Research API listening on http://${env.HOST}:${env.PORT}`);
  console.log(`Health: http://${env.HOST}:${env.PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
