// Route dependencies
// Production wiring by default; tests pass their own provider and tools.

import type { FastifyReply } from 'fastify';
import type { Logger } from 'pino';
import { getProvider } from '../providers/index.js';
import type { Provider } from '../providers/types.js';
import { getLogger } from '../logger.js';
import { orchestratorSettingsFromEnv, type OrchestratorSettings } from '../services/orchestrator/settings.js';
import { createDefaultTools } from '../services/tools/index.js';
import type { ToolDefinition } from '../services/tools/types.js';
import { AppError, errorMessage, formatErrorResponse } from '../utils/errors.js';
import { env } from '../env.js';

export interface RouteDependencies {
  resolveProvider?: (name?: string, model?: string) => Provider;
  createTools?: () => ToolDefinition[];
  settings?: OrchestratorSettings;
  logger?: Logger;
}

export interface ResolvedDependencies {
  resolveProvider: (name?: string, model?: string) => Provider;
  createTools: () => ToolDefinition[];
  settings: OrchestratorSettings;
  logger: Logger;
}

export function resolveDependencies(deps: RouteDependencies): ResolvedDependencies {
  const logger = deps.logger ?? getLogger();
  return {
    resolveProvider: deps.resolveProvider ?? getProvider,
    createTools: deps.createTools ?? (() => createDefaultTools(logger)),
    settings: deps.settings ?? orchestratorSettingsFromEnv(logger),
    logger,
  };
}

export function providerFor(deps: ResolvedDependencies, name?: string, model?: string): Provider {
  try {
    return deps.resolveProvider(name, model);
  } catch (error) {
    throw AppError.providerUnavailable(errorMessage(error), { provider: name ?? 'default' });
  }
}

export function sendError(reply: FastifyReply, error: unknown, logger: Logger) {
  const appError = error instanceof AppError ? error : AppError.internal(errorMessage(error));
  if (appError.statusCode >= 500) {
    logger.error({ err: error }, 'Request failed');
  }
  return reply.code(appError.statusCode).send(formatErrorResponse(appError, env.NODE_ENV !== 'production'));
}
