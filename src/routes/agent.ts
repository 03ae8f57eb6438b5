// Agent route
// Runs a single agent loop for one input, without decomposition or synthesis.

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AgentLoop } from '../services/agent/agent-loop.js';
import { AppError, ProviderCallError } from '../utils/errors.js';
import { providerFor, resolveDependencies, sendError, type RouteDependencies } from './dependencies.js';

const AgentRunSchema = z.object({
  input: z.string().trim().min(1, 'Input is required').max(20000),
  provider: z.string().trim().min(1).optional(),
  model: z.string().trim().min(1).optional(),
  tools: z.boolean().optional().default(true),
  maxIterations: z.number().int().min(1).max(50).optional(),
});

export async function agentRoutes(server: FastifyInstance, options: RouteDependencies) {
  const deps = resolveDependencies(options);

  // POST /v1/agent/run
  server.post('/agent/run', async (request, reply) => {
    const parsed = AgentRunSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, AppError.validationError('Invalid request body', parsed.error.flatten()), deps.logger);
    }
    const body = parsed.data;

    try {
      const provider = providerFor(deps, body.provider, body.model);
      const loop = new AgentLoop({
        provider,
        tools: body.tools ? deps.createTools() : [],
        systemPrompt: deps.settings.systemPrompt,
        maxIterations: body.maxIterations ?? deps.settings.maxIterations,
        noToolStreakThreshold: deps.settings.finalizeAfterNoToolStreak,
        deduplication: deps.settings.deduplication,
        logger: deps.logger.child({ route: 'agent' }),
      });

      const result = await loop.execute(body.input);
      return { provider: provider.name, model: provider.model, ...result };
    } catch (error) {
      if (error instanceof ProviderCallError) {
        return sendError(
          reply,
          AppError.providerError(error.message, { provider: error.provider, kind: error.kind, status: error.status }),
          deps.logger
        );
      }
      return sendError(reply, error, deps.logger);
    }
  });
}
