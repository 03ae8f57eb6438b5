// Research routes
// POST /v1/research runs the parallel orchestrator; runs stay pollable by id.

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { env } from '../env.js';
import { ResearchOrchestrator } from '../services/orchestrator/orchestrator.js';
import { ResearchRunRegistry, viewResearchRun } from '../services/research-runs.js';
import { AppError } from '../utils/errors.js';
import { providerFor, resolveDependencies, sendError, type RouteDependencies } from './dependencies.js';

const ResearchRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query is required').max(20000),
  provider: z.string().trim().min(1).optional(),
  model: z.string().trim().min(1).optional(),
  agents: z.number().int().min(1).max(16).optional(),
  wait: z.boolean().optional().default(true),
});

export interface ResearchRouteOptions extends RouteDependencies {
  runs?: ResearchRunRegistry;
}

export async function researchRoutes(server: FastifyInstance, options: ResearchRouteOptions) {
  const deps = resolveDependencies(options);
  const runs = options.runs ?? new ResearchRunRegistry(env.RESEARCH_RUN_TTL_MINUTES * 60_000, deps.logger);
  if (!options.runs) {
    server.addHook('onClose', async () => runs.destroy());
  }

  // POST /v1/research - Start a research run (waits for the result unless wait=false)
  server.post('/research', async (request, reply) => {
    const parsed = ResearchRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, AppError.validationError('Invalid request body', parsed.error.flatten()), deps.logger);
    }
    const body = parsed.data;

    try {
      const provider = providerFor(deps, body.provider, body.model);
      const orchestrator = new ResearchOrchestrator({
        ...deps.settings,
        ...(body.agents ? { parallelAgents: body.agents } : {}),
        provider,
        tools: deps.createTools(),
        logger: deps.logger,
      });

      const run = runs.start(body.query, orchestrator, provider.name);
      if (!body.wait) {
        return reply.code(202).send({ runId: run.runId, status: run.status });
      }

      const finished = await run.done;
      if (finished.status === 'failed') {
        throw AppError.internal(finished.error ?? 'Research run failed', { runId: run.runId });
      }
      return viewResearchRun(finished);
    } catch (error) {
      return sendError(reply, error, deps.logger);
    }
  });

  // GET /v1/research/:runId - Run status, progress and (once finished) the report
  server.get<{ Params: { runId: string } }>('/research/:runId', async (request, reply) => {
    const run = runs.get(request.params.runId);
    if (!run) {
      return sendError(reply, AppError.notFound('Research run not found'), deps.logger);
    }
    return viewResearchRun(run);
  });

  // GET /v1/research/:runId/progress - Per-agent progress labels
  server.get<{ Params: { runId: string } }>('/research/:runId/progress', async (request, reply) => {
    const run = runs.get(request.params.runId);
    if (!run) {
      return sendError(reply, AppError.notFound('Research run not found'), deps.logger);
    }
    return {
      runId: run.runId,
      status: run.status,
      progress: run.orchestrator.getProgressStatus(),
    };
  });
}
