import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { agentRoutes } from '../agent.js';
import type { RouteDependencies } from '../dependencies.js';
import { silentLogger } from '../../logger.js';
import { markTaskCompleteTool } from '../../services/tools/mark-task-complete-tool.js';
import { calculatorTool } from '../../services/tools/calculator-tool.js';
import { handlerProvider, scriptedProvider, toolCall } from '../../__tests__/helpers/fake-provider.js';

describe.sequential('Agent Routes', () => {
  let app: FastifyInstance | undefined;

  async function buildApp(deps: RouteDependencies) {
    app = Fastify();
    await app.register(agentRoutes, {
      prefix: '/v1',
      createTools: () => [markTaskCompleteTool, calculatorTool],
      settings: { finalizeAfterNoToolStreak: 1 },
      logger: silentLogger,
      ...deps,
    });
    await app.ready();
    return app;
  }

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('should run the agent loop and return its result', async () => {
    const { provider } = scriptedProvider([
      { toolCalls: [toolCall('calculator', { expression: '3*4' })] },
      { content: 'Three times four is 12.' },
    ]);
    const server = await buildApp({ resolveProvider: () => provider });

    const response = await server.inject({
      method: 'POST',
      url: '/v1/agent/run',
      payload: { input: 'What is 3*4?' },
    });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({
      provider: 'fake',
      model: 'fake-model',
      response: 'Three times four is 12.',
      iterations: 2,
      termination: 'no_tool_streak',
      source: 'content',
      toolCallsExecuted: 1,
      usage: { promptTokens: 20, completionTokens: 10, totalTokens: 30 },
    });
  });

  it('should send no tool schemas when tools are disabled', async () => {
    const { provider, createChatCompletion } = scriptedProvider([{ content: 'Plain answer.' }]);
    const server = await buildApp({ resolveProvider: () => provider });

    const response = await server.inject({
      method: 'POST',
      url: '/v1/agent/run',
      payload: { input: 'Say something', tools: false },
    });

    expect(response.statusCode).toBe(200);
    expect(createChatCompletion.mock.calls[0][1]?.tools).toBeUndefined();
  });

  it('should reject a missing input', async () => {
    const { provider } = scriptedProvider([]);
    const server = await buildApp({ resolveProvider: () => provider });

    const response = await server.inject({
      method: 'POST',
      url: '/v1/agent/run',
      payload: {},
    });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body).error).toBe('validation_error');
  });

  it('should map provider failures to 502', async () => {
    const { provider } = handlerProvider(() => {
      throw new Error('socket hang up');
    });
    const server = await buildApp({ resolveProvider: () => provider });

    const response = await server.inject({
      method: 'POST',
      url: '/v1/agent/run',
      payload: { input: 'Hello' },
    });

    expect(response.statusCode).toBe(502);
    const body = JSON.parse(response.body);
    expect(body.error).toBe('provider_error');
    expect(body.message).toBe('LLM call failed: socket hang up');
    expect(body.details).toEqual({ provider: 'fake', kind: 'connection' });
  });

  it('should report an unconfigured provider', async () => {
    const server = await buildApp({
      resolveProvider: name => {
        throw new Error(`Provider "${name}" is not available or not configured`);
      },
    });

    const response = await server.inject({
      method: 'POST',
      url: '/v1/agent/run',
      payload: { input: 'Hello', provider: 'nowhere' },
    });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      error: 'provider_unavailable',
      message: 'Provider "nowhere" is not available or not configured',
      statusCode: 400,
      details: { provider: 'nowhere' },
    });
  });
});
