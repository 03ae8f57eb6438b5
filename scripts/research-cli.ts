#!/usr/bin/env node
// Research CLI - runs the parallel orchestrator (or a single agent) from the terminal
// Type a question, watch agent progress, read the synthesized answer.

import 'dotenv/config';
import readline from 'readline';
import { CommanderError } from 'commander';
import { formatProviderList, parseCliOptions, type CliOptions } from '../src/cli/options.js';
import { env } from '../src/env.js';
import { createLogger, type Logger } from '../src/logger.js';
import { getProvider, listProviders } from '../src/providers/index.js';
import type { Provider } from '../src/providers/types.js';
import { AgentLoop } from '../src/services/agent/agent-loop.js';
import { ResearchOrchestrator } from '../src/services/orchestrator/orchestrator.js';
import type { ProgressSnapshot } from '../src/services/orchestrator/progress.js';
import { orchestratorSettingsFromEnv } from '../src/services/orchestrator/settings.js';
import { createDefaultTools } from '../src/services/tools/index.js';
import { errorMessage } from '../src/utils/errors.js';

const PROGRESS_INTERVAL_MS = 1000;

function formatProgress(snapshot: ProgressSnapshot): string {
  return Object.keys(snapshot)
    .map(Number)
    .sort((a, b) => a - b)
    .map(agentId => `  Agent ${agentId + 1}: ${snapshot[agentId]}`)
    .join('\n');
}

function printAnswer(text: string) {
  console.log('='.repeat(60));
  console.log(text);
  console.log('='.repeat(60));
}

async function research(orchestrator: ResearchOrchestrator, query: string): Promise<void> {
  let lastPrinted = '';
  const printProgress = () => {
    const text = formatProgress(orchestrator.getProgressStatus());
    if (text && text !== lastPrinted) {
      console.log(`\nProgress:\n${text}`);
      lastPrinted = text;
    }
  };

  const timer = setInterval(printProgress, PROGRESS_INTERVAL_MS);
  try {
    const report = await orchestrator.orchestrateDetailed(query);
    printProgress();
    console.log(`\nFinished in ${(report.durationMs / 1000).toFixed(1)}s\n`);
    printAnswer(report.response);
  } finally {
    clearInterval(timer);
  }
}

function createAnswerer(options: CliOptions, provider: Provider, logger: Logger): (query: string) => Promise<void> {
  const settings = orchestratorSettingsFromEnv(logger);

  if (options.single) {
    console.log(`Mode: single agent (${provider.name}, ${provider.model})`);
    return async query => {
      const loop = new AgentLoop({
        provider,
        tools: createDefaultTools(logger),
        systemPrompt: settings.systemPrompt,
        maxIterations: settings.maxIterations,
        noToolStreakThreshold: settings.finalizeAfterNoToolStreak,
        deduplication: settings.deduplication,
        logger,
      });
      console.log('\nAgent is working...\n');
      printAnswer(await loop.run(query));
    };
  }

  const orchestrator = new ResearchOrchestrator({
    ...settings,
    ...(options.agents ? { parallelAgents: options.agents } : {}),
    provider,
    tools: createDefaultTools(logger),
    logger,
  });
  console.log(`Mode: ${orchestrator.agentCount} parallel agents (${provider.name}, ${provider.model})`);
  return query => research(orchestrator, query);
}

async function main() {
  const options = parseCliOptions(process.argv.slice(2));

  if (options.listProviders) {
    console.log(formatProviderList(listProviders(), env.DEFAULT_PROVIDER));
    return;
  }

  // Quiet by default so log lines don't interleave with progress
  const logger = createLogger({ level: options.verbose ? 'debug' : 'warn', pretty: options.verbose });
  const provider = getProvider(options.provider ?? env.DEFAULT_PROVIDER, options.model);

  console.log('Parallel Research CLI');
  const answer = createAnswerer(options, provider, logger);
  console.log('Type a question, or "exit" to quit.\n');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const question = (prompt: string): Promise<string> => {
    return new Promise(resolve => rl.question(prompt, resolve));
  };

  while (true) {
    const query = (await question('> ')).trim();
    if (!query) continue;
    if (query === 'exit' || query === 'quit') {
      rl.close();
      return;
    }

    try {
      await answer(query);
    } catch (error) {
      console.log(`\nRequest failed: ${errorMessage(error)}`);
    }
  }
}

main().catch(error => {
  // commander has already printed its own message
  if (!(error instanceof CommanderError)) {
    console.error(errorMessage(error));
  }
  process.exit(error instanceof CommanderError ? error.exitCode : 1);
});
