// Environment configuration for the research API
// Provider credentials, agent loop limits and orchestrator settings

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parsePositiveNumber(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseRatio(value: string | undefined, defaultValue: number, name: string): number {
  const parsed = parsePositiveNumber(value, defaultValue, name);
  if (parsed > 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

// setTimeout cannot wait longer than 2^31-1 ms
const MAX_TIMEOUT_SECONDS = Math.floor(2_147_483_647 / 1000);

function parseTimeoutSeconds(value: string | undefined, defaultValue: number, name: string): number {
  const parsed = parsePositiveNumber(value, defaultValue, name);
  if (parsed > MAX_TIMEOUT_SECONDS) {
    console.error(`${name} "${value}" is above ${MAX_TIMEOUT_SECONDS}, using ${MAX_TIMEOUT_SECONDS}`);
    return MAX_TIMEOUT_SECONDS;
  }
  return parsed;
}

const PARALLEL_AGENTS = Math.max(1, parsePositiveInt(process.env.PARALLEL_AGENTS, 4, 'PARALLEL_AGENTS'));

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3838),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Provider selection
  DEFAULT_PROVIDER: strEnv(process.env.DEFAULT_PROVIDER, 'openrouter').toLowerCase(),
  PROVIDER_TIMEOUT_MS: parsePositiveInt(process.env.PROVIDER_TIMEOUT_MS, 120000, 'PROVIDER_TIMEOUT_MS'),

  // OpenRouter
  OPENROUTER_API_KEY: strEnv(process.env.OPENROUTER_API_KEY),
  OPENROUTER_MODEL: strEnv(process.env.OPENROUTER_MODEL),
  OPENROUTER_BASE_URL: strEnv(process.env.OPENROUTER_BASE_URL),

  // Groq
  GROQ_API_KEY: strEnv(process.env.GROQ_API_KEY),
  GROQ_MODEL: strEnv(process.env.GROQ_MODEL),
  GROQ_BASE_URL: strEnv(process.env.GROQ_BASE_URL),

  // Mistral
  MISTRAL_API_KEY: strEnv(process.env.MISTRAL_API_KEY),
  MISTRAL_MODEL: strEnv(process.env.MISTRAL_MODEL),
  MISTRAL_BASE_URL: strEnv(process.env.MISTRAL_BASE_URL),

  // SambaNova
  SAMBANOVA_API_KEY: strEnv(process.env.SAMBANOVA_API_KEY),
  SAMBANOVA_MODEL: strEnv(process.env.SAMBANOVA_MODEL),
  SAMBANOVA_BASE_URL: strEnv(process.env.SAMBANOVA_BASE_URL),

  // Cerebras
  CEREBRAS_API_KEY: strEnv(process.env.CEREBRAS_API_KEY),
  CEREBRAS_MODEL: strEnv(process.env.CEREBRAS_MODEL),
  CEREBRAS_BASE_URL: strEnv(process.env.CEREBRAS_BASE_URL),

  // Ollama (local, no key)
  OLLAMA_ENABLED: process.env.OLLAMA_ENABLED === 'true',
  OLLAMA_MODEL: strEnv(process.env.OLLAMA_MODEL),
  OLLAMA_BASE_URL: strEnv(process.env.OLLAMA_BASE_URL),

  // Agent loop
  AGENT_MAX_ITERATIONS: Math.max(1, parsePositiveInt(process.env.AGENT_MAX_ITERATIONS, 10, 'AGENT_MAX_ITERATIONS')),
  AGENT_FINALIZE_AFTER_NO_TOOL_STREAK: parsePositiveInt(
    process.env.AGENT_FINALIZE_AFTER_NO_TOOL_STREAK,
    2,
    'AGENT_FINALIZE_AFTER_NO_TOOL_STREAK',
  ),
  DEDUP_MIN_LENGTH: parsePositiveInt(process.env.DEDUP_MIN_LENGTH, 100, 'DEDUP_MIN_LENGTH'),
  DEDUP_SIMILARITY_THRESHOLD: parseRatio(process.env.DEDUP_SIMILARITY_THRESHOLD, 0.94, 'DEDUP_SIMILARITY_THRESHOLD'),

  // Orchestrator
  PARALLEL_AGENTS,
  MAX_CONCURRENCY: Math.max(1, parsePositiveInt(process.env.MAX_CONCURRENCY, PARALLEL_AGENTS, 'MAX_CONCURRENCY')),
  TASK_TIMEOUT_SECONDS: parseTimeoutSeconds(process.env.TASK_TIMEOUT_SECONDS, 300, 'TASK_TIMEOUT_SECONDS'),
  AGGREGATION_STRATEGY: strEnv(process.env.AGGREGATION_STRATEGY, 'consensus'),
  AGENT_RETRY_ATTEMPTS: Math.max(1, parsePositiveInt(process.env.AGENT_RETRY_ATTEMPTS, 2, 'AGENT_RETRY_ATTEMPTS')),
  AGENT_RETRY_BACKOFF_SECONDS: parsePositiveNumber(
    process.env.AGENT_RETRY_BACKOFF_SECONDS,
    1,
    'AGENT_RETRY_BACKOFF_SECONDS',
  ),
  RESEARCH_RUN_TTL_MINUTES: parsePositiveInt(process.env.RESEARCH_RUN_TTL_MINUTES, 30, 'RESEARCH_RUN_TTL_MINUTES'),

  // Tools
  TOOLS_ENABLED: process.env.TOOLS_ENABLED !== 'false', // Default true
  WEB_SEARCH_ENABLED: process.env.WEB_SEARCH_ENABLED === 'true',
  BRAVE_SEARCH_API_KEY: process.env.BRAVE_SEARCH_API_KEY || '',
  WEB_SEARCH_MAX_RESULTS: Math.min(10, Math.max(1, parsePositiveInt(process.env.WEB_SEARCH_MAX_RESULTS, 5, 'WEB_SEARCH_MAX_RESULTS'))),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

/**
 * Credentials and overrides for a provider preset, looked up by preset name.
 * Empty strings mean "not set".
 */
export function providerEnv(provider: string): { apiKey: string; model: string; baseUrl: string } {
  switch (provider) {
    case 'openrouter':
      return { apiKey: env.OPENROUTER_API_KEY, model: env.OPENROUTER_MODEL, baseUrl: env.OPENROUTER_BASE_URL };
    case 'groq':
      return { apiKey: env.GROQ_API_KEY, model: env.GROQ_MODEL, baseUrl: env.GROQ_BASE_URL };
    case 'mistral':
      return { apiKey: env.MISTRAL_API_KEY, model: env.MISTRAL_MODEL, baseUrl: env.MISTRAL_BASE_URL };
    case 'sambanova':
      return { apiKey: env.SAMBANOVA_API_KEY, model: env.SAMBANOVA_MODEL, baseUrl: env.SAMBANOVA_BASE_URL };
    case 'cerebras':
      return { apiKey: env.CEREBRAS_API_KEY, model: env.CEREBRAS_MODEL, baseUrl: env.CEREBRAS_BASE_URL };
    case 'ollama':
      return { apiKey: '', model: env.OLLAMA_MODEL, baseUrl: env.OLLAMA_BASE_URL };
    default:
      return { apiKey: '', model: '', baseUrl: '' };
  }
}

// Validation helpers
export function isProviderConfigured(provider: string): boolean {
  if (provider === 'ollama') {
    return env.OLLAMA_ENABLED;
  }
  return !!providerEnv(provider).apiKey;
}

export function listConfiguredProviders(): string[] {
  const providers = ['openrouter', 'groq', 'mistral', 'sambanova', 'cerebras', 'ollama'];
  return providers.filter(isProviderConfigured);
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  const configured = listConfiguredProviders();
  console.log('Research API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Default provider: ${env.DEFAULT_PROVIDER}`);
  console.log(`  Configured providers: ${configured.join(', ') || 'none'}`);
  console.log(`  Parallel agents: ${env.PARALLEL_AGENTS} (max concurrency ${env.MAX_CONCURRENCY})`);
  console.log(`  Task timeout: ${env.TASK_TIMEOUT_SECONDS}s`);
  console.log(`  Agent retries: ${env.AGENT_RETRY_ATTEMPTS} attempt(s), backoff ${env.AGENT_RETRY_BACKOFF_SECONDS}s`);
  console.log(`  Agent max iterations: ${env.AGENT_MAX_ITERATIONS}`);
  console.log(`  Finalize after no-tool streak: ${env.AGENT_FINALIZE_AFTER_NO_TOOL_STREAK}`);
  console.log(`  Aggregation strategy: ${env.AGGREGATION_STRATEGY}`);
  console.log(`  Tools enabled: ${env.TOOLS_ENABLED}`);
  console.log(`  Web search enabled: ${env.WEB_SEARCH_ENABLED}`);
}
