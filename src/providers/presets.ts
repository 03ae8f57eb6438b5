// Provider presets
// OpenAI-compatible vendors the research pipeline can run against

export interface ProviderPreset {
  name: string;
  displayName: string;
  description: string;
  baseUrl: string;
  defaultModel: string;
  apiKeyEnv: string | null; // null for keyless local servers
  keyPrefix?: string;
  recoversTextToolCalls?: boolean; // rebuild tool calls from rejected `failed_generation` text
}

export const PROVIDER_PRESETS: readonly ProviderPreset[] = [
  {
    name: 'openrouter',
    displayName: 'OpenRouter',
    description: 'Routes requests to many hosted models behind one API',
    baseUrl: 'https://openrouter.ai/api/v1',
    defaultModel: 'moonshotai/kimi-k2',
    apiKeyEnv: 'OPENROUTER_API_KEY',
    keyPrefix: 'sk-or-',
  },
  {
    name: 'groq',
    displayName: 'Groq',
    description: 'Low-latency inference on LPU hardware',
    baseUrl: 'https://api.groq.com/openai/v1',
    defaultModel: 'llama-3.3-70b-versatile',
    apiKeyEnv: 'GROQ_API_KEY',
    keyPrefix: 'gsk_',
    recoversTextToolCalls: true,
  },
  {
    name: 'mistral',
    displayName: 'Mistral AI',
    description: 'Mistral hosted models',
    baseUrl: 'https://api.mistral.ai/v1',
    defaultModel: 'mistral-large-latest',
    apiKeyEnv: 'MISTRAL_API_KEY',
  },
  {
    name: 'sambanova',
    displayName: 'SambaNova',
    description: 'SambaNova Cloud inference',
    baseUrl: 'https://api.sambanova.ai/v1',
    defaultModel: 'DeepSeek-V3-0324',
    apiKeyEnv: 'SAMBANOVA_API_KEY',
  },
  {
    name: 'cerebras',
    displayName: 'Cerebras',
    description: 'Wafer-scale inference',
    baseUrl: 'https://api.cerebras.ai/v1',
    defaultModel: 'llama3.1-70b',
    apiKeyEnv: 'CEREBRAS_API_KEY',
    keyPrefix: 'csk-',
  },
  {
    name: 'ollama',
    displayName: 'Ollama',
    description: 'Local models served by Ollama (OpenAI-compatible endpoint)',
    baseUrl: 'http://localhost:11434/v1',
    defaultModel: 'qwen3:latest',
    apiKeyEnv: null,
  },
];

export function getProviderPreset(name: string): ProviderPreset | undefined {
  const key = name.trim().toLowerCase();
  return PROVIDER_PRESETS.find(p => p.name === key);
}

/**
 * Remediation text for an authentication failure against the given provider.
 */
export function authRemediationHint(name: string): string | null {
  const preset = getProviderPreset(name);
  if (!preset) return null;

  if (!preset.apiKeyEnv) {
    return `${preset.displayName} does not use API keys; check that OLLAMA_BASE_URL points at a running server.`;
  }

  if (preset.keyPrefix) {
    return `${preset.displayName} rejected the API key. Check that ${preset.apiKeyEnv} is set and that the key starts with "${preset.keyPrefix}".`;
  }

  return `${preset.displayName} rejected the API key. Check that ${preset.apiKeyEnv} holds a valid ${preset.displayName} key.`;
}
