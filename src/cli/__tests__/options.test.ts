import { describe, it, expect } from 'vitest';
import { createCliProgram, formatProviderList, parseCliOptions } from '../options.js';

function quietProgram() {
  return createCliProgram().configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

describe('parseCliOptions', () => {
  it('defaults every flag off', () => {
    expect(parseCliOptions([], quietProgram())).toEqual({
      single: false,
      listProviders: false,
      verbose: false,
    });
  });

  it('reads provider, model, agent count and switches', () => {
    expect(
      parseCliOptions(['-p', 'groq', '--model', 'llama-test', '--agents', '3', '--verbose', '--single'], quietProgram())
    ).toEqual({
      provider: 'groq',
      model: 'llama-test',
      agents: 3,
      single: true,
      listProviders: false,
      verbose: true,
    });
    expect(parseCliOptions(['--list-providers'], quietProgram()).listProviders).toBe(true);
  });

  it('rejects an agent count out of range', () => {
    expect(() => parseCliOptions(['--agents', '0'], quietProgram())).toThrow(/Expected an integer from 1 to 16\./);
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliOptions(['--colour'], quietProgram())).toThrow(/unknown option '--colour'/);
  });
});

describe('formatProviderList', () => {
  it('marks the default and unconfigured providers', () => {
    const text = formatProviderList(
      [
        { name: 'groq', displayName: 'Groq', description: 'fast', defaultModel: 'llama-test', configured: true },
        { name: 'ollama', displayName: 'Ollama', description: 'local', defaultModel: 'qwen-test', configured: false },
      ],
      'groq'
    );

    expect(text).toBe(
      [
        'Available providers (* = default):',
        '* groq        Groq - llama-test',
        '  ollama      Ollama - qwen-test (not configured)',
      ].join('\n')
    );
  });
});
