import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { ConfigurationError } from './errors.js';
import { PROJECT_ROOT, getConfig, validateConfig } from './config.js';

describe('getConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = getConfig({});

    expect(config.llm).toEqual({
      provider: 'openai',
      model: 'llama3-70b-8192',
      apiKey: undefined,
      apiEndpoint: 'https://api.groq.com/openai/v1',
      timeoutMs: 30000
    });
    expect(config.webSearch).toEqual({ enabled: true, timeoutMs: 8000, skipForSystemInfo: true });
    expect(config.policyPath).toBe(resolve(PROJECT_ROOT, 'data/denylist.json'));
    expect(config.knowledge.csvPath).toBe(resolve(PROJECT_ROOT, 'data/knowledge/tech_support_tickets.csv'));
    expect(config.knowledge.cachePath).toBe(`${config.knowledge.csvPath}.index.json`);
    expect(config.knowledge.requireCache).toBe(false);
    expect(config.command.timeoutMs).toBe(60000);
    expect(config.logDir).toBe(join(homedir(), 'SupportPilot', 'logs'));
  });

  it('takes the first credential that is set', () => {
    expect(getConfig({ GROQ_API_KEY: 'test-groq' }).llm.apiKey).toBe('test-groq');
    expect(getConfig({ OPENAI_API_KEY: 'test-openai', GROQ_API_KEY: 'test-groq' }).llm.apiKey).toBe('test-groq');
    expect(getConfig({ LLM_API_KEY: 'test-secret', GROQ_API_KEY: 'test-groq' }).llm.apiKey).toBe('test-secret');
  });

  it('reads flags, numbers and paths', () => {
    const config = getConfig({
      ENABLE_WEB_SEARCH: '0',
      WEB_SEARCH_SKIP_SYSTEM_INFO: 'false',
      KNOWLEDGE_REQUIRE_CACHE: 'true',
      COMMAND_TIMEOUT_MS: '15000',
      COMMAND_SHELL: 'sh',
      SUPPORT_PILOT_LOG_DIR: '/var/log/support-pilot'
    });

    expect(config.webSearch.enabled).toBe(false);
    expect(config.webSearch.skipForSystemInfo).toBe(false);
    expect(config.knowledge.requireCache).toBe(true);
    expect(config.command).toEqual({ timeoutMs: 15000, shell: 'sh' });
    expect(config.logDir).toBe('/var/log/support-pilot');
  });

  it('puts logs under LOCALAPPDATA when it is set', () => {
    expect(getConfig({ LOCALAPPDATA: '/users/test/appdata' }).logDir).toBe(join('/users/test/appdata', 'SupportPilot', 'logs'));
  });

  it('rejects malformed values', () => {
    expect(() => getConfig({ COMMAND_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
    expect(() => getConfig({ LLM_PROVIDER: 'carrier-pigeon' })).toThrow(ConfigurationError);
    expect(() => getConfig({ ENABLE_WEB_SEARCH: 'yes' })).toThrow(ConfigurationError);
  });

  it('points Ollama at the local server unless a base URL is given', () => {
    expect(getConfig({ LLM_PROVIDER: 'ollama' }).llm.apiEndpoint).toBe('http://localhost:11434');
    expect(getConfig({ LLM_PROVIDER: 'ollama', LLM_BASE_URL: 'http://gpu-box:11434' }).llm.apiEndpoint).toBe('http://gpu-box:11434');
  });

  it('rejects an Ollama provider pointed at the hosted endpoint', () => {
    expect(() => getConfig({ LLM_PROVIDER: 'ollama', LLM_BASE_URL: 'https://api.groq.com/openai/v1' })).toThrow(
      'Invalid configuration: LLM_BASE_URL must point at the Ollama server when LLM_PROVIDER=ollama'
    );
  });
});

describe('validateConfig', () => {
  it('flags a cache path that would overwrite the corpus', () => {
    const config = getConfig({});
    const problems = validateConfig({
      ...config,
      knowledge: { ...config.knowledge, cachePath: config.knowledge.csvPath }
    });
    expect(problems).toEqual(['KNOWLEDGE_CACHE_PATH must differ from KNOWLEDGE_CSV_PATH']);
  });
});
