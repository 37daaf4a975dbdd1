/**
 * Configuration
 *
 * Environment variable loading and validation for Support Pilot.
 *
 * Environment variables:
 * - LLM_PROVIDER: 'openai' (any OpenAI-compatible endpoint, default) or 'ollama'
 * - LLM_API_KEY: API key (falls back to GROQ_API_KEY, then OPENAI_API_KEY)
 * - LLM_MODEL: model name (default: llama3-70b-8192)
 * - LLM_BASE_URL: endpoint (default: https://api.groq.com/openai/v1, or
 *   http://localhost:11434 for ollama)
 * - LLM_TIMEOUT_MS: generation timeout (default: 30000)
 * - ENABLE_WEB_SEARCH: '1' enables DuckDuckGo lookups (default: 1)
 * - WEB_SEARCH_TIMEOUT_MS: per-request timeout (default: 8000)
 * - WEB_SEARCH_SKIP_SYSTEM_INFO: skip web lookups for system_info issues (default: 1)
 * - DENYLIST_PATH: command deny-list policy (default: data/denylist.json)
 * - KNOWLEDGE_CSV_PATH: ticket corpus (default: data/knowledge/tech_support_tickets.csv)
 * - KNOWLEDGE_CACHE_PATH: index cache (default: <csv>.index.json)
 * - KNOWLEDGE_REQUIRE_CACHE: '1' refuses to build the index at runtime (default: 0)
 * - COMMAND_TIMEOUT_MS: per-command timeout (default: 60000)
 * - COMMAND_SHELL: 'auto' (default), 'powershell' or 'sh'
 * - SUPPORT_PILOT_LOG_DIR: transcript directory
 */

import { config as loadDotenv } from 'dotenv';
import { homedir } from 'os';
import { dirname, isAbsolute, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { maskEnvValue } from './OutputSanitizer.js';
import type { ProviderConfig } from '../providers/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Project root (two levels up from src/core/ or dist/core/) */
export const PROJECT_ROOT = join(__dirname, '..', '..');

const flag = (fallback: '0' | '1') =>
  z.enum(['0', '1', 'true', 'false']).default(fallback).transform(value => value === '1' || value === 'true');

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const DEFAULT_BASE_URLS = {
  openai: 'https://api.groq.com/openai/v1',
  ollama: 'http://localhost:11434'
} as const;

const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
  LLM_API_KEY: z.string().optional(),
  GROQ_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().min(1).default('llama3-70b-8192'),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_TIMEOUT_MS: positiveInt(30000),
  ENABLE_WEB_SEARCH: flag('1'),
  WEB_SEARCH_TIMEOUT_MS: positiveInt(8000),
  WEB_SEARCH_SKIP_SYSTEM_INFO: flag('1'),
  DENYLIST_PATH: z.string().min(1).default('data/denylist.json'),
  KNOWLEDGE_CSV_PATH: z.string().min(1).default('data/knowledge/tech_support_tickets.csv'),
  KNOWLEDGE_CACHE_PATH: z.string().optional(),
  KNOWLEDGE_REQUIRE_CACHE: flag('0'),
  COMMAND_TIMEOUT_MS: positiveInt(60000),
  COMMAND_SHELL: z.enum(['auto', 'powershell', 'sh']).default('auto'),
  SUPPORT_PILOT_LOG_DIR: z.string().optional(),
  LOCALAPPDATA: z.string().optional()
});

export interface SupportPilotConfig {
  llm: ProviderConfig & { timeoutMs: number };
  webSearch: {
    enabled: boolean;
    timeoutMs: number;
    skipForSystemInfo: boolean;
  };
  policyPath: string;
  knowledge: {
    csvPath: string;
    cachePath: string;
    requireCache: boolean;
  };
  command: {
    timeoutMs: number;
    shell: 'powershell' | 'sh';
  };
  logDir: string;
}

let envLoaded = false;

/**
 * Load .env from the project root once. Values already present in the
 * process environment win.
 */
export function loadEnvironment(envPath: string = join(PROJECT_ROOT, '.env')): void {
  if (envLoaded) {
    return;
  }
  envLoaded = true;
  const result = loadDotenv({ path: envPath });
  if (result.error) {
    console.log(`[Config] No .env loaded from ${envPath}`);
    return;
  }
  const parsed = result.parsed ?? {};
  console.log(`[Config] Loaded ${Object.keys(parsed).length} env vars from ${envPath}`);
  for (const [key, value] of Object.entries(parsed)) {
    console.log(`[Config] ENV ${key}=${maskEnvValue(key, value)}`);
  }
}

function resolvePath(path: string): string {
  return isAbsolute(path) ? path : resolve(PROJECT_ROOT, path);
}

/**
 * Parse the environment into a typed configuration.
 * Throws ConfigurationError when a value is malformed.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): SupportPilotConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const values = parsed.data;

  const csvPath = resolvePath(values.KNOWLEDGE_CSV_PATH);
  const baseLogDir = values.LOCALAPPDATA ?? homedir();

  const config: SupportPilotConfig = {
    llm: {
      provider: values.LLM_PROVIDER,
      model: values.LLM_MODEL,
      apiKey: values.LLM_API_KEY || values.GROQ_API_KEY || values.OPENAI_API_KEY || undefined,
      apiEndpoint: values.LLM_BASE_URL ?? DEFAULT_BASE_URLS[values.LLM_PROVIDER],
      timeoutMs: values.LLM_TIMEOUT_MS
    },
    webSearch: {
      enabled: values.ENABLE_WEB_SEARCH,
      timeoutMs: values.WEB_SEARCH_TIMEOUT_MS,
      skipForSystemInfo: values.WEB_SEARCH_SKIP_SYSTEM_INFO
    },
    policyPath: resolvePath(values.DENYLIST_PATH),
    knowledge: {
      csvPath,
      cachePath: values.KNOWLEDGE_CACHE_PATH ? resolvePath(values.KNOWLEDGE_CACHE_PATH) : `${csvPath}.index.json`,
      requireCache: values.KNOWLEDGE_REQUIRE_CACHE
    },
    command: {
      timeoutMs: values.COMMAND_TIMEOUT_MS,
      shell: values.COMMAND_SHELL === 'auto'
        ? (process.platform === 'win32' ? 'powershell' : 'sh')
        : values.COMMAND_SHELL
    },
    logDir: values.SUPPORT_PILOT_LOG_DIR
      ? resolvePath(values.SUPPORT_PILOT_LOG_DIR)
      : join(baseLogDir, 'SupportPilot', 'logs')
  };

  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return config;
}

/**
 * Cross-field checks the schema cannot express
 */
export function validateConfig(config: SupportPilotConfig): string[] {
  const errors: string[] = [];

  if (config.llm.provider === 'ollama' && config.llm.apiEndpoint?.includes('api.groq.com')) {
    errors.push('LLM_BASE_URL must point at the Ollama server when LLM_PROVIDER=ollama');
  }

  if (config.knowledge.cachePath === config.knowledge.csvPath) {
    errors.push('KNOWLEDGE_CACHE_PATH must differ from KNOWLEDGE_CSV_PATH');
  }

  return errors;
}
