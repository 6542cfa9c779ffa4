/**
 * Environment configuration loader with Zod validation
 */

import { z } from 'zod';
import { LogLevelSchema } from './logging/levels.js';

export const LLMProviderSchema = z.enum(['openrouter', 'anthropic', 'openai']);

export type LLMProviderName = z.infer<typeof LLMProviderSchema>;

/**
 * Configuration schema with validation rules
 */
export const ConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
  backendUrl: z.string().url().default('http://localhost:3001'),
  requireAuthorization: z.boolean().default(true),
  allowedOrigins: z.array(z.string().min(1)).default(['*']),
  llm: z
    .object({
      provider: LLMProviderSchema.default('openrouter'),
      model: z.string().min(1).optional(),
      apiKey: z.string().min(1).optional(),
    })
    .default({}),
  maxSteps: z.number().int().min(1).max(50).default(10),
  shutdownTimeoutMs: z.number().int().min(0).default(30000),
  logLevel: LogLevelSchema.default('info'),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse a boolean from environment variable string
 */
function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse an integer from environment variable string
 */
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a comma separated list, dropping empty entries
 */
function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Provider-specific key variable, used when LLM_API_KEY is not set
 */
const PROVIDER_KEY_ENV: Record<LLMProviderName, string> = {
  openrouter: 'OPENROUTER_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

/**
 * Drop undefined entries so schema defaults apply
 */
function compact(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, v]) => v !== undefined));
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const providerResult = LLMProviderSchema.safeParse(env['LLM_PROVIDER']);
  const provider = env['LLM_PROVIDER'] || undefined;
  const keyEnv = PROVIDER_KEY_ENV[providerResult.success ? providerResult.data : 'openrouter'];

  const llm = compact({
    provider,
    model: env['LLM_MODEL'] || undefined,
    apiKey: env['LLM_API_KEY'] || env[keyEnv] || undefined,
  });

  const configInput = compact({
    port: parseInteger(env['PORT']),
    host: env['HOST'] || undefined,
    backendUrl: env['CLASSROOM_API_URL'] || undefined,
    requireAuthorization: parseBoolean(env['REQUIRE_AUTHORIZATION']),
    allowedOrigins: parseList(env['CORS_ALLOWED_ORIGINS']),
    llm: Object.keys(llm).length > 0 ? llm : undefined,
    maxSteps: parseInteger(env['AGENT_MAX_STEPS']),
    shutdownTimeoutMs: parseInteger(env['SHUTDOWN_TIMEOUT_MS']),
    logLevel: env['LOG_LEVEL']?.toLowerCase() || undefined,
  });

  return ConfigSchema.parse(configInput);
}

/**
 * Singleton config instance
 */
let config: Config | null = null;

/**
 * Get the current configuration (singleton)
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Force reload configuration from environment
 */
export function reloadConfig(): Config {
  config = loadConfig();
  return config;
}

/**
 * Replace the singleton (for testing)
 */
export function setConfig(next: Config): void {
  config = next;
}

/**
 * Reset config singleton (for testing)
 */
export function resetConfig(): void {
  config = null;
}
