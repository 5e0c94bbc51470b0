import dotenv from 'dotenv';
import { z } from 'zod';

const isTestRuntime =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

if (!isTestRuntime) {
  dotenv.config();
}

/**
 * Check whether a hostname resolves to localhost or RFC1918 private network ranges.
 *
 * @param hostname Hostname (IPv4/IPv6 or DNS label) to validate.
 * @returns True when the host is local/private.
 */
export function isPrivateOrLocalHostname(hostname: string): boolean {
  const normalized = hostname.toLowerCase();
  const unwrappedIpv6 = normalized.replace(/^\[/, '').replace(/\]$/, '');

  return (
    normalized === 'localhost' ||
    normalized.startsWith('127.') ||
    unwrappedIpv6 === '::1' ||
    unwrappedIpv6.startsWith('::ffff:127.') ||
    normalized.startsWith('10.') ||
    normalized.startsWith('192.168.') ||
    /^172\.(1[6-9]|2\d|3[0-1])\./.test(normalized)
  );
}

// Plain HTTP is only accepted for model gateways on the local network.
const llmBaseUrlSchema = z.string().trim().url().refine((value) => {
  try {
    const parsed = new URL(value);
    if (parsed.protocol === 'https:') return true;
    return parsed.protocol === 'http:' && isPrivateOrLocalHostname(parsed.hostname);
  } catch {
    return false;
  }
}, 'Must be an HTTPS URL, or an HTTP URL on a local/private host.');

const optionalRedisUrlSchema = z.string().trim().optional().refine((value) => {
  if (value === undefined || value.length === 0) return true;
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'redis:' || parsed.protocol === 'rediss:';
  } catch {
    return false;
  }
}, 'Must be a redis:// or rediss:// URL.');

const testDefaults: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'silent',
  PORT: '8000',
  LLM_BASE_URL: 'https://llm.test.invalid/v1',
  LLM_API_KEY: 'test-llm-key',
  CHAT_MODEL: 'test-chat-model',
  ROUTER_MODEL: 'test-router-model',
  LLM_TIMEOUT_MS: '5000',
  LLM_TEMPERATURE: '0.7',
  SESSION_BACKEND: 'memory',
  REDIS_URL: '',
  SESSION_MAX_HISTORY: '5',
  SESSION_EXPIRY_SEC: '3600',
  SESSION_CACHE_TIMEOUT_MS: '500',
  SESSION_SWEEP_INTERVAL_SEC: '300',
  ROUTING_CONFIDENCE_THRESHOLD: '0.3',
};

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['silent', 'debug', 'info', 'warn', 'error']).default('info'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),

    // Any OpenAI-compatible chat-completions endpoint.
    LLM_BASE_URL: llmBaseUrlSchema.default('https://api.openai.com/v1'),
    LLM_API_KEY: z.string().optional(),
    CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
    ROUTER_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_TIMEOUT_MS: z.coerce.number().int().min(1000).max(300000).default(30000),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),

    SESSION_BACKEND: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: optionalRedisUrlSchema,
    SESSION_MAX_HISTORY: z.coerce.number().int().min(1).max(100).default(5),
    SESSION_EXPIRY_SEC: z.coerce.number().int().min(1).default(3600),
    SESSION_CACHE_TIMEOUT_MS: z.coerce.number().int().min(50).max(60000).default(2000),
    // Sessions created without a caller id are only ever removed by the sweep.
    SESSION_SWEEP_INTERVAL_SEC: z.coerce.number().int().min(1).default(300),

    ROUTING_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  })
  .refine(
    (env) => env.SESSION_BACKEND !== 'redis' || (env.REDIS_URL !== undefined && env.REDIS_URL.length > 0),
    { message: 'REDIS_URL is required when SESSION_BACKEND=redis', path: ['REDIS_URL'] },
  );

const mergedEnv = {
  ...(isTestRuntime ? testDefaults : {}),
  ...process.env,
};

const parsed = envSchema.safeParse(mergedEnv);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.format());
  process.exit(1);
}

export const config = {
  ...parsed.data,
  isDev: parsed.data.NODE_ENV === 'development',
  isProd: parsed.data.NODE_ENV === 'production',
};

export type AppConfig = typeof config;
