import crypto from 'crypto';
import path from 'path';
import { z } from 'zod';
import { AppConfig } from '../types/config.types';

export const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai';

const envSchema = z.object({
  // Server
  PORT: z.string().default('8000').transform(Number).pipe(z.number().int().min(0).max(65535)),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Storage
  USERS_DIR: z.string().min(1).default('./users'),

  // Authentication
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters').optional(),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.string().default('30').transform(Number).pipe(z.number().positive()),
  BCRYPT_ROUNDS: z.string().default('12').transform(Number).pipe(z.number().int().min(4).max(31)),

  // External LLM service
  LLM_BASE_URL: z.string().url().default(GEMINI_OPENAI_BASE_URL),
  LLM_MODEL: z.string().default('gemini-1.5-flash'),
  LLM_PROBE_TIMEOUT_MS: z.string().default('10000').transform(Number).pipe(z.number().positive()),
  LLM_CHAT_TIMEOUT_MS: z.string().default('60000').transform(Number).pipe(z.number().positive()),
  LLM_CIRCUIT_FAILURES: z.string().default('3').transform(Number).pipe(z.number().int().positive()),
  LLM_CIRCUIT_COOLDOWN_MS: z.string().default('60000').transform(Number).pipe(z.number().nonnegative()),

  // Uploads & rate limiting
  MAX_UPLOAD_BYTES: z.string().default(String(20 * 1024 * 1024)).transform(Number).pipe(z.number().int().positive()),
  RATE_LIMIT_WINDOW_MS: z.string().default('60000').transform(Number).pipe(z.number().positive()),
  RATE_LIMIT_MAX: z.string().default('300').transform(Number).pipe(z.number().int().positive()),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOG_FILE: z.string().default('./logs/app.log'),
});

/**
 * Raised when the environment cannot produce a usable configuration.
 * Startup treats it as fatal.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigResult {
  config: AppConfig;
  warnings: string[];
}

/**
 * Build the application configuration from environment variables.
 *
 * Called once at process start; the result is handed to every component
 * constructor. A missing JWT_SECRET is fatal in production. Elsewhere a
 * random per-process secret is generated, so tokens do not survive restarts.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadConfigResult {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment variables: ${issues}`);
  }

  const parsed = result.data;
  const warnings: string[] = [];

  let jwtSecret = parsed.JWT_SECRET;
  if (!jwtSecret) {
    if (parsed.NODE_ENV === 'production') {
      throw new ConfigError('JWT_SECRET must be set in production');
    }
    jwtSecret = crypto.randomBytes(32).toString('hex');
    warnings.push('JWT_SECRET not set; using an ephemeral secret for this process');
  }

  const config: AppConfig = {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    usersDir: path.resolve(parsed.USERS_DIR),
    auth: {
      jwtSecret,
      jwtAlgorithm: parsed.JWT_ALGORITHM,
      accessTokenExpireMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
      bcryptRounds: parsed.BCRYPT_ROUNDS,
    },
    llm: {
      baseUrl: parsed.LLM_BASE_URL.replace(/\/+$/, ''),
      model: parsed.LLM_MODEL,
      probeTimeoutMs: parsed.LLM_PROBE_TIMEOUT_MS,
      chatTimeoutMs: parsed.LLM_CHAT_TIMEOUT_MS,
      circuitFailureThreshold: parsed.LLM_CIRCUIT_FAILURES,
      circuitCooldownMs: parsed.LLM_CIRCUIT_COOLDOWN_MS,
    },
    upload: {
      maxBytes: parsed.MAX_UPLOAD_BYTES,
      rateLimit: {
        windowMs: parsed.RATE_LIMIT_WINDOW_MS,
        max: parsed.RATE_LIMIT_MAX,
      },
    },
    logging: {
      level: parsed.LOG_LEVEL,
      file: parsed.LOG_FILE,
      silent: parsed.NODE_ENV === 'test',
    },
  };

  return { config, warnings };
}
