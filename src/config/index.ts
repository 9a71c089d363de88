/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to every environment variable the service
 * reads. Invalid configuration fails fast on first access.
 */

import { z } from "zod";

/**
 * Optional string that treats empty values as unset
 */
const optionalString = z
  .union([z.string(), z.undefined()])
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));

const Environment = z.enum(["development", "test", "production"]);

const LLMProvider = z.enum(["anthropic", "openai", "fixtures"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
  }),

  llm: z.object({
    provider: LLMProvider.default("openai"),
    model: optionalString,
    anthropicApiKey: optionalString,
    openaiApiKey: optionalString,
    maxTokens: z.coerce.number().int().min(64).max(8192).default(1500),
    temperature: z.coerce.number().min(0).max(2).default(0.3),
  }),

  validation: z.object({
    concurrency: z.coerce.number().int().min(1).max(64).default(10),
    specialistTimeoutMs: z.coerce.number().int().positive().default(45_000),
    runDeadlineMs: z.coerce.number().int().positive().default(600_000),
    maxAttempts: z.coerce.number().int().min(1).max(5).default(2),
    catalogPath: optionalString,
  }),

  testing: z.object({
    isVitest: z.boolean().default(false),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LLMConfig = Config["llm"];

/**
 * Parse configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      openaiApiKey: env.OPENAI_API_KEY,
      maxTokens: env.LLM_MAX_TOKENS,
      temperature: env.LLM_TEMPERATURE,
    },
    validation: {
      concurrency: env.VALIDATION_CONCURRENCY,
      specialistTimeoutMs: env.VALIDATION_SPECIALIST_TIMEOUT_MS,
      runDeadlineMs: env.VALIDATION_RUN_DEADLINE_MS,
      maxAttempts: env.VALIDATION_MAX_ATTEMPTS,
      catalogPath: env.VALIDATION_CATALOG_PATH,
    },
    testing: {
      isVitest: Boolean(env.VITEST),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${issues}`);
  }

  return result.data;
}

/**
 * Lazily-parsed configuration.
 *
 * ```
 * import { config } from './config/index.js';
 * const port = config.server.port;
 * ```
 *
 * Parsed once on first access and cached thereafter.
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys(_target) {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Get a plain (non-proxy) snapshot of the configuration
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isTest(): boolean {
  return config.server.nodeEnv === "test" || config.testing.isVitest;
}
