import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { normalizeLogLevel, type LogLevel } from './logger';

const ENV_PREFIX = 'JOB_ASSISTANT_';

export const modelConfigSchema = z.object({
  name: z.string().trim().min(1, 'Model name cannot be empty'),
  provider: z.literal('ollama').default('ollama'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().optional(),
  timeout: z.number().int().positive().default(60),
});

export type ModelConfig = Readonly<z.infer<typeof modelConfigSchema>>;

const list = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((raw) =>
      raw === undefined ? fallback : raw.split(',').map((item) => item.trim()).filter(Boolean),
    );

const flag = z
  .string()
  .optional()
  .transform((raw) => raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase()));

const settingsSchema = z
  .object({
    APP_NAME: z.string().default('Job Application Assistant'),
    APP_VERSION: z.string().default('1.0.0'),
    DEBUG: flag,
    LOG_LEVEL: z.string().optional(),
    OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
    OLLAMA_TIMEOUT: z.coerce.number().int().positive().default(60),
    PRIMARY_MODEL_NAME: z.string().trim().min(1).default('llama3.1:8b'),
    FALLBACK_MODEL_NAMES: list(['gemma2:9b', 'qwen2.5:7b']),
    MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    MODEL_MAX_TOKENS: z.coerce.number().int().positive().optional(),
    PORT: z.coerce.number().int().positive().max(65535).default(3000),
    MAX_FILE_SIZE_MB: z.coerce.number().int().positive().default(10),
    ALLOWED_FILE_TYPES: list(['.pdf', '.docx', '.txt', '.md']),
    MIN_CONTENT_LENGTH: z.coerce.number().int().positive().default(100),
    MAX_CONTENT_LENGTH: z.coerce.number().int().positive().default(5000),
  })
  .transform((env) => {
    const debug = env.DEBUG;
    const logLevel: LogLevel = normalizeLogLevel(env.LOG_LEVEL) ?? (debug ? 'debug' : 'info');
    return {
      appName: env.APP_NAME,
      appVersion: env.APP_VERSION,
      debug,
      logLevel,
      ollamaBaseUrl: env.OLLAMA_BASE_URL.replace(/\/+$/, ''),
      ollamaTimeout: env.OLLAMA_TIMEOUT,
      primaryModelName: env.PRIMARY_MODEL_NAME,
      fallbackModelNames: env.FALLBACK_MODEL_NAMES,
      modelTemperature: env.MODEL_TEMPERATURE,
      modelMaxTokens: env.MODEL_MAX_TOKENS,
      port: env.PORT,
      maxFileSizeMb: env.MAX_FILE_SIZE_MB,
      allowedFileTypes: env.ALLOWED_FILE_TYPES.map((type) => type.toLowerCase()),
      minContentLength: env.MIN_CONTENT_LENGTH,
      maxContentLength: env.MAX_CONTENT_LENGTH,
    };
  });

export type Settings = Readonly<z.output<typeof settingsSchema>>;

/**
 * Build settings from an environment record. Only `JOB_ASSISTANT_*` keys are read;
 * the prefix is stripped before validation.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const scoped: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && key.toUpperCase().startsWith(ENV_PREFIX)) {
      scoped[key.toUpperCase().slice(ENV_PREFIX.length)] = value;
    }
  }

  const parsed = settingsSchema.safeParse(scoped);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${ENV_PREFIX}${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid configuration', issues.join('; '));
  }

  const settings = parsed.data;
  const badType = settings.allowedFileTypes.find((type) => !type.startsWith('.'));
  if (badType !== undefined) {
    throw new ConfigurationError(`File type must start with '.': ${badType}`);
  }
  if (settings.minContentLength >= settings.maxContentLength) {
    throw new ConfigurationError('minContentLength must be less than maxContentLength');
  }
  return settings;
}

/** Read `.env` into process.env (existing variables win), then load settings. */
export function loadSettingsFromEnv(): Settings {
  dotenv.config();
  return loadSettings(process.env);
}

function buildModelConfig(settings: Settings, name: string): ModelConfig {
  const parsed = modelConfigSchema.safeParse({
    name,
    provider: 'ollama',
    temperature: settings.modelTemperature,
    maxTokens: settings.modelMaxTokens,
    timeout: settings.ollamaTimeout,
  });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid model configuration for "${name}"`, parsed.error.issues[0]?.message);
  }
  return Object.freeze(parsed.data);
}

export function primaryModelConfig(settings: Settings): ModelConfig {
  return buildModelConfig(settings, settings.primaryModelName);
}

export function fallbackModelConfigs(settings: Settings): ModelConfig[] {
  return settings.fallbackModelNames.map((name) => buildModelConfig(settings, name));
}
