import dotenv from 'dotenv';
import { ValidationError } from './errors';

export type AIProvider = 'groq' | 'openai';

export interface AppConfig {
  port: number;
  mongoUri: string | undefined;
  storeCollection: string;
  listLimit: number;
  batchMaxRetries: number;
  batchRetryDelayMs: number;
  corsOrigins: string[];
  ai: {
    provider: AIProvider;
    apiKey: string | undefined;
    model: string;
    baseURL: string;
  };
}

const AI_DEFAULTS: Record<AIProvider, { model: string; baseURL: string }> = {
  groq: { model: 'llama3-8b-8192', baseURL: 'https://api.groq.com/openai/v1' },
  openai: { model: 'gpt-3.5-turbo', baseURL: 'https://api.openai.com/v1' },
};

type Env = Record<string, string | undefined>;

export function loadEnvFile(): void {
  dotenv.config();
}

export function loadConfig(env: Env = process.env): AppConfig {
  const provider = readProvider(env.AI_PROVIDER);
  const defaults = AI_DEFAULTS[provider];

  return {
    port: readInteger(env, 'PORT', 3001, 1),
    mongoUri: nonEmpty(env.MONGO_URI),
    storeCollection: nonEmpty(env.STORE_COLLECTION) ?? 'finance_items',
    listLimit: readInteger(env, 'LIST_LIMIT', 1000, 1),
    batchMaxRetries: readInteger(env, 'BATCH_MAX_RETRIES', 3, 1),
    batchRetryDelayMs: readInteger(env, 'BATCH_RETRY_DELAY_MS', 100, 0),
    corsOrigins: (nonEmpty(env.FRONTEND_URL) ?? 'http://localhost:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    ai: {
      provider,
      apiKey: nonEmpty(env.AI_API_KEY),
      model: nonEmpty(env.AI_MODEL) ?? defaults.model,
      baseURL: nonEmpty(env.AI_BASE_URL) ?? defaults.baseURL,
    },
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readProvider(value: string | undefined): AIProvider {
  const provider = nonEmpty(value)?.toLowerCase() ?? 'groq';
  if (provider !== 'groq' && provider !== 'openai') {
    throw new ValidationError(`AI_PROVIDER must be "groq" or "openai", got "${provider}"`);
  }
  return provider;
}

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = nonEmpty(env[name]);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}
