import dotenv from 'dotenv';
import { ConfigError } from './errors';

export interface AppConfig {
  llm: {
    apiKey: string;
    baseURL?: string;
    model: string;
    temperature: number;
    chatMaxTokens: number;
  };
  embedding: {
    apiKey: string;
    baseURL?: string;
    model: string;
  };
  server: {
    host: string;
    port: number;
  };
  uploadDir: string;
}

// Chunking and retrieval are fixed, not environment driven
export const CHUNK_SIZE = 1000;
export const CHUNK_OVERLAP = 200;
export const RETRIEVER_TOP_K = 4;
export const HISTORY_LIMIT = 5;

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseNumber(env: Env, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`Invalid ${name}`, `Expected a number, got "${raw}"`);
  }
  return value;
}

function parseInteger(env: Env, name: string, fallback: number, min: number, max: number): number {
  const value = parseNumber(env, name, fallback);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`Invalid ${name}`, `Expected an integer between ${min} and ${max}, got ${value}`);
  }
  return value;
}

/**
 * Build the application config from environment variables.
 * Throws ConfigError when the LLM credential is missing so the process fails at startup.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = optional(env, 'OPENAI_API_KEY');
  if (!apiKey) {
    throw new ConfigError('OPENAI_API_KEY is not set', 'An API key for the LLM service is required to start the server');
  }
  const baseURL = optional(env, 'OPENAI_BASE_URL');

  return {
    llm: {
      apiKey,
      baseURL,
      model: optional(env, 'LLM_MODEL') || 'gpt-4o-mini',
      temperature: parseNumber(env, 'LLM_TEMPERATURE', 0.5),
      chatMaxTokens: parseInteger(env, 'CHAT_MAX_TOKENS', 512, 1, 1_000_000),
    },
    embedding: {
      apiKey: optional(env, 'EMBEDDING_API_KEY') || apiKey,
      baseURL: optional(env, 'EMBEDDING_BASE_URL') || baseURL,
      model: optional(env, 'EMBEDDING_MODEL') || 'text-embedding-3-small',
    },
    server: {
      host: optional(env, 'HOST') || '0.0.0.0',
      port: parseInteger(env, 'PORT', 7860, 0, 65535),
    },
    uploadDir: optional(env, 'UPLOAD_DIR') || 'pdfs',
  };
}

export function loadEnvFile(): void {
  dotenv.config();
}
