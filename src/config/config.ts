import { ConfigError } from '../errors';

export const DEFAULT_API_URL = 'https://api.openai.com/v1/chat/completions';
export const DEFAULT_MODEL = 'gpt-3.5-turbo';
export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_PORT = 4000;

export type AppConfig = {
  apiKey: string;
  model: string;
  temperature: number;
  apiUrl: string;
  timeoutMs: number;
  port: number;
};

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  check: (value: number) => boolean,
  expected: string,
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new ConfigError(`${name} must be ${expected}, got "${raw}".`);
  }
  return value;
}

/**
 * Reads the service configuration from environment variables.
 * Call `dotenv.config()` first when a `.env` file should be honoured.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError(
      'OPENAI_API_KEY is not set. Copy .env.example to .env and add your key.',
    );
  }

  return {
    apiKey,
    model: env.OPENAI_MODEL?.trim() || DEFAULT_MODEL,
    temperature: readNumber(
      env,
      'OPENAI_TEMPERATURE',
      DEFAULT_TEMPERATURE,
      (v) => v >= 0 && v <= 1,
      'a number between 0 and 1',
    ),
    apiUrl: env.OPENAI_API_URL?.trim() || DEFAULT_API_URL,
    timeoutMs: readNumber(
      env,
      'OPENAI_TIMEOUT_MS',
      DEFAULT_TIMEOUT_MS,
      (v) => Number.isInteger(v) && v > 0,
      'a positive integer',
    ),
    port: readNumber(
      env,
      'PORT',
      DEFAULT_PORT,
      (v) => Number.isInteger(v) && v >= 0 && v < 65536,
      'a valid port number',
    ),
  };
}
