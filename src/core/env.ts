/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

import { isAbsolute, join } from 'path';

export type LogLevel = 'silent' | 'debug' | 'info' | 'warn' | 'error';

export interface EnvConfig {
  enableLlm: boolean;
  llmApiKey: string | null;
  llmBaseUrl: string;
  llmModel: string;
  dbPath: string;
  logLevel: LogLevel;
  nodeEnv: 'development' | 'production' | 'test';
}

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'debug', 'info', 'warn', 'error'];
const NODE_ENVS: readonly EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string, required: boolean = false): string | undefined {
  const value = process.env[name];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function isNodeEnv(value: string): value is EnvConfig['nodeEnv'] {
  return (NODE_ENVS as readonly string[]).includes(value);
}

export function resolveDbPath(): string {
  const configured = getEnvVar('SIGNAL_DB_PATH');
  if (!configured) {
    return join(process.cwd(), 'data', 'signal-engine.db');
  }
  return isAbsolute(configured) ? configured : join(process.cwd(), configured);
}

export function loadEnvConfig(): EnvConfig {
  const enableLlm = getEnvVar('ENABLE_LLM') === 'true';

  const nodeEnvRaw = process.env.NODE_ENV || 'development';
  const nodeEnv = isNodeEnv(nodeEnvRaw) ? nodeEnvRaw : 'development';

  const logLevelRaw = getEnvVar('LOG_LEVEL') || (nodeEnv === 'test' ? 'silent' : 'info');
  const logLevel = isLogLevel(logLevelRaw) ? logLevelRaw : 'info';

  return {
    enableLlm,
    llmApiKey: enableLlm ? getEnvVar('LLM_API_KEY', true) ?? null : null,
    llmBaseUrl: getEnvVar('LLM_BASE_URL') || 'https://api.openai.com/v1',
    llmModel: getEnvVar('LLM_MODEL') || 'gpt-4o-mini',
    dbPath: resolveDbPath(),
    logLevel,
    nodeEnv,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
