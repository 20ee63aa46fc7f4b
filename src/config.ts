/**
 * Service configuration from environment variables.
 *
 * `DOCUMENT_API_KEY` is mandatory; every other setting has a default.
 * Invalid values fail at startup with ConfigError, never per call.
 */

import { ConfigError } from './domain/errors';
import { PollingSchedule } from './domain/async-polling';
import { LogLevel, parseLogLevel } from './logger';

export const DEFAULT_DOCUMENT_API_BASE_URL = 'https://paradigm.lighton.ai';
export const DEFAULT_CHAT_MODEL = 'alfred-4.2';

export interface AppConfig {
  documentApiKey: string;
  documentApiBaseUrl: string;
  /** Outer wall-clock budget for one execution. */
  executionTimeoutMs: number;
  ingestionPolling: PollingSchedule;
  analysisPolling: PollingSchedule;
  /** Expiry for stored workflows and execution records. */
  workflowTtlMs: number;
  chatModel: string;
  port: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function readSeconds(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback * 1000;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number of seconds, got "${raw}"`, {
      variable: name,
    });
  }
  return Math.round(value * 1000);
}

/** Poll intervals must be positive so status loops always sleep between checks. */
function readInterval(env: Env, name: string, fallback: number): number {
  const ms = readSeconds(env, name, fallback);
  if (ms <= 0) {
    throw new ConfigError(`${name} must be a positive number of seconds, got "${env[name] ?? ''}"`, {
      variable: name,
    });
  }
  return ms;
}

function readPort(env: Env): number {
  const raw = env.PORT;
  if (raw === undefined || raw.trim() === '') return 8000;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 0 and 65535, got "${raw}"`, { variable: 'PORT' });
  }
  return port;
}

/** Build the configuration, throwing ConfigError on missing or malformed values. */
export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = env.DOCUMENT_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError('DOCUMENT_API_KEY is required', { variable: 'DOCUMENT_API_KEY' });
  }

  let logLevel = LogLevel.Info;
  if (env.LOG_LEVEL !== undefined && env.LOG_LEVEL.trim() !== '') {
    const parsed = parseLogLevel(env.LOG_LEVEL);
    if (parsed === undefined) {
      throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error; got "${env.LOG_LEVEL}"`, {
        variable: 'LOG_LEVEL',
      });
    }
    logLevel = parsed;
  }

  return {
    documentApiKey: apiKey,
    documentApiBaseUrl: (env.DOCUMENT_API_BASE_URL?.trim() || DEFAULT_DOCUMENT_API_BASE_URL).replace(/\/+$/, ''),
    executionTimeoutMs: readSeconds(env, 'EXECUTION_TIMEOUT_SECONDS', 1800),
    ingestionPolling: {
      maxWaitMs: readSeconds(env, 'INGESTION_MAX_WAIT_SECONDS', 300),
      pollIntervalMs: readInterval(env, 'INGESTION_POLL_INTERVAL_SECONDS', 2),
    },
    analysisPolling: {
      maxWaitMs: readSeconds(env, 'ANALYSIS_MAX_WAIT_SECONDS', 300),
      pollIntervalMs: readInterval(env, 'ANALYSIS_POLL_INTERVAL_SECONDS', 5),
    },
    workflowTtlMs: readSeconds(env, 'WORKFLOW_TTL_SECONDS', 86400),
    chatModel: env.CHAT_MODEL?.trim() || DEFAULT_CHAT_MODEL,
    port: readPort(env),
    logLevel,
  };
}
