import { loadConfig, DEFAULT_DOCUMENT_API_BASE_URL } from '../src/config';
import { ConfigError } from '../src/domain/errors';
import { LogLevel } from '../src/logger';

describe('loadConfig', () => {
  test('requires the document API key', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ DOCUMENT_API_KEY: '   ' })).toThrow('DOCUMENT_API_KEY is required');
  });

  test('applies defaults', () => {
    expect(loadConfig({ DOCUMENT_API_KEY: 'test-secret' })).toEqual({
      documentApiKey: 'test-secret',
      documentApiBaseUrl: DEFAULT_DOCUMENT_API_BASE_URL,
      executionTimeoutMs: 1_800_000,
      ingestionPolling: { maxWaitMs: 300_000, pollIntervalMs: 2_000 },
      analysisPolling: { maxWaitMs: 300_000, pollIntervalMs: 5_000 },
      workflowTtlMs: 86_400_000,
      chatModel: 'alfred-4.2',
      port: 8000,
      logLevel: LogLevel.Info,
    });
  });

  test('reads overrides in seconds', () => {
    const config = loadConfig({
      DOCUMENT_API_KEY: 'test-secret',
      DOCUMENT_API_BASE_URL: 'http://localhost:9000/',
      EXECUTION_TIMEOUT_SECONDS: '90',
      ANALYSIS_POLL_INTERVAL_SECONDS: '0.5',
      PORT: '0',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.documentApiBaseUrl).toBe('http://localhost:9000');
    expect(config.executionTimeoutMs).toBe(90_000);
    expect(config.analysisPolling).toEqual({ maxWaitMs: 300_000, pollIntervalMs: 500 });
    expect(config.port).toBe(0);
    expect(config.logLevel).toBe(LogLevel.Debug);
  });

  test.each([
    ['EXECUTION_TIMEOUT_SECONDS', 'soon'],
    ['INGESTION_MAX_WAIT_SECONDS', '-1'],
    ['PORT', '70000'],
    ['LOG_LEVEL', 'verbose'],
    ['INGESTION_POLL_INTERVAL_SECONDS', '0'],
    ['ANALYSIS_POLL_INTERVAL_SECONDS', '0'],
  ])('rejects %s=%s', (name, value) => {
    expect(() => loadConfig({ DOCUMENT_API_KEY: 'test-secret', [name]: value })).toThrow(ConfigError);
  });

  test('a zero poll interval names the variable', () => {
    expect(() => loadConfig({ DOCUMENT_API_KEY: 'test-secret', INGESTION_POLL_INTERVAL_SECONDS: '0' })).toThrow(
      'INGESTION_POLL_INTERVAL_SECONDS must be a positive number of seconds, got "0"',
    );
  });

  test('a zero wait budget stays allowed', () => {
    const config = loadConfig({ DOCUMENT_API_KEY: 'test-secret', INGESTION_MAX_WAIT_SECONDS: '0' });
    expect(config.ingestionPolling).toEqual({ maxWaitMs: 0, pollIntervalMs: 2_000 });
  });
});
