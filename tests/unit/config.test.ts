import { loadAIConfig, loadServerConfig, loadWorkerConfig } from '../../src/server/config';
import { parseEnumEnv, parseIntEnv } from '../../src/server/env';

describe('config loading', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    for (const key of [
      'STORE',
      'SUPABASE_URL',
      'SUPABASE_SERVICE_ROLE_KEY',
      'AI_PROVIDER',
      'ANTHROPIC_API_KEY',
      'OPENAI_API_KEY',
      'NOTIFICATION_OVERFLOW',
      'NOTIFICATION_HEARTBEAT_MS',
      'COURSE_API_PORT',
      'COURSE_API_EMBEDDED_WORKER',
      'REALTIME_RELAY',
      'JOB_STALE_AFTER_MINUTES',
    ]) {
      delete process.env[key];
    }
  });

  afterAll(() => {
    process.env = saved;
  });

  it('requires Supabase credentials unless the memory store is selected', () => {
    expect(() => loadServerConfig()).toThrow('BLOCKED: SUPABASE_URL is REQUIRED');

    process.env.STORE = 'Memory';
    const config = loadServerConfig();
    expect(config.store).toBe('memory');
    expect(config.supabase).toBeNull();
    expect(config.embeddedWorker).toBe(true);
    expect(config.heartbeatMs).toBe(15_000);
    expect(config.identityCacheTtlMs).toBe(3_600_000);
    expect(config.notificationOverflow).toBe('drop-oldest');
  });

  it('rejects enum values outside the allowed set', () => {
    process.env.STORE = 'memory';
    process.env.NOTIFICATION_OVERFLOW = 'block';
    expect(() => loadServerConfig()).toThrow(
      'BLOCKED: NOTIFICATION_OVERFLOW must be one of drop-oldest, disconnect (got "block")'
    );
  });

  it('clamps numeric settings', () => {
    process.env.STORE = 'memory';
    process.env.COURSE_API_PORT = '99999';
    process.env.NOTIFICATION_HEARTBEAT_MS = 'soon';
    const config = loadServerConfig();
    expect(config.port).toBe(65535);
    expect(config.heartbeatMs).toBe(15_000);
  });

  it('infers the AI provider from the available key', () => {
    expect(() => loadAIConfig()).toThrow('BLOCKED: AI_PROVIDER is REQUIRED (anthropic, openai or fake)');

    process.env.OPENAI_API_KEY = 'test-key';
    expect(loadAIConfig()).toEqual({ provider: 'openai', apiKey: 'test-key', model: 'gpt-4o-mini', timeoutMs: 110_000 });

    process.env.AI_PROVIDER = 'fake';
    expect(loadAIConfig().apiKey).toBeNull();
  });

  it('builds the worker defaults', () => {
    process.env.STORE = 'memory';
    process.env.AI_PROVIDER = 'fake';
    const config = loadWorkerConfig();
    expect(config.staleAfterMinutes).toBe(30);
    expect(config.retryBaseMs).toBe(30_000);
    expect(config.retryMaxMs).toBe(600_000);
    expect(config.runJanitor).toBe(true);
  });
});

describe('env helpers', () => {
  afterEach(() => {
    delete process.env.TEST_LEVEL;
  });

  it('parses enums case-insensitively and defaults when unset', () => {
    expect(parseEnumEnv('TEST_LEVEL', ['low', 'high'], 'low')).toBe('low');
    process.env.TEST_LEVEL = ' HIGH ';
    expect(parseEnumEnv('TEST_LEVEL', ['low', 'high'], 'low')).toBe('high');
  });

  it('clamps integers into range', () => {
    process.env.TEST_LEVEL = '-5';
    expect(parseIntEnv('TEST_LEVEL', 10, 1, 100)).toBe(1);
  });
});
