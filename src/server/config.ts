import dotenv from 'dotenv';
import { env, parseBoolEnv, parseEnumEnv, parseIntEnv, requireEnv } from './env';

dotenv.config();

export type StoreKind = 'supabase' | 'memory';
export type RealtimeRelayKind = 'supabase' | 'none';

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
}

export interface CommonConfig {
  store: StoreKind;
  supabase: SupabaseSettings | null;
  sentryDsn?: string;
  environment: string;
  realtimeRelay: RealtimeRelayKind;
  /** JSON file with audiences, knowledge and members for `STORE=memory` runs. */
  memorySeedFile?: string;
}

export interface ServerConfig extends CommonConfig {
  host: string;
  port: number;
  agentToken?: string;
  heartbeatMs: number;
  notificationBufferSize: number;
  notificationOverflow: 'drop-oldest' | 'disconnect';
  identityCacheTtlMs: number;
  corsOrigin: string;
  /** Run a worker inside the gateway process (always on for `STORE=memory`). */
  embeddedWorker: boolean;
}

export type AIProviderKind = 'anthropic' | 'openai' | 'fake';

export interface AIConfig {
  provider: AIProviderKind;
  apiKey: string | null;
  model: string;
  timeoutMs: number;
}

export interface WorkerConfig extends CommonConfig {
  ai: AIConfig;
  workerId: string;
  idleSleepMs: number;
  heartbeatMs: number;
  retryBaseMs: number;
  retryMaxMs: number;
  staleAfterMinutes: number;
  janitorIntervalMs: number;
  runJanitor: boolean;
}

function loadCommon(): CommonConfig {
  const store = parseEnumEnv<StoreKind>('STORE', ['supabase', 'memory'], 'supabase');
  return {
    store,
    supabase:
      store === 'supabase'
        ? { url: requireEnv('SUPABASE_URL'), serviceRoleKey: requireEnv('SUPABASE_SERVICE_ROLE_KEY') }
        : null,
    sentryDsn: env('SENTRY_DSN'),
    environment: env('NODE_ENV') || 'production',
    realtimeRelay: parseEnumEnv<RealtimeRelayKind>('REALTIME_RELAY', ['supabase', 'none'], 'none'),
    memorySeedFile: env('MEMORY_SEED_FILE'),
  };
}

export function loadServerConfig(): ServerConfig {
  const common = loadCommon();
  return {
    ...common,
    host: env('COURSE_API_HOST') || '127.0.0.1',
    port: parseIntEnv('COURSE_API_PORT', 4100, 1, 65535),
    agentToken: env('AGENT_TOKEN'),
    heartbeatMs: parseIntEnv('NOTIFICATION_HEARTBEAT_MS', 15_000, 1_000, 120_000),
    notificationBufferSize: parseIntEnv('NOTIFICATION_BUFFER_SIZE', 10, 1, 1_000),
    notificationOverflow: parseEnumEnv('NOTIFICATION_OVERFLOW', ['drop-oldest', 'disconnect'], 'drop-oldest'),
    identityCacheTtlMs: parseIntEnv('IDENTITY_CACHE_TTL_MS', 60 * 60 * 1000, 1_000, 24 * 60 * 60 * 1000),
    corsOrigin: env('CORS_ORIGIN') || '*',
    embeddedWorker: common.store === 'memory' || parseBoolEnv('COURSE_API_EMBEDDED_WORKER', false),
  };
}

const AI_PROVIDERS: readonly AIProviderKind[] = ['anthropic', 'openai', 'fake'];

function pickProvider(): AIProviderKind {
  if (env('AI_PROVIDER')) return parseEnumEnv('AI_PROVIDER', AI_PROVIDERS, 'fake');
  if (env('ANTHROPIC_API_KEY')) return 'anthropic';
  if (env('OPENAI_API_KEY')) return 'openai';
  throw new Error('BLOCKED: AI_PROVIDER is REQUIRED (anthropic, openai or fake)');
}

export function loadAIConfig(): AIConfig {
  const provider = pickProvider();
  const timeoutMs = parseIntEnv('AI_TIMEOUT_MS', 110_000, 1_000, 10 * 60_000);
  switch (provider) {
    case 'anthropic':
      return {
        provider,
        apiKey: requireEnv('ANTHROPIC_API_KEY'),
        model: env('ANTHROPIC_MODEL') || 'claude-sonnet-4-5',
        timeoutMs,
      };
    case 'openai':
      return { provider, apiKey: requireEnv('OPENAI_API_KEY'), model: env('OPENAI_MODEL') || 'gpt-4o-mini', timeoutMs };
    case 'fake':
      return { provider, apiKey: null, model: 'fake', timeoutMs };
  }
}

export function loadWorkerConfig(): WorkerConfig {
  return {
    ...loadCommon(),
    ai: loadAIConfig(),
    workerId: env('QUEUE_PUMP_WORKER_ID') || `worker-${process.pid}`,
    idleSleepMs: parseIntEnv('QUEUE_PUMP_IDLE_SLEEP_MS', 3_000, 100, 120_000),
    heartbeatMs: parseIntEnv('QUEUE_PUMP_HEARTBEAT_MS', 30_000, 1_000, 120_000),
    retryBaseMs: parseIntEnv('QUEUE_PUMP_RETRY_BASE_MS', 30_000, 1_000, 60 * 60 * 1000),
    retryMaxMs: parseIntEnv('QUEUE_PUMP_RETRY_MAX_MS', 10 * 60_000, 5_000, 24 * 60 * 60 * 1000),
    staleAfterMinutes: parseIntEnv('JOB_STALE_AFTER_MINUTES', 30, 1, 24 * 60),
    janitorIntervalMs: parseIntEnv('JANITOR_INTERVAL_MS', 60_000, 1_000, 60 * 60 * 1000),
    runJanitor: parseBoolEnv('QUEUE_PUMP_RUN_JANITOR', true),
  };
}
