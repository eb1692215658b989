// course-api/src/index.ts
// Gateway process: JSON routes, the notification stream and (for local runs) an embedded worker.

import { errorMessage } from "../../src/lib/errors";
import { createLogger } from "../../src/lib/logger";
import { flushSentry, initSentry } from "../../src/lib/sentry";
import { loadServerConfig, loadWorkerConfig, type ServerConfig } from "../../src/server/config";
import {
  IdentityResolver,
  SupabaseIdentityProvider,
  SupabaseTenantDirectory,
  TenantIdentityCache,
  type IdentityProvider,
  type TenantDirectory,
} from "../../src/server/identity";
import { SupabaseRealtimeRelay } from "../../src/server/notifications/realtime";
import { createServices, createStores, loadMemorySeed, staticIdentityFromSeed, type MemorySeed } from "../../src/server/runtime";
import { createAdminSupabase } from "../../src/server/store/supabase";
import { startWorker, type WorkerRuntime } from "../../queue-pump/src/runner";
import { createAuthenticator } from "./auth";
import { createRoutes } from "./routes";
import { createGateway } from "./server";

const log = createLogger("course-api");

function identityPorts(config: ServerConfig, seed: MemorySeed): { provider: IdentityProvider; directory: TenantDirectory } {
  if (config.store === "memory" || !config.supabase) {
    const identities = staticIdentityFromSeed(seed);
    return { provider: identities, directory: identities };
  }
  const db = createAdminSupabase(config.supabase.url, config.supabase.serviceRoleKey);
  return { provider: new SupabaseIdentityProvider(db), directory: new SupabaseTenantDirectory(db) };
}

async function main(): Promise<void> {
  const config = loadServerConfig();
  initSentry({ dsn: config.sentryDsn, environment: config.environment });

  const seed = loadMemorySeed(config.memorySeedFile);
  const services = createServices(createStores(config, seed), {
    hub: { bufferSize: config.notificationBufferSize, overflow: config.notificationOverflow },
  });

  const { provider, directory } = identityPorts(config, seed);
  const resolver = new IdentityResolver(provider, directory, new TenantIdentityCache({ ttlMs: config.identityCacheTtlMs }));

  const relay =
    config.realtimeRelay === "supabase" && config.supabase
      ? new SupabaseRealtimeRelay(createAdminSupabase(config.supabase.url, config.supabase.serviceRoleKey), services.hub)
      : null;
  relay?.start();

  const worker: WorkerRuntime | null = config.embeddedWorker ? startWorker(services, loadWorkerConfig()) : null;

  const server = createGateway({
    routes: createRoutes(services),
    authenticate: createAuthenticator(resolver, config.agentToken),
    hub: services.hub,
    corsOrigin: config.corsOrigin,
    heartbeatMs: config.heartbeatMs,
  });

  server.listen(config.port, config.host, () => {
    log.info(`listening on http://${config.host}:${config.port}`, {
      store: config.store,
      embeddedWorker: config.embeddedWorker,
    });
  });

  const shutdown = async (signal: string) => {
    log.info("shutting down", { signal });
    services.hub.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await worker?.stop();
    await relay?.stop();
    await flushSentry();
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

if (require.main === module) {
  main().catch(async (e: unknown) => {
    log.error("fatal", e);
    console.error(`[course-api] fatal: ${errorMessage(e)}`);
    await flushSentry();
    process.exit(1);
  });
}
