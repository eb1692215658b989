// queue-pump/src/runner.ts
// Worker process entry: claim loop + staleness janitor (+ optional realtime relay).

import { errorMessage } from "../../src/lib/errors";
import { createLogger } from "../../src/lib/logger";
import { flushSentry, initSentry } from "../../src/lib/sentry";
import { loadWorkerConfig, type WorkerConfig } from "../../src/server/config";
import { SupabaseRealtimeRelay } from "../../src/server/notifications/realtime";
import { createServices, createStores, loadMemorySeed, type Services } from "../../src/server/runtime";
import { createAdminSupabase } from "../../src/server/store/supabase";
import { createContentProvider } from "./ai";
import { StaleJobJanitor } from "./janitor";
import { createJobRegistry } from "./registry";
import { QueueWorker } from "./worker";

const log = createLogger("queue-worker");

export interface WorkerRuntime {
  worker: QueueWorker;
  janitor: StaleJobJanitor | null;
  stop(): Promise<void>;
}

/** Wire a worker (and janitor) onto existing services. */
export function startWorker(services: Services, config: WorkerConfig): WorkerRuntime {
  const provider = createContentProvider(config.ai);
  const registry = createJobRegistry({
    orchestrator: services.orchestrator,
    approval: services.approval,
    outlines: services.stores.outlines,
    lessons: services.stores.lessons,
    context: services.stores.context,
    provider,
  });
  const worker = new QueueWorker({
    orchestrator: services.orchestrator,
    registry,
    workerId: config.workerId,
    heartbeatMs: config.heartbeatMs,
    idleSleepMs: config.idleSleepMs,
  });
  const janitor = config.runJanitor
    ? new StaleJobJanitor({
        orchestrator: services.orchestrator,
        staleAfterMinutes: config.staleAfterMinutes,
        intervalMs: config.janitorIntervalMs,
      })
    : null;

  worker.start();
  janitor?.start();
  log.info("worker started", { workerId: config.workerId, provider: provider.name, model: provider.model });

  return {
    worker,
    janitor,
    async stop() {
      janitor?.stop();
      await worker.stop();
    },
  };
}

async function main(): Promise<void> {
  const config = loadWorkerConfig();
  initSentry({ dsn: config.sentryDsn, environment: config.environment });

  const stores = createStores(config, loadMemorySeed(config.memorySeedFile));
  const services = createServices(stores, {
    retryPolicy: { baseMs: config.retryBaseMs, maxMs: config.retryMaxMs, jitter: 0.2 },
  });

  const relay =
    config.realtimeRelay === "supabase" && config.supabase
      ? new SupabaseRealtimeRelay(createAdminSupabase(config.supabase.url, config.supabase.serviceRoleKey), services.hub)
      : null;
  relay?.start();

  const runtime = startWorker(services, config);

  const shutdown = async (signal: string) => {
    log.info("shutting down", { signal, processed: runtime.worker.processed });
    await runtime.stop();
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
    console.error(`[queue-worker] fatal: ${errorMessage(e)}`);
    await flushSentry();
    process.exit(1);
  });
}
