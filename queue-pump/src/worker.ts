// queue-pump/src/worker.ts
// Claim-then-execute loop. One job at a time per worker; run several workers for parallelism.

import type { GenerationJob } from "../../src/lib/types/generation";
import { errorMessage } from "../../src/lib/errors";
import { createLogger, type Logger } from "../../src/lib/logger";
import type { JobOrchestrator } from "../../src/server/orchestrator";
import { sleep } from "../../src/server/env";
import type { JobRegistry } from "./registry";
import { JobCancelledError, type JobContext } from "./strategies/types";

export type JobRunOutcome = "completed" | "failed" | "retrying" | "cancelled" | "detached";

export interface QueueWorkerOptions {
  orchestrator: JobOrchestrator;
  registry: JobRegistry;
  workerId?: string;
  heartbeatMs?: number;
  idleSleepMs?: number;
  errorSleepMs?: number;
  logger?: Logger;
}

export class QueueWorker {
  private readonly orchestrator: JobOrchestrator;
  private readonly registry: JobRegistry;
  private readonly heartbeatMs: number;
  private readonly idleSleepMs: number;
  private readonly errorSleepMs: number;
  private readonly log: Logger;
  private running = false;
  private loop: Promise<void> | null = null;
  processed = 0;

  constructor(opts: QueueWorkerOptions) {
    this.orchestrator = opts.orchestrator;
    this.registry = opts.registry;
    this.heartbeatMs = opts.heartbeatMs ?? 30_000;
    this.idleSleepMs = opts.idleSleepMs ?? 3_000;
    this.errorSleepMs = opts.errorSleepMs ?? 5_000;
    this.log = (opts.logger ?? createLogger("queue-worker")).child({ workerId: opts.workerId ?? "worker" });
  }

  /** Claim and run one job. Returns "idle" when nothing is due. */
  async runOnce(): Promise<JobRunOutcome | "idle"> {
    const job = await this.orchestrator.claimNext();
    if (!job) return "idle";
    const outcome = await this.processJob(job);
    this.processed += 1;
    return outcome;
  }

  /** Run until the queue has nothing due. Used by tests and one-shot runs. */
  async drain(maxJobs = 1_000): Promise<number> {
    let count = 0;
    while (count < maxJobs && (await this.runOnce()) !== "idle") count += 1;
    return count;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    this.running = false;
    await this.loop;
    this.loop = null;
  }

  private async run(): Promise<void> {
    let idleCount = 0;
    while (this.running) {
      try {
        const outcome = await this.runOnce();
        if (outcome === "idle") {
          idleCount += 1;
          if (idleCount % 20 === 1) this.log.debug("idle: no queued jobs; sleeping");
          await sleep(this.idleSleepMs);
          continue;
        }
        idleCount = 0;
      } catch (error) {
        this.log.error("worker loop error", error);
        await sleep(this.errorSleepMs);
      }
    }
  }

  private async processJob(job: GenerationJob): Promise<JobRunOutcome> {
    const log = this.log.child({ jobId: job.id, action: job.type });
    const executor = this.registry[job.type];

    const beat = () => {
      this.orchestrator.heartbeat(job.id).catch((error: unknown) => {
        log.warn("heartbeat failed", { error: errorMessage(error) });
      });
    };
    const heartbeatTimer = setInterval(beat, this.heartbeatMs);

    const context: JobContext = {
      job,
      log,
      progress: async (step) => {
        await this.orchestrator.reportProgress(job.id, step.percent, step.message);
      },
      checkpoint: async () => {
        if (await this.orchestrator.isCancelled(job.id)) throw new JobCancelledError(job.id);
      },
    };

    try {
      log.info("job started", { attempt: job.retryCount + 1, maxRetries: job.maxRetries });
      const outcome = await executor.execute(context);
      if (outcome.kind === "detached") {
        log.info("job detached; children will finish it", { children: outcome.childJobIds.length });
        return "detached";
      }
      const { job: finished, changed } = await this.orchestrator.complete(job.id, {
        result: outcome.result,
        tokensUsed: outcome.tokensUsed,
        message: outcome.message,
      });
      if (!changed) log.info("completion ignored; job already terminal", { status: finished.status });
      return finished.status === "completed" ? "completed" : "cancelled";
    } catch (error) {
      if (error instanceof JobCancelledError) {
        log.info("job cancelled at checkpoint");
        return "cancelled";
      }
      const { job: after } = await this.orchestrator.fail(job.id, error);
      if (after.status === "queued") return "retrying";
      return after.status === "failed" ? "failed" : "cancelled";
    } finally {
      clearInterval(heartbeatTimer);
    }
  }
}
