// queue-pump/src/janitor.ts
// Fails `processing` jobs whose worker stopped checkpointing (crash, OOM, lost host).

import { differenceInMinutes } from "date-fns";
import { isTerminalStatus } from "../../src/lib/types/generation";
import { StaleJobError, errorMessage } from "../../src/lib/errors";
import { createLogger, type Logger } from "../../src/lib/logger";
import type { JobOrchestrator } from "../../src/server/orchestrator";

export interface JanitorOptions {
  orchestrator: JobOrchestrator;
  staleAfterMinutes?: number;
  intervalMs?: number;
  now?: () => Date;
  logger?: Logger;
}

export class StaleJobJanitor {
  private readonly orchestrator: JobOrchestrator;
  private readonly staleAfterMinutes: number;
  private readonly intervalMs: number;
  private readonly now: () => Date;
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(opts: JanitorOptions) {
    this.orchestrator = opts.orchestrator;
    this.staleAfterMinutes = opts.staleAfterMinutes ?? 30;
    this.intervalMs = opts.intervalMs ?? 60_000;
    this.now = opts.now ?? (() => new Date());
    this.log = opts.logger ?? createLogger("janitor");
  }

  /** One pass. Returns the ids of the jobs it failed as stalled. */
  async sweep(): Promise<string[]> {
    const failed: string[] = [];
    const stale = await this.orchestrator.listStale(this.staleAfterMinutes);
    for (const job of stale) {
      if (job.type === "full_course") {
        const children = await this.orchestrator.listChildren(job.id);
        if (children.some((c) => !isTerminalStatus(c.status))) continue;
        // Children may have finished without the parent being folded in.
        const aggregated = await this.orchestrator.aggregateParent(job.id);
        if (aggregated && aggregated.status !== "processing") {
          this.log.info("stale parent aggregated", { jobId: job.id, status: aggregated.status });
          continue;
        }
      }
      const lastSeen = new Date(job.lastHeartbeatAt ?? job.startedAt ?? job.updatedAt);
      const minutes = differenceInMinutes(this.now(), lastSeen);
      const { changed } = await this.orchestrator.fail(
        job.id,
        new StaleJobError(`Job stalled: no checkpoint for ${minutes} minutes`)
      );
      if (changed) {
        failed.push(job.id);
        this.log.warn("stale job failed", { jobId: job.id, type: job.type, minutes });
      }
    }
    return failed;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.sweeping) return;
      this.sweeping = true;
      this.sweep()
        .catch((error: unknown) => this.log.warn("janitor sweep failed", { error: errorMessage(error) }))
        .finally(() => {
          this.sweeping = false;
        });
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}
