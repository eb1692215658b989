import type { GenerationJob, GenerationJobType } from "../../../src/lib/types/generation";
import type { ProgressCheckpoint } from "../../../src/lib/pipeline/progress";
import type { Logger } from "../../../src/lib/logger";
import type { ApprovalGate } from "../../../src/server/approval";
import type { JobOrchestrator } from "../../../src/server/orchestrator";
import type { CourseContextStore, LessonStore, OutlineStore } from "../../../src/server/store/types";
import type { ContentProvider } from "../ai";

/** Thrown from a checkpoint once the job has been cancelled. */
export class JobCancelledError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} was cancelled`);
    this.name = "JobCancelledError";
  }
}

export interface JobContext {
  job: GenerationJob;
  log: Logger;
  /** Record progress; regressions are ignored by the orchestrator. */
  progress(step: ProgressCheckpoint): Promise<void>;
  /** Cooperative cancellation point. @throws JobCancelledError */
  checkpoint(): Promise<void>;
}

export type ExecutionOutcome =
  | { kind: "completed"; result: unknown; tokensUsed: number; message: string }
  /** The job stays `processing`; its children finish it. */
  | { kind: "detached"; childJobIds: string[] };

export interface JobExecutor {
  readonly type: GenerationJobType;
  execute(context: JobContext): Promise<ExecutionOutcome>;
}

export interface ExecutorDeps {
  orchestrator: JobOrchestrator;
  approval: ApprovalGate;
  outlines: OutlineStore;
  lessons: LessonStore;
  context: CourseContextStore;
  provider: ContentProvider;
  now?: () => Date;
}
