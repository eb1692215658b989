/**
 * Job Orchestrator
 *
 * Owns the GenerationJob state machine:
 *
 *   queued -> processing -> completed | failed
 *   queued | processing -> cancelled
 *
 * Every transition is a compare-and-set on the stored status, so late or
 * duplicate worker callbacks lose the race and turn into no-ops.
 */

import { v4 as uuidv4 } from 'uuid';
import { addMilliseconds, subMinutes } from 'date-fns';
import {
  isTerminalStatus,
  type GenerationJob,
  type GenerationJobStatus,
  type GenerationJobType,
  type RequestContext,
} from '../lib/types/generation';
import { JobPayloadSchemas, parseOrThrow, type JobPayloadByType } from '../lib/schemas/generation';
import { NotFoundError, PreconditionError, errorMessage, isRetryableError } from '../lib/errors';
import { createLogger, type Logger } from '../lib/logger';
import { PARENT_FANOUT_PERCENT, parentProgressMessage } from '../lib/pipeline/progress';
import { computeRetryDelayMs, DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry';
import { isRecord } from './env';
import type { JobListFilter, JobStore } from './store/types';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;

export interface JobNotifier {
  notifyJobTransition(job: GenerationJob): Promise<unknown>;
}

export interface OrchestratorOptions {
  jobs: JobStore;
  notifier?: JobNotifier;
  logger?: Logger;
  now?: () => Date;
  retryPolicy?: RetryPolicy;
  random?: () => number;
  defaultMaxRetries?: number;
}

export interface SubmitOptions {
  parentJobId?: string;
  maxRetries?: number;
}

export interface TransitionResult {
  job: GenerationJob;
  /** False when the job was already terminal (or lost a race) and nothing was written. */
  changed: boolean;
}

export interface CompletionOutcome {
  result?: unknown;
  tokensUsed?: number;
  message?: string;
}

export type JobQuery = Omit<JobListFilter, 'limit'> & { limit?: number };

const ACTIVE: readonly GenerationJobStatus[] = ['queued', 'processing'];

function clampPercent(percent: number): number {
  if (!Number.isFinite(percent)) return 0;
  return Math.min(100, Math.max(0, Math.round(percent)));
}

function readString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value ? value : null;
}

/** Lessons recorded on a full_course job by `recordFanOut`. */
function fannedOutLessonIds(result: unknown): string[] | null {
  if (!isRecord(result) || !Array.isArray(result.outlineLessonIds)) return null;
  return result.outlineLessonIds.filter((id): id is string => typeof id === 'string');
}

export class JobOrchestrator {
  private readonly jobs: JobStore;
  private readonly notifier?: JobNotifier;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly retryPolicy: RetryPolicy;
  private readonly random: () => number;
  private readonly defaultMaxRetries: number;

  constructor(opts: OrchestratorOptions) {
    this.jobs = opts.jobs;
    this.notifier = opts.notifier;
    this.log = opts.logger ?? createLogger('orchestrator');
    this.now = opts.now ?? (() => new Date());
    this.retryPolicy = opts.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.random = opts.random ?? Math.random;
    this.defaultMaxRetries = opts.defaultMaxRetries ?? DEFAULT_MAX_RETRIES;
  }

  /**
   * Validate the payload for its job type and create a `queued` job.
   * @throws ValidationError when the payload misses type-specific fields
   */
  async submit<T extends GenerationJobType>(
    type: T,
    ctx: RequestContext,
    payload: unknown,
    opts: SubmitOptions = {}
  ): Promise<GenerationJob> {
    const parsed: JobPayloadByType[T] = parseOrThrow(JobPayloadSchemas[type], payload, `${type} payload`);
    const fields: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));

    if (opts.parentJobId) {
      await this.get(opts.parentJobId, ctx.tenantId);
    }

    const nowIso = this.now().toISOString();
    const job: GenerationJob = {
      id: uuidv4(),
      tenantId: ctx.tenantId,
      createdByUserId: ctx.userId,
      type,
      status: 'queued',
      parentJobId: opts.parentJobId ?? null,
      courseId: readString(fields, 'courseId'),
      lessonId: readString(fields, 'lessonId'),
      outlineLessonId: readString(fields, 'outlineLessonId'),
      smeId: readString(fields, 'smeId'),
      payload: fields,
      progressPercent: 0,
      progressMessage: 'Queued',
      retryCount: 0,
      maxRetries: Math.max(1, opts.maxRetries ?? (type === 'full_course' ? 1 : this.defaultMaxRetries)),
      errorMessage: null,
      tokensUsed: 0,
      result: null,
      nextAttemptAt: null,
      lastHeartbeatAt: null,
      createdAt: nowIso,
      startedAt: null,
      completedAt: null,
      updatedAt: nowIso,
    };

    const created = await this.jobs.insert(job);
    this.log.info('job submitted', { jobId: created.id, type, tenantId: ctx.tenantId, parentJobId: created.parentJobId });
    return created;
  }

  /**
   * @throws NotFoundError when the job is missing or belongs to another tenant
   */
  async get(id: string, tenantId?: string): Promise<GenerationJob> {
    const job = await this.jobs.get(id);
    if (!job || (tenantId !== undefined && job.tenantId !== tenantId)) {
      throw new NotFoundError(`Job not found: ${id}`);
    }
    return job;
  }

  list(query: JobQuery): Promise<GenerationJob[]> {
    const limit = Math.min(Math.max(1, Math.floor(query.limit ?? DEFAULT_LIST_LIMIT)), MAX_LIST_LIMIT);
    return this.jobs.list({ ...query, limit });
  }

  claimNext(): Promise<GenerationJob | null> {
    return this.jobs.claimNext(this.now());
  }

  /**
   * Record worker progress. Ignored unless the job is `processing` and the new
   * percent is not below the stored one.
   */
  async reportProgress(id: string, percent: number, message: string): Promise<GenerationJob | null> {
    const pct = clampPercent(percent);
    const nowIso = this.now().toISOString();
    const updated = await this.jobs.update(
      id,
      { statuses: ['processing'], progressAtMost: pct },
      { progressPercent: pct, progressMessage: message, lastHeartbeatAt: nowIso, updatedAt: nowIso }
    );
    if (!updated) {
      this.log.debug('progress update ignored', { jobId: id, percent: pct });
      return null;
    }
    if (updated.parentJobId) await this.aggregateParent(updated.parentJobId);
    return updated;
  }

  async heartbeat(id: string): Promise<boolean> {
    const nowIso = this.now().toISOString();
    const updated = await this.jobs.update(id, { statuses: ['processing'] }, { lastHeartbeatAt: nowIso });
    return updated !== null;
  }

  /** Worker checkpoint. A missing job counts as cancelled. */
  async isCancelled(id: string): Promise<boolean> {
    const job = await this.jobs.get(id);
    return !job || job.status === 'cancelled';
  }

  async complete(id: string, outcome: CompletionOutcome = {}): Promise<TransitionResult> {
    const current = await this.get(id);
    if (isTerminalStatus(current.status)) return { job: current, changed: false };
    if (current.status !== 'processing') {
      throw new PreconditionError(`Job ${id} is ${current.status}; only processing jobs can complete`);
    }

    const nowIso = this.now().toISOString();
    const updated = await this.jobs.update(
      id,
      { statuses: ['processing'] },
      {
        status: 'completed',
        progressPercent: 100,
        progressMessage: outcome.message ?? 'Completed',
        result: outcome.result ?? null,
        tokensUsed: current.tokensUsed + (outcome.tokensUsed ?? 0),
        errorMessage: null,
        completedAt: nowIso,
        lastHeartbeatAt: nowIso,
        updatedAt: nowIso,
      }
    );
    if (!updated) return { job: await this.get(id), changed: false };

    this.log.info('job completed', { jobId: id, type: updated.type });
    await this.afterTerminal(updated);
    return { job: updated, changed: true };
  }

  /**
   * Record a failed attempt. Retryable errors re-queue the job with backoff
   * until `maxRetries` attempts have run; anything else fails it at once.
   */
  async fail(id: string, error: unknown): Promise<TransitionResult> {
    const current = await this.get(id);
    if (isTerminalStatus(current.status)) return { job: current, changed: false };
    if (current.status !== 'processing') {
      throw new PreconditionError(`Job ${id} is ${current.status}; only processing jobs can fail`);
    }

    const message = errorMessage(error) || 'Unknown error';
    const attempt = current.retryCount + 1;
    const now = this.now();
    const nowIso = now.toISOString();

    if (isRetryableError(error) && attempt < current.maxRetries) {
      const delayMs = computeRetryDelayMs(attempt, this.retryPolicy, this.random);
      const requeued = await this.jobs.update(
        id,
        { statuses: ['processing'] },
        {
          status: 'queued',
          retryCount: attempt,
          progressPercent: 0,
          progressMessage: `Retrying (attempt ${attempt + 1} of ${current.maxRetries}): ${message}`,
          nextAttemptAt: addMilliseconds(now, delayMs).toISOString(),
          startedAt: null,
          lastHeartbeatAt: null,
          updatedAt: nowIso,
        }
      );
      if (!requeued) return { job: await this.get(id), changed: false };
      this.log.warn('job re-queued after transient error', { jobId: id, attempt, delayMs, error: message });
      return { job: requeued, changed: true };
    }

    const failed = await this.jobs.update(
      id,
      { statuses: ['processing'] },
      {
        status: 'failed',
        errorMessage: message,
        progressMessage: 'Failed',
        completedAt: nowIso,
        updatedAt: nowIso,
      }
    );
    if (!failed) return { job: await this.get(id), changed: false };

    this.log.error('job failed', error, { jobId: id, type: failed.type, attempt });
    await this.afterTerminal(failed);
    return { job: failed, changed: true };
  }

  /**
   * Cooperative cancellation: the job is marked `cancelled` and the worker
   * stops at its next checkpoint.
   */
  async cancel(id: string, tenantId?: string): Promise<TransitionResult> {
    const current = await this.get(id, tenantId);
    if (isTerminalStatus(current.status)) return { job: current, changed: false };

    const nowIso = this.now().toISOString();
    const cancelled = await this.jobs.update(
      id,
      { statuses: ACTIVE },
      { status: 'cancelled', progressMessage: 'Cancelled by user', completedAt: nowIso, updatedAt: nowIso }
    );
    if (!cancelled) return { job: await this.get(id), changed: false };

    this.log.info('job cancelled', { jobId: id, type: cancelled.type });
    await this.afterTerminal(cancelled);
    return { job: cancelled, changed: true };
  }

  /**
   * Record the lessons a full_course job fans out to. Aggregation waits for
   * every listed lesson, so this must run before the first child is created.
   */
  async recordFanOut(parentId: string, outlineLessonIds: string[]): Promise<GenerationJob | null> {
    const nowIso = this.now().toISOString();
    return this.jobs.update(
      parentId,
      { statuses: ['processing'], progressAtMost: PARENT_FANOUT_PERCENT },
      {
        result: { outlineLessonIds },
        progressPercent: PARENT_FANOUT_PERCENT,
        progressMessage: `Generating ${outlineLessonIds.length} lessons...`,
        lastHeartbeatAt: nowIso,
        updatedAt: nowIso,
      }
    );
  }

  /** `processing` jobs with no checkpoint in the last `minutes`. */
  listStale(minutes: number): Promise<GenerationJob[]> {
    return this.jobs.listStale(subMinutes(this.now(), minutes));
  }

  listChildren(parentId: string): Promise<GenerationJob[]> {
    return this.jobs.listChildren(parentId);
  }

  /**
   * Recompute a full_course job from one snapshot of its children.
   *
   * A lesson is satisfied once any of its children completed, pending while
   * any is still active, failed otherwise. The parent finishes when nothing is
   * pending: completed if every lesson is satisfied, failed if not.
   */
  async aggregateParent(parentId: string): Promise<GenerationJob | null> {
    const parent = await this.jobs.get(parentId);
    if (!parent || parent.status !== 'processing') return parent;
    const lessonIds = fannedOutLessonIds(parent.result);
    if (!lessonIds || !lessonIds.length) return parent;

    const children = await this.jobs.listChildren(parentId);
    const byLesson = new Map<string, GenerationJob[]>();
    for (const child of children) {
      const key = child.outlineLessonId ?? child.id;
      byLesson.set(key, [...(byLesson.get(key) ?? []), child]);
    }

    let satisfied = 0;
    let pending = 0;
    let progressSum = 0;
    const failedChildIds: string[] = [];
    for (const lessonId of lessonIds) {
      const group = byLesson.get(lessonId) ?? [];
      if (group.some((c) => c.status === 'completed')) {
        satisfied += 1;
        progressSum += 100;
      } else if (!group.length || group.some((c) => !isTerminalStatus(c.status))) {
        pending += 1;
        progressSum += Math.max(0, ...group.map((c) => c.progressPercent));
      } else {
        progressSum += 100;
        failedChildIds.push(...group.map((c) => c.id));
      }
    }

    const total = lessonIds.length;
    const nowIso = this.now().toISOString();
    const tokensUsed = children.reduce((sum, c) => sum + c.tokensUsed, 0);

    if (pending > 0) {
      const pct = Math.floor(PARENT_FANOUT_PERCENT + ((100 - PARENT_FANOUT_PERCENT) * progressSum) / (total * 100));
      const updated = await this.jobs.update(
        parentId,
        { statuses: ['processing'], progressAtMost: Math.min(pct, 99) },
        {
          progressPercent: Math.min(pct, 99),
          progressMessage: parentProgressMessage(satisfied, total),
          tokensUsed,
          lastHeartbeatAt: nowIso,
          updatedAt: nowIso,
        }
      );
      return updated ?? parent;
    }

    const lessonsFailed = total - satisfied;
    const finalized = await this.jobs.update(
      parentId,
      { statuses: ['processing'] },
      lessonsFailed === 0
        ? {
            status: 'completed',
            progressPercent: 100,
            progressMessage: 'All lessons generated successfully',
            tokensUsed,
            completedAt: nowIso,
            updatedAt: nowIso,
          }
        : {
            status: 'failed',
            progressMessage: 'Course generation failed',
            errorMessage: `${lessonsFailed} lesson(s) failed to generate: ${failedChildIds.join(', ')}`,
            tokensUsed,
            completedAt: nowIso,
            updatedAt: nowIso,
          }
    );
    if (!finalized) return this.jobs.get(parentId);

    this.log.info('parent job finalized', { jobId: parentId, status: finalized.status, satisfied, total });
    await this.afterTerminal(finalized);
    return finalized;
  }

  private async afterTerminal(job: GenerationJob): Promise<void> {
    if (job.type === 'full_course' && (job.status === 'cancelled' || job.status === 'failed')) {
      await this.cancelChildren(job);
    }
    if (this.notifier) {
      try {
        await this.notifier.notifyJobTransition(job);
      } catch (error) {
        this.log.warn('transition notification failed', { jobId: job.id, error: errorMessage(error) });
      }
    }
    if (job.parentJobId) await this.aggregateParent(job.parentJobId);
  }

  private async cancelChildren(parent: GenerationJob): Promise<void> {
    const message = parent.status === 'cancelled' ? 'Cancelled: parent job cancelled' : 'Cancelled: parent job failed';
    const nowIso = this.now().toISOString();
    for (const child of await this.jobs.listChildren(parent.id)) {
      if (isTerminalStatus(child.status)) continue;
      await this.jobs.update(
        child.id,
        { statuses: ACTIVE },
        { status: 'cancelled', progressMessage: message, completedAt: nowIso, updatedAt: nowIso }
      );
    }
  }
}
