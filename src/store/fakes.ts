/**
 * Deterministic in-memory strategies for the generation controller.
 * Jobs only move when a test scripts them with `jobs.advance()`.
 */

import { PreconditionError } from '../lib/errors';
import type { OutlineDecision } from '../lib/api/generation';
import type { CourseGenerationInput, CourseOutline, GeneratedLesson, GenerationJob } from '../lib/types/generation';
import type { GenerationStrategies, JobPoller, LessonGenerator, OutlineGenerator } from './strategies';

const FIXED_TIME = '2026-01-01T00:00:00.000Z';

export function makeJob(overrides: Partial<GenerationJob> = {}): GenerationJob {
  return {
    id: 'job-1',
    tenantId: 'tenant-1',
    createdByUserId: 'user-1',
    type: 'course_outline',
    status: 'queued',
    parentJobId: null,
    courseId: 'course-1',
    lessonId: null,
    outlineLessonId: null,
    smeId: null,
    payload: {},
    progressPercent: 0,
    progressMessage: 'Queued',
    retryCount: 0,
    maxRetries: 3,
    errorMessage: null,
    tokensUsed: 0,
    result: null,
    nextAttemptAt: null,
    lastHeartbeatAt: null,
    createdAt: FIXED_TIME,
    startedAt: null,
    completedAt: null,
    updatedAt: FIXED_TIME,
    ...overrides,
  };
}

export function makeOutline(overrides: Partial<CourseOutline> = {}): CourseOutline {
  return {
    id: 'outline-1',
    tenantId: 'tenant-1',
    courseId: 'course-1',
    version: 1,
    approvalStatus: 'pending_review',
    sections: [
      {
        id: 'sec-1',
        title: 'Basics',
        description: '',
        lessons: [
          { id: 'ol-1', title: 'First Steps', description: '', estimatedDurationMinutes: 10, learningObjectives: [] },
        ],
      },
    ],
    generationInput: {
      courseId: 'course-1',
      knowledgeSourceIds: ['sme-1'],
      targetAudienceIds: ['aud-1'],
      desiredOutcome: 'Reduce churn',
    },
    requestedByUserId: 'user-1',
    sourceJobId: 'job-1',
    rejectionReason: null,
    supersededByOutlineId: null,
    generatedAt: FIXED_TIME,
    approvedAt: null,
    approvedByUserId: null,
    updatedAt: FIXED_TIME,
    ...overrides,
  };
}

export function makeLesson(overrides: Partial<GeneratedLesson> = {}): GeneratedLesson {
  return {
    id: 'lesson-1',
    tenantId: 'tenant-1',
    courseId: 'course-1',
    sectionId: 'sec-1',
    outlineLessonId: 'ol-1',
    title: 'First Steps',
    segueText: null,
    components: [
      { id: 'cmp-1', type: 'heading', order: 0, contentJson: JSON.stringify({ level: 2, text: 'First Steps' }) },
    ],
    generatedAt: FIXED_TIME,
    ...overrides,
  };
}

export class FakeJobPoller implements JobPoller {
  private readonly jobs = new Map<string, GenerationJob>();
  private readonly pollFailures: Error[] = [];
  readonly polled: string[] = [];
  readonly cancelRequests: string[] = [];
  /** When set, the next cancel() throws it instead of cancelling. */
  cancelError: Error | null = null;

  register(job: GenerationJob): GenerationJob {
    this.jobs.set(job.id, job);
    return job;
  }

  advance(jobId: string, patch: Partial<GenerationJob>): GenerationJob {
    return this.register({ ...this.current(jobId), ...patch });
  }

  failNextPoll(error: Error): void {
    this.pollFailures.push(error);
  }

  current(jobId: string): GenerationJob {
    const job = this.jobs.get(jobId);
    if (!job) throw new Error(`Unknown fake job: ${jobId}`);
    return job;
  }

  async getJob(jobId: string): Promise<GenerationJob> {
    this.polled.push(jobId);
    const failure = this.pollFailures.shift();
    if (failure) throw failure;
    return this.current(jobId);
  }

  async cancel(jobId: string): Promise<GenerationJob> {
    this.cancelRequests.push(jobId);
    const error = this.cancelError;
    if (error) {
      this.cancelError = null;
      throw error;
    }
    const job = this.current(jobId);
    if (job.status === 'completed' || job.status === 'failed' || job.status === 'cancelled') {
      throw new PreconditionError(`Job ${jobId} is already ${job.status}`);
    }
    return this.advance(jobId, { status: 'cancelled', progressMessage: 'Cancelled by user' });
  }
}

export class FakeOutlineGenerator implements OutlineGenerator {
  readonly started: CourseGenerationInput[] = [];
  readonly rejected: string[] = [];
  outline: CourseOutline = makeOutline();
  private seq = 0;
  private readonly failures: Error[] = [];

  constructor(private readonly jobs: FakeJobPoller) {}

  failNext(error: Error): void {
    this.failures.push(error);
  }

  private takeFailure(): void {
    const failure = this.failures.shift();
    if (failure) throw failure;
  }

  private nextJob(courseId: string): GenerationJob {
    this.seq += 1;
    return this.jobs.register(makeJob({ id: `outline-job-${this.seq}`, type: 'course_outline', courseId }));
  }

  async start(input: CourseGenerationInput): Promise<GenerationJob> {
    this.takeFailure();
    this.started.push(input);
    return this.nextJob(input.courseId);
  }

  async regenerate(input: CourseGenerationInput): Promise<GenerationJob> {
    return this.start(input);
  }

  async fetchOutline(_courseId: string): Promise<CourseOutline> {
    this.takeFailure();
    return this.outline;
  }

  async approve(courseId: string, outlineId: string): Promise<OutlineDecision> {
    this.takeFailure();
    this.outline = { ...this.outline, approvalStatus: 'approved' };
    const job = this.jobs.register(
      makeJob({ id: `full-course-job-${outlineId}`, type: 'full_course', courseId, progressMessage: 'Queued' })
    );
    return { outline: this.outline, job };
  }

  async reject(courseId: string, outlineId: string, reason: string): Promise<OutlineDecision> {
    this.takeFailure();
    this.rejected.push(reason);
    const outline: CourseOutline = { ...this.outline, id: outlineId, approvalStatus: 'rejected', rejectionReason: reason };
    return { outline, job: this.nextJob(courseId) };
  }
}

export class FakeLessonGenerator implements LessonGenerator {
  lessons: GeneratedLesson[] = [makeLesson()];
  readonly started: string[] = [];
  private seq = 0;

  constructor(private readonly jobs: FakeJobPoller) {}

  async start(courseId: string): Promise<GenerationJob> {
    this.seq += 1;
    this.started.push(courseId);
    return this.jobs.register(makeJob({ id: `lessons-job-${this.seq}`, type: 'full_course', courseId }));
  }

  async listLessons(_courseId: string): Promise<GeneratedLesson[]> {
    return this.lessons;
  }
}

export interface FakeStrategies extends GenerationStrategies {
  outlines: FakeOutlineGenerator;
  lessons: FakeLessonGenerator;
  jobs: FakeJobPoller;
}

export function createFakeStrategies(): FakeStrategies {
  const jobs = new FakeJobPoller();
  return { jobs, outlines: new FakeOutlineGenerator(jobs), lessons: new FakeLessonGenerator(jobs) };
}
