import type {
  CourseGenerationInput,
  CourseOutline,
  GeneratedLesson,
  GenerationJob,
  RequestContext,
} from '../lib/types/generation';
import { NotFoundError, PreconditionError, ValidationError } from '../lib/errors';
import { createLogger, type Logger } from '../lib/logger';
import type { ApprovalGate, OutlineDecision } from './approval';
import type { JobOrchestrator } from './orchestrator';
import type { LessonStore } from './store/types';

export interface GenerationServiceDeps {
  orchestrator: JobOrchestrator;
  approval: ApprovalGate;
  lessons: LessonStore;
  logger?: Logger;
}

/**
 * Course lifecycle operations exposed to the gateway. State rules live in the
 * orchestrator and the approval gate.
 */
export class CourseGenerationService {
  private readonly log: Logger;

  constructor(private readonly deps: GenerationServiceDeps) {
    this.log = deps.logger ?? createLogger('generation');
  }

  generateOutline(ctx: RequestContext, input: CourseGenerationInput): Promise<GenerationJob> {
    return this.deps.orchestrator.submit('course_outline', ctx, input);
  }

  getOutline(ctx: RequestContext, courseId: string, version?: number): Promise<CourseOutline> {
    return this.deps.approval.get(ctx, courseId, version);
  }

  listOutlines(ctx: RequestContext, courseId: string): Promise<CourseOutline[]> {
    return this.deps.approval.list(ctx, courseId);
  }

  approveOutline(ctx: RequestContext, courseId: string, outlineId: string): Promise<OutlineDecision> {
    return this.deps.approval.approve(ctx, courseId, outlineId);
  }

  rejectOutline(ctx: RequestContext, courseId: string, outlineId: string, reason: string): Promise<OutlineDecision> {
    return this.deps.approval.reject(ctx, courseId, outlineId, reason);
  }

  requestRevision(ctx: RequestContext, courseId: string, outlineId: string, notes?: string): Promise<CourseOutline> {
    return this.deps.approval.requestRevision(ctx, courseId, outlineId, notes);
  }

  submitForReview(ctx: RequestContext, courseId: string, outlineId: string): Promise<CourseOutline> {
    return this.deps.approval.submitForReview(ctx, courseId, outlineId);
  }

  updateOutline(ctx: RequestContext, courseId: string, outlineId: string, sections: unknown): Promise<CourseOutline> {
    return this.deps.approval.update(ctx, courseId, outlineId, sections);
  }

  /**
   * Re-run lesson generation for the approved outline. Lessons that already
   * have content are regenerated too.
   * @throws PreconditionError without an approved outline, or while a run is active
   */
  async generateAllLessons(ctx: RequestContext, courseId: string): Promise<GenerationJob> {
    const outline = await this.deps.approval.get(ctx, courseId);
    if (outline.approvalStatus !== 'approved') {
      throw new PreconditionError(`Latest outline for course ${courseId} is ${outline.approvalStatus}, not approved`);
    }
    const active = await this.deps.orchestrator.list({
      tenantId: ctx.tenantId,
      type: 'full_course',
      courseId,
      status: ['queued', 'processing'],
      limit: 1,
    });
    if (active.length) {
      throw new PreconditionError(`Lesson generation is already running for course ${courseId} (job ${active[0]?.id})`);
    }
    const job = await this.deps.orchestrator.submit('full_course', ctx, { courseId, outlineId: outline.id });
    this.log.info('lesson generation requested', { courseId, jobId: job.id });
    return job;
  }

  /** Generated lessons in outline order; lessons no longer in the outline come last. */
  async listGeneratedLessons(ctx: RequestContext, courseId: string): Promise<GeneratedLesson[]> {
    const lessons = await this.deps.lessons.listForCourse(ctx.tenantId, courseId);
    const history = await this.deps.approval.list(ctx, courseId);
    const outline = history.find((o) => o.approvalStatus === 'approved') ?? history[0];
    const position = new Map<string, number>();
    outline?.sections.flatMap((s) => s.lessons).forEach((lesson, index) => position.set(lesson.id, index));
    const rank = (lesson: GeneratedLesson): number => position.get(lesson.outlineLessonId) ?? Number.MAX_SAFE_INTEGER;
    return [...lessons].sort((a, b) => rank(a) - rank(b) || a.generatedAt.localeCompare(b.generatedAt));
  }

  async regenerateComponent(
    ctx: RequestContext,
    lessonId: string,
    componentId: string,
    prompt: string
  ): Promise<GenerationJob> {
    if (!prompt.trim()) throw new ValidationError('Modification prompt is required');
    const lesson = await this.deps.lessons.get(lessonId);
    if (!lesson || lesson.tenantId !== ctx.tenantId) throw new NotFoundError(`Lesson not found: ${lessonId}`);
    if (!lesson.components.some((c) => c.id === componentId)) {
      throw new NotFoundError(`Component not found: ${componentId}`);
    }
    return this.deps.orchestrator.submit('component_regen', ctx, {
      lessonId,
      componentId,
      modificationPrompt: prompt,
    });
  }

  ingestSme(ctx: RequestContext, smeId: string, documents: unknown): Promise<GenerationJob> {
    return this.deps.orchestrator.submit('sme_ingestion', ctx, { smeId, documents });
  }
}
