/**
 * Approval Gate
 *
 * Human checkpoint between outline generation and lesson generation. Each
 * regeneration creates a new outline version; older live versions are
 * superseded so a course never has two outlines awaiting or past approval.
 *
 *   pending_review -> approved            (submits the full_course job)
 *   pending_review -> rejected            (submits a fresh course_outline job)
 *   pending_review -> revision_requested  (edited in place)
 *   revision_requested -> pending_review  (resubmitted for review)
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  CourseGenerationInput,
  CourseOutline,
  GenerationJob,
  OutlineApprovalStatus,
  OutlineLesson,
  OutlineSection,
  RequestContext,
} from '../lib/types/generation';
import { NotFoundError, PreconditionError, ValidationError } from '../lib/errors';
import { createLogger, type Logger } from '../lib/logger';
import { CourseOutlinePayloadSchema, OutlineUpdateSchema, parseOrThrow } from '../lib/schemas/generation';
import type { JobOrchestrator } from './orchestrator';
import type { LessonStore, OutlineStore } from './store/types';

const LIVE_STATUSES: readonly OutlineApprovalStatus[] = ['pending_review', 'revision_requested', 'approved'];
const EDITABLE_STATUSES: readonly OutlineApprovalStatus[] = ['pending_review', 'revision_requested'];

export interface ApprovalNotifier {
  notifyApprovalRequested(outline: CourseOutline): Promise<unknown>;
}

export interface ApprovalGateDeps {
  outlines: OutlineStore;
  lessons: LessonStore;
  orchestrator: JobOrchestrator;
  notifier?: ApprovalNotifier;
  logger?: Logger;
  now?: () => Date;
}

/** Section shape produced by the outline generator, before ids are assigned. */
export interface DraftSection {
  title: string;
  description: string;
  lessons: Array<Omit<OutlineLesson, 'id'>>;
}

export interface RecordOutlineInput {
  tenantId: string;
  requestedByUserId: string;
  generationInput: CourseGenerationInput;
  sections: DraftSection[];
  sourceJobId: string | null;
}

export interface OutlineDecision {
  outline: CourseOutline;
  job: GenerationJob;
}

export const REVIEWER_FEEDBACK_PREFIX = 'Reviewer feedback on previous outline:';

export function withReviewerFeedback(input: CourseGenerationInput, reason: string): CourseGenerationInput {
  const feedback = `${REVIEWER_FEEDBACK_PREFIX} ${reason}`;
  return {
    ...input,
    additionalContext: input.additionalContext ? `${input.additionalContext}\n\n${feedback}` : feedback,
  };
}

export class ApprovalGate {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: ApprovalGateDeps) {
    this.log = deps.logger ?? createLogger('approval');
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Store a freshly generated outline as the next version, pending review.
   */
  async recordGeneratedOutline(input: RecordOutlineInput): Promise<CourseOutline> {
    const { outlines } = this.deps;
    const { courseId } = input.generationInput;
    const history = await outlines.listForCourse(input.tenantId, courseId);
    const version = (history[0]?.version ?? 0) + 1;
    const id = uuidv4();
    const nowIso = this.now().toISOString();

    // The store allows one live outline per course, so older ones go first.
    for (const prior of history.filter((o) => LIVE_STATUSES.includes(o.approvalStatus))) {
      const superseded = await outlines.update(prior.id, LIVE_STATUSES, {
        approvalStatus: 'rejected',
        rejectionReason: `Superseded by version ${version}`,
        supersededByOutlineId: id,
        updatedAt: nowIso,
      });
      if (superseded) this.log.info('outline superseded', { outlineId: prior.id, courseId, version });
    }

    const outline = await outlines.insert({
      id,
      tenantId: input.tenantId,
      courseId,
      version,
      approvalStatus: 'pending_review',
      sections: input.sections.map((section) => ({
        id: uuidv4(),
        title: section.title,
        description: section.description,
        lessons: section.lessons.map((lesson) => ({ ...lesson, id: uuidv4() })),
      })),
      generationInput: input.generationInput,
      requestedByUserId: input.requestedByUserId,
      sourceJobId: input.sourceJobId,
      rejectionReason: null,
      supersededByOutlineId: null,
      generatedAt: nowIso,
      approvedAt: null,
      approvedByUserId: null,
      updatedAt: nowIso,
    });
    this.log.info('outline recorded', { outlineId: outline.id, courseId, version });
    return outline;
  }

  /**
   * Latest version, or the requested one.
   * @throws NotFoundError
   */
  async get(ctx: RequestContext, courseId: string, version?: number): Promise<CourseOutline> {
    const history = await this.deps.outlines.listForCourse(ctx.tenantId, courseId);
    const outline = version === undefined ? history[0] : history.find((o) => o.version === version);
    if (!outline) {
      throw new NotFoundError(
        version === undefined ? `No outline for course ${courseId}` : `Outline version ${version} not found for course ${courseId}`
      );
    }
    return outline;
  }

  list(ctx: RequestContext, courseId: string): Promise<CourseOutline[]> {
    return this.deps.outlines.listForCourse(ctx.tenantId, courseId);
  }

  /**
   * Approve a pending outline and submit its single full_course job.
   * @throws PreconditionError when the outline is no longer pending review
   */
  async approve(ctx: RequestContext, courseId: string, outlineId: string): Promise<OutlineDecision> {
    const outline = await this.load(ctx, courseId, outlineId);
    const nowIso = this.now().toISOString();
    const approved = await this.deps.outlines.update(outline.id, ['pending_review'], {
      approvalStatus: 'approved',
      approvedAt: nowIso,
      approvedByUserId: ctx.userId,
      updatedAt: nowIso,
    });
    if (!approved) throw await this.guardError(outline.id, 'approved');

    try {
      const job = await this.deps.orchestrator.submit('full_course', ctx, { courseId, outlineId: approved.id });
      this.log.info('outline approved', { outlineId, courseId, jobId: job.id, userId: ctx.userId });
      return { outline: approved, job };
    } catch (error) {
      await this.deps.outlines.update(approved.id, ['approved'], {
        approvalStatus: 'pending_review',
        approvedAt: null,
        approvedByUserId: null,
        updatedAt: this.now().toISOString(),
      });
      throw error;
    }
  }

  /**
   * Reject with a reason and regenerate the outline using the reason as guidance.
   * @throws ValidationError when the reason is blank
   */
  async reject(ctx: RequestContext, courseId: string, outlineId: string, reason: string): Promise<OutlineDecision> {
    const trimmed = reason.trim();
    if (!trimmed) throw new ValidationError('Rejection reason is required');

    const outline = await this.load(ctx, courseId, outlineId);
    const payload = parseOrThrow(
      CourseOutlinePayloadSchema,
      { ...withReviewerFeedback(outline.generationInput, trimmed), previousOutlineId: outline.id },
      'regeneration request'
    );
    const rejected = await this.deps.outlines.update(outline.id, EDITABLE_STATUSES, {
      approvalStatus: 'rejected',
      rejectionReason: trimmed,
      updatedAt: this.now().toISOString(),
    });
    if (!rejected) throw await this.guardError(outline.id, 'rejected');

    const job = await this.deps.orchestrator.submit('course_outline', ctx, payload);
    this.log.info('outline rejected', { outlineId, courseId, jobId: job.id });
    return { outline: rejected, job };
  }

  async requestRevision(ctx: RequestContext, courseId: string, outlineId: string, notes?: string): Promise<CourseOutline> {
    const outline = await this.load(ctx, courseId, outlineId);
    const revised = await this.deps.outlines.update(outline.id, ['pending_review'], {
      approvalStatus: 'revision_requested',
      rejectionReason: notes?.trim() || null,
      updatedAt: this.now().toISOString(),
    });
    if (!revised) throw await this.guardError(outline.id, 'sent back for revision');
    return revised;
  }

  async submitForReview(ctx: RequestContext, courseId: string, outlineId: string): Promise<CourseOutline> {
    const outline = await this.load(ctx, courseId, outlineId);
    const pending = await this.deps.outlines.update(outline.id, ['revision_requested'], {
      approvalStatus: 'pending_review',
      rejectionReason: null,
      updatedAt: this.now().toISOString(),
    });
    if (!pending) throw await this.guardError(outline.id, 'submitted for review');
    await this.deps.notifier?.notifyApprovalRequested(pending);
    return pending;
  }

  /**
   * Edit sections and lessons in place. Entries keep their ids; new entries
   * get fresh ones. Lessons with generated content cannot be dropped.
   */
  async update(ctx: RequestContext, courseId: string, outlineId: string, sections: unknown): Promise<CourseOutline> {
    const edits = parseOrThrow(OutlineUpdateSchema, sections, 'outline sections');
    const outline = await this.load(ctx, courseId, outlineId);
    if (!EDITABLE_STATUSES.includes(outline.approvalStatus)) {
      throw new PreconditionError(`Outline ${outlineId} is ${outline.approvalStatus} and can no longer be edited`);
    }

    const knownSections = new Set(outline.sections.map((s) => s.id));
    const knownLessons = new Map<string, OutlineLesson>();
    for (const section of outline.sections) {
      for (const lesson of section.lessons) knownLessons.set(lesson.id, lesson);
    }

    const next: OutlineSection[] = edits.map((section) => {
      if (section.id && !knownSections.has(section.id)) {
        throw new ValidationError(`Unknown section id: ${section.id}`);
      }
      return {
        id: section.id ?? uuidv4(),
        title: section.title,
        description: section.description,
        lessons: section.lessons.map((lesson) => {
          if (lesson.id && !knownLessons.has(lesson.id)) {
            throw new ValidationError(`Unknown lesson id: ${lesson.id}`);
          }
          return {
            id: lesson.id ?? uuidv4(),
            title: lesson.title,
            description: lesson.description,
            estimatedDurationMinutes: lesson.estimatedDurationMinutes,
            learningObjectives: lesson.learningObjectives,
          };
        }),
      };
    });

    const kept = new Set(next.flatMap((s) => s.lessons.map((l) => l.id)));
    const dropped = [...knownLessons.values()].filter((l) => !kept.has(l.id));
    if (dropped.length) {
      const generated = await this.deps.lessons.listForCourse(ctx.tenantId, courseId);
      const withContent = dropped.find((l) => generated.some((g) => g.outlineLessonId === l.id));
      if (withContent) {
        throw new PreconditionError(`Lesson "${withContent.title}" already has generated content and cannot be removed`);
      }
    }

    const updated = await this.deps.outlines.update(outline.id, [outline.approvalStatus], {
      sections: next,
      updatedAt: this.now().toISOString(),
    });
    if (!updated) throw await this.guardError(outline.id, 'updated');
    return updated;
  }

  private async load(ctx: RequestContext, courseId: string, outlineId: string): Promise<CourseOutline> {
    const outline = await this.deps.outlines.get(outlineId);
    if (!outline || outline.tenantId !== ctx.tenantId || outline.courseId !== courseId) {
      throw new NotFoundError(`Outline not found: ${outlineId}`);
    }
    return outline;
  }

  private async guardError(outlineId: string, action: string): Promise<PreconditionError> {
    const current = await this.deps.outlines.get(outlineId);
    const status = current?.approvalStatus ?? 'missing';
    return new PreconditionError(`Outline ${outlineId} is ${status} and cannot be ${action}`);
  }
}
