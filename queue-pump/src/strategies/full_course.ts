import type { JobContext, ExecutionOutcome, ExecutorDeps, JobExecutor } from "./types";
import { NotFoundError, PreconditionError, ValidationError } from "../../../src/lib/errors";
import { FullCoursePayloadSchema, parseOrThrow } from "../../../src/lib/schemas/generation";

/**
 * Fan out one lesson_content child per outline lesson, then detach. The
 * children drive the parent to its terminal state through aggregation.
 * Safe to re-run: lessons that already have a child are skipped.
 */
export class GenerateFullCourse implements JobExecutor {
  readonly type = "full_course";

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(ctx: JobContext): Promise<ExecutionOutcome> {
    const { job } = ctx;
    const { orchestrator } = this.deps;
    const payload = parseOrThrow(FullCoursePayloadSchema, job.payload, "full_course payload");

    const outline = await this.deps.outlines.get(payload.outlineId);
    if (!outline || outline.tenantId !== job.tenantId) throw new NotFoundError(`Outline not found: ${payload.outlineId}`);
    if (outline.approvalStatus !== "approved") {
      throw new PreconditionError(`Outline ${outline.id} is ${outline.approvalStatus}, not approved`);
    }
    const lessonIds = outline.sections.flatMap((s) => s.lessons.map((l) => l.id));
    if (!lessonIds.length) throw new ValidationError(`Outline ${outline.id} has no lessons`);

    await ctx.checkpoint();
    await orchestrator.recordFanOut(job.id, lessonIds);

    const existing = new Set((await orchestrator.listChildren(job.id)).map((c) => c.outlineLessonId));
    const childJobIds: string[] = [];
    for (const outlineLessonId of lessonIds) {
      if (existing.has(outlineLessonId)) continue;
      await ctx.checkpoint();
      const child = await orchestrator.submit(
        "lesson_content",
        { tenantId: job.tenantId, userId: job.createdByUserId },
        { courseId: payload.courseId, outlineId: outline.id, outlineLessonId },
        { parentJobId: job.id }
      );
      childJobIds.push(child.id);
    }
    ctx.log.info("lesson jobs created", { created: childJobIds.length, total: lessonIds.length });
    return { kind: "detached", childJobIds };
  }
}
