import type { JobContext, ExecutionOutcome, ExecutorDeps, JobExecutor } from "./types";
import { CourseOutlinePayloadSchema, GeneratedOutlineSchema, parseOrThrow } from "../../../src/lib/schemas/generation";
import { OUTLINE_STEPS } from "../../../src/lib/pipeline/progress";
import { generateStructured } from "../ai";
import { buildOutlinePrompt, SYSTEM_PROMPT } from "../prompts";
import { loadCourseContext } from "./context";

export class GenerateCourseOutline implements JobExecutor {
  readonly type = "course_outline";

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(ctx: JobContext): Promise<ExecutionOutcome> {
    const { job } = ctx;
    const payload = parseOrThrow(CourseOutlinePayloadSchema, job.payload, "course_outline payload");
    const { previousOutlineId, ...input } = payload;

    await ctx.checkpoint();
    await ctx.progress(OUTLINE_STEPS.ANALYZING);
    const { knowledge, audiences } = await loadCourseContext(this.deps.context, job.tenantId, input);

    await ctx.checkpoint();
    await ctx.progress(OUTLINE_STEPS.GENERATING);
    const generated = await generateStructured(this.deps.provider, GeneratedOutlineSchema, {
      task: "outline",
      system: SYSTEM_PROMPT,
      prompt: buildOutlinePrompt({ input, knowledge, audiences }),
    });

    await ctx.checkpoint();
    await ctx.progress(OUTLINE_STEPS.STORING);
    const outline = await this.deps.approval.recordGeneratedOutline({
      tenantId: job.tenantId,
      requestedByUserId: job.createdByUserId,
      generationInput: input,
      sourceJobId: job.id,
      sections: generated.value.sections.map((section) => ({
        title: section.title,
        description: section.description,
        lessons: section.lessons.map((lesson) => ({
          title: lesson.title,
          description: lesson.description,
          estimatedDurationMinutes: lesson.estimatedDurationMinutes ?? null,
          learningObjectives: lesson.learningObjectives,
        })),
      })),
    });
    ctx.log.info("outline stored", { outlineId: outline.id, version: outline.version, previousOutlineId });

    return {
      kind: "completed",
      result: { outlineId: outline.id, version: outline.version },
      tokensUsed: generated.tokensUsed,
      message: OUTLINE_STEPS.DONE.message,
    };
  }
}
