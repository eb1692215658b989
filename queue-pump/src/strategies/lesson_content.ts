import { v4 as uuidv4 } from "uuid";
import type { JobContext, ExecutionOutcome, ExecutorDeps, JobExecutor } from "./types";
import type { LessonComponent } from "../../../src/lib/types/generation";
import { NotFoundError } from "../../../src/lib/errors";
import { GeneratedLessonSchema, LessonContentPayloadSchema, parseOrThrow } from "../../../src/lib/schemas/generation";
import { LESSON_STEPS } from "../../../src/lib/pipeline/progress";
import { generateStructured } from "../ai";
import { buildLessonPrompt, SYSTEM_PROMPT } from "../prompts";
import { loadCourseContext } from "./context";

export class GenerateLessonContent implements JobExecutor {
  readonly type = "lesson_content";

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(ctx: JobContext): Promise<ExecutionOutcome> {
    const { job } = ctx;
    const payload = parseOrThrow(LessonContentPayloadSchema, job.payload, "lesson_content payload");
    const now = this.deps.now ?? (() => new Date());

    const outline = await this.deps.outlines.get(payload.outlineId);
    if (!outline || outline.tenantId !== job.tenantId) throw new NotFoundError(`Outline not found: ${payload.outlineId}`);
    const section = outline.sections.find((s) => s.lessons.some((l) => l.id === payload.outlineLessonId));
    const lesson = section?.lessons.find((l) => l.id === payload.outlineLessonId);
    if (!section || !lesson) throw new NotFoundError(`Outline lesson not found: ${payload.outlineLessonId}`);

    const { knowledge, audiences } = await loadCourseContext(this.deps.context, job.tenantId, outline.generationInput);

    await ctx.checkpoint();
    await ctx.progress(LESSON_STEPS.GENERATING);
    const generated = await generateStructured(this.deps.provider, GeneratedLessonSchema, {
      task: "lesson",
      system: SYSTEM_PROMPT,
      prompt: buildLessonPrompt({ input: outline.generationInput, section, lesson, knowledge, audiences }),
      maxTokens: 6000,
    });

    await ctx.checkpoint();
    await ctx.progress(LESSON_STEPS.STORING);
    const existing = (await this.deps.lessons.listForCourse(job.tenantId, payload.courseId)).find(
      (l) => l.outlineLessonId === lesson.id
    );
    const components: LessonComponent[] = generated.value.components.map((component, index) => ({
      id: uuidv4(),
      type: component.type,
      order: index,
      contentJson: JSON.stringify(component.content),
      alignment: {
        personaIds: [...outline.generationInput.targetAudienceIds],
        learningObjectiveIds: [],
        kpiIds: [],
      },
    }));
    const stored = await this.deps.lessons.upsert({
      id: existing?.id ?? uuidv4(),
      tenantId: job.tenantId,
      courseId: payload.courseId,
      sectionId: section.id,
      outlineLessonId: lesson.id,
      title: generated.value.title,
      segueText: generated.value.segueText ?? null,
      components,
      generatedAt: now().toISOString(),
    });

    return {
      kind: "completed",
      result: { lessonId: stored.id, componentCount: components.length },
      tokensUsed: generated.tokensUsed,
      message: LESSON_STEPS.DONE.message,
    };
  }
}
