import type { JobContext, ExecutionOutcome, ExecutorDeps, JobExecutor } from "./types";
import { NotFoundError, PermanentProviderError } from "../../../src/lib/errors";
import { ComponentRegenPayloadSchema, GeneratedComponentSchema, parseOrThrow } from "../../../src/lib/schemas/generation";
import { COMPONENT_STEPS } from "../../../src/lib/pipeline/progress";
import { generateStructured } from "../ai";
import { buildComponentPrompt, SYSTEM_PROMPT } from "../prompts";

export class RegenerateComponent implements JobExecutor {
  readonly type = "component_regen";

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(ctx: JobContext): Promise<ExecutionOutcome> {
    const { job } = ctx;
    const payload = parseOrThrow(ComponentRegenPayloadSchema, job.payload, "component_regen payload");

    const lesson = await this.deps.lessons.get(payload.lessonId);
    if (!lesson || lesson.tenantId !== job.tenantId) throw new NotFoundError(`Lesson not found: ${payload.lessonId}`);
    const component = lesson.components.find((c) => c.id === payload.componentId);
    if (!component) throw new NotFoundError(`Component not found: ${payload.componentId}`);

    await ctx.checkpoint();
    await ctx.progress(COMPONENT_STEPS.GENERATING);
    const generated = await generateStructured(this.deps.provider, GeneratedComponentSchema, {
      task: "component",
      system: SYSTEM_PROMPT,
      prompt: buildComponentPrompt({ component, lessonTitle: lesson.title, instruction: payload.modificationPrompt }),
    });
    if (generated.value.type !== component.type) {
      throw new PermanentProviderError(`Regenerated component changed type from ${component.type} to ${generated.value.type}`);
    }

    await ctx.checkpoint();
    await ctx.progress(COMPONENT_STEPS.STORING);
    const updated = await this.deps.lessons.replaceComponent(lesson.id, {
      ...component,
      contentJson: JSON.stringify(generated.value.content),
    });
    if (!updated) throw new NotFoundError(`Component not found: ${payload.componentId}`);

    return {
      kind: "completed",
      result: { lessonId: lesson.id, componentId: component.id },
      tokensUsed: generated.tokensUsed,
      message: COMPONENT_STEPS.DONE.message,
    };
  }
}
