import type { JobContext, ExecutionOutcome, ExecutorDeps, JobExecutor } from "./types";
import { GeneratedSmeSummarySchema, SmeIngestionPayloadSchema, parseOrThrow } from "../../../src/lib/schemas/generation";
import { INGESTION_STEPS } from "../../../src/lib/pipeline/progress";
import { generateStructured } from "../ai";
import { buildSmeSummaryPrompt, SYSTEM_PROMPT } from "../prompts";

export const MAX_CHUNK_CHARS = 1500;

/** Split text on paragraph boundaries into chunks of at most `max` characters. */
export function chunkText(text: string, max = MAX_CHUNK_CHARS): string[] {
  const chunks: string[] = [];
  let current = "";
  for (const paragraph of text.split(/\n\s*\n/).map((p) => p.trim()).filter(Boolean)) {
    for (let start = 0; start < paragraph.length; start += max) {
      const piece = paragraph.slice(start, start + max);
      if (current && current.length + piece.length + 2 > max) {
        chunks.push(current);
        current = "";
      }
      current = current ? `${current}\n\n${piece}` : piece;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

export class IngestSmeMaterial implements JobExecutor {
  readonly type = "sme_ingestion";

  constructor(private readonly deps: ExecutorDeps) {}

  async execute(ctx: JobContext): Promise<ExecutionOutcome> {
    const { job } = ctx;
    const payload = parseOrThrow(SmeIngestionPayloadSchema, job.payload, "sme_ingestion payload");
    const now = this.deps.now ?? (() => new Date());

    await ctx.progress(INGESTION_STEPS.READING);
    const chunks = payload.documents.flatMap((d) => chunkText(d.text));

    await ctx.checkpoint();
    await ctx.progress(INGESTION_STEPS.SUMMARIZING);
    const generated = await generateStructured(this.deps.provider, GeneratedSmeSummarySchema, {
      task: "sme_summary",
      system: SYSTEM_PROMPT,
      prompt: buildSmeSummaryPrompt(payload.documents),
    });

    await ctx.checkpoint();
    await ctx.progress(INGESTION_STEPS.STORING);
    const keyPoints = generated.value.keyPoints.map((p) => `- ${p}`).join("\n");
    await this.deps.context.saveKnowledge({
      smeId: payload.smeId,
      tenantId: job.tenantId,
      title: payload.documents.map((d) => d.title).join(", "),
      summary: keyPoints ? `${generated.value.summary}\n\n${keyPoints}` : generated.value.summary,
      chunks,
      updatedAt: now().toISOString(),
    });

    return {
      kind: "completed",
      result: { smeId: payload.smeId, chunkCount: chunks.length },
      tokensUsed: generated.tokensUsed,
      message: INGESTION_STEPS.DONE.message,
    };
  }
}
