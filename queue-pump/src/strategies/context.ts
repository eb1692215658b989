import type { CourseGenerationInput, KnowledgeSource, TargetAudience } from "../../../src/lib/types/generation";
import { ValidationError } from "../../../src/lib/errors";
import type { CourseContextStore } from "../../../src/server/store/types";

export interface CourseContext {
  knowledge: KnowledgeSource[];
  audiences: TargetAudience[];
}

/**
 * Load the knowledge sources and audiences a generation request names.
 * @throws ValidationError when any of them is missing for the tenant
 */
export async function loadCourseContext(
  store: CourseContextStore,
  tenantId: string,
  input: CourseGenerationInput
): Promise<CourseContext> {
  const [knowledge, audiences] = await Promise.all([
    store.getKnowledge(tenantId, input.knowledgeSourceIds),
    store.getAudiences(tenantId, input.targetAudienceIds),
  ]);

  const missingSources = input.knowledgeSourceIds.filter((id) => !knowledge.some((k) => k.smeId === id));
  if (missingSources.length) {
    throw new ValidationError(`Knowledge source not found: ${missingSources.join(", ")}`);
  }
  const missingAudiences = input.targetAudienceIds.filter((id) => !audiences.some((a) => a.id === id));
  if (missingAudiences.length) {
    throw new ValidationError(`Target audience not found: ${missingAudiences.join(", ")}`);
  }
  return { knowledge, audiences };
}
