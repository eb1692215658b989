import type { GenerationJobType } from "../../src/lib/types/generation";
import type { ExecutorDeps, JobExecutor } from "./strategies/types";
import { RegenerateComponent } from "./strategies/component_regen";
import { GenerateCourseOutline } from "./strategies/course_outline";
import { GenerateFullCourse } from "./strategies/full_course";
import { GenerateLessonContent } from "./strategies/lesson_content";
import { IngestSmeMaterial } from "./strategies/sme_ingestion";

export type JobRegistry = Record<GenerationJobType, JobExecutor>;

export function createJobRegistry(deps: ExecutorDeps): JobRegistry {
  return {
    sme_ingestion: new IngestSmeMaterial(deps),
    course_outline: new GenerateCourseOutline(deps),
    lesson_content: new GenerateLessonContent(deps),
    component_regen: new RegenerateComponent(deps),
    full_course: new GenerateFullCourse(deps),
  };
}
