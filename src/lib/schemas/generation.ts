import { z } from 'zod';
import { ValidationError } from '../errors';
import type { GenerationJobType } from '../types/generation';

const id = z.string().trim().min(1);

/**
 * Course generation request, as captured by the configure step.
 */
export const CourseGenerationInputSchema = z.object({
  courseId: id,
  knowledgeSourceIds: z.array(id).min(1, 'At least one knowledge source is required'),
  targetAudienceIds: z.array(id).min(1, 'At least one target audience is required'),
  desiredOutcome: z.string().trim().min(1, 'Desired outcome is required'),
  additionalContext: z.string().trim().max(4000).optional(),
});

export const SmeDocumentSchema = z.object({
  title: z.string().trim().min(1),
  text: z.string().trim().min(1),
});

export const CourseOutlinePayloadSchema = CourseGenerationInputSchema.extend({
  previousOutlineId: id.optional(),
});

export const LessonContentPayloadSchema = z.object({
  courseId: id,
  outlineId: id,
  outlineLessonId: id,
});

export const FullCoursePayloadSchema = z.object({
  courseId: id,
  outlineId: id,
});

export const ComponentRegenPayloadSchema = z.object({
  lessonId: id,
  componentId: id,
  modificationPrompt: z.string().trim().min(1, 'Modification prompt is required'),
});

export const SmeIngestionPayloadSchema = z.object({
  smeId: id,
  documents: z.array(SmeDocumentSchema).min(1, 'At least one document is required'),
});

export type SmeDocument = z.infer<typeof SmeDocumentSchema>;
export type CourseOutlinePayload = z.infer<typeof CourseOutlinePayloadSchema>;
export type LessonContentPayload = z.infer<typeof LessonContentPayloadSchema>;
export type FullCoursePayload = z.infer<typeof FullCoursePayloadSchema>;
export type ComponentRegenPayload = z.infer<typeof ComponentRegenPayloadSchema>;
export type SmeIngestionPayload = z.infer<typeof SmeIngestionPayloadSchema>;

export interface JobPayloadByType {
  sme_ingestion: SmeIngestionPayload;
  course_outline: CourseOutlinePayload;
  lesson_content: LessonContentPayload;
  component_regen: ComponentRegenPayload;
  full_course: FullCoursePayload;
}

export const JobPayloadSchemas: { [K in GenerationJobType]: z.ZodType<JobPayloadByType[K], z.ZodTypeDef, unknown> } = {
  sme_ingestion: SmeIngestionPayloadSchema,
  course_outline: CourseOutlinePayloadSchema,
  lesson_content: LessonContentPayloadSchema,
  component_regen: ComponentRegenPayloadSchema,
  full_course: FullCoursePayloadSchema,
};

/**
 * Outline edits: entries with an id keep it, entries without one are new.
 */
export const OutlineLessonUpdateSchema = z.object({
  id: id.optional(),
  title: z.string().trim().min(1),
  description: z.string().default(''),
  estimatedDurationMinutes: z.number().int().positive().nullable().default(null),
  learningObjectives: z.array(z.string().trim().min(1)).default([]),
});

export const OutlineSectionUpdateSchema = z.object({
  id: id.optional(),
  title: z.string().trim().min(1),
  description: z.string().default(''),
  lessons: z.array(OutlineLessonUpdateSchema),
});

export const OutlineUpdateSchema = z.array(OutlineSectionUpdateSchema).min(1, 'An outline needs at least one section');

export type OutlineSectionUpdate = z.infer<typeof OutlineSectionUpdateSchema>;

/**
 * Provider output shapes. Generated text is untrusted until it passes these.
 */
export const GeneratedOutlineSchema = z.object({
  sections: z
    .array(
      z.object({
        title: z.string().trim().min(1),
        description: z.string().default(''),
        lessons: z
          .array(
            z.object({
              title: z.string().trim().min(1),
              description: z.string().default(''),
              estimatedDurationMinutes: z.number().int().positive().nullable().optional(),
              learningObjectives: z.array(z.string()).default([]),
            })
          )
          .min(1),
      })
    )
    .min(1),
});

export const QuizContentSchema = z.object({
  question: z.string().min(1),
  questionType: z.enum(['multiple_choice', 'true_false']).default('multiple_choice'),
  options: z.array(z.object({ id: z.string().min(1), text: z.string().min(1) })).min(2),
  correctAnswerId: z.string().min(1),
  explanation: z.string().default(''),
  correctFeedback: z.string().optional(),
  incorrectFeedback: z.string().optional(),
});

export const GeneratedComponentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), content: z.object({ html: z.string(), plaintext: z.string().default('') }) }),
  z.object({ type: z.literal('heading'), content: z.object({ level: z.number().int().min(1).max(4).default(2), text: z.string().min(1) }) }),
  z.object({
    type: z.literal('image'),
    content: z.object({ url: z.string().min(1), altText: z.string().default(''), caption: z.string().optional() }),
  }),
  z.object({ type: z.literal('quiz'), content: QuizContentSchema }),
]);

export type GeneratedComponent = z.infer<typeof GeneratedComponentSchema>;

export const GeneratedLessonSchema = z.object({
  title: z.string().trim().min(1),
  segueText: z.string().nullable().optional(),
  components: z.array(GeneratedComponentSchema).min(1),
});

export const GeneratedSmeSummarySchema = z.object({
  summary: z.string().trim().min(1),
  keyPoints: z.array(z.string()).default([]),
});

/**
 * Parse with a zod schema, raising ValidationError with flattened field errors.
 */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  const flat = parsed.error.flatten();
  const first =
    parsed.error.issues[0] !== undefined
      ? `${parsed.error.issues[0].path.join('.') || label}: ${parsed.error.issues[0].message}`
      : 'invalid';
  throw new ValidationError(`Invalid ${label}: ${first}`, flat);
}
