import { z } from 'zod';
import {
  GENERATION_JOB_STATUSES,
  GENERATION_JOB_TYPES,
  NOTIFICATION_TYPES,
  type CourseOutline,
  type GeneratedLesson,
  type GenerationJob,
  type Notification,
} from '../types/generation';
import { CourseGenerationInputSchema } from './generation';

/**
 * Response shapes returned by the course API. The client parses every body
 * with these before handing it to callers.
 */

const nullableString = z.string().nullable();

export const GenerationJobSchema: z.ZodType<GenerationJob, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  tenantId: z.string(),
  createdByUserId: z.string(),
  type: z.enum(GENERATION_JOB_TYPES),
  status: z.enum(GENERATION_JOB_STATUSES),
  parentJobId: nullableString,
  courseId: nullableString,
  lessonId: nullableString,
  outlineLessonId: nullableString,
  smeId: nullableString,
  payload: z.record(z.unknown()),
  progressPercent: z.number(),
  progressMessage: nullableString,
  retryCount: z.number().int(),
  maxRetries: z.number().int(),
  errorMessage: nullableString,
  tokensUsed: z.number(),
  result: z.unknown().optional(),
  nextAttemptAt: nullableString,
  lastHeartbeatAt: nullableString,
  createdAt: z.string(),
  startedAt: nullableString,
  completedAt: nullableString,
  updatedAt: z.string(),
});

const OutlineLessonSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  estimatedDurationMinutes: z.number().nullable(),
  learningObjectives: z.array(z.string()),
});

const OutlineSectionSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  lessons: z.array(OutlineLessonSchema),
});

export const CourseOutlineSchema: z.ZodType<CourseOutline, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  tenantId: z.string(),
  courseId: z.string(),
  version: z.number().int(),
  approvalStatus: z.enum(['pending_review', 'approved', 'rejected', 'revision_requested']),
  sections: z.array(OutlineSectionSchema),
  generationInput: CourseGenerationInputSchema,
  requestedByUserId: z.string(),
  sourceJobId: nullableString,
  rejectionReason: nullableString,
  supersededByOutlineId: nullableString,
  generatedAt: z.string(),
  approvedAt: nullableString,
  approvedByUserId: nullableString,
  updatedAt: z.string(),
});

const LessonComponentSchema = z.object({
  id: z.string(),
  type: z.enum(['text', 'heading', 'image', 'quiz']),
  order: z.number().int(),
  contentJson: z.string(),
  alignment: z
    .object({
      personaIds: z.array(z.string()),
      learningObjectiveIds: z.array(z.string()),
      kpiIds: z.array(z.string()),
    })
    .optional(),
});

export const GeneratedLessonRecordSchema: z.ZodType<GeneratedLesson, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  tenantId: z.string(),
  courseId: z.string(),
  sectionId: z.string(),
  outlineLessonId: z.string(),
  title: z.string(),
  segueText: nullableString,
  components: z.array(LessonComponentSchema),
  generatedAt: z.string(),
});

export const NotificationSchema: z.ZodType<Notification, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  tenantId: z.string(),
  userId: z.string(),
  type: z.enum(NOTIFICATION_TYPES),
  priority: z.enum(['low', 'normal', 'high']),
  title: z.string(),
  message: z.string(),
  courseId: nullableString,
  jobId: nullableString,
  taskId: nullableString,
  smeId: nullableString,
  dedupeKey: nullableString,
  read: z.boolean(),
  readAt: nullableString,
  createdAt: z.string(),
});

export const NotificationPageSchema = z.object({
  notifications: z.array(NotificationSchema),
  nextCursor: z.string().nullable(),
});

export const ApiEnvelopeSchema = z.union([
  z.object({ ok: z.literal(true), data: z.unknown() }),
  z.object({
    ok: z.literal(false),
    error: z.object({ code: z.string(), message: z.string(), details: z.unknown().optional() }),
  }),
]);
