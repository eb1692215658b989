/**
 * Course generation domain types.
 *
 * Shared by the gateway, the worker and the client controller. Field names are
 * camelCase here; the Supabase adapters map them to snake_case columns.
 */

export const GENERATION_JOB_TYPES = [
  'sme_ingestion',
  'course_outline',
  'lesson_content',
  'component_regen',
  'full_course',
] as const;

export type GenerationJobType = (typeof GENERATION_JOB_TYPES)[number];

export const GENERATION_JOB_STATUSES = ['queued', 'processing', 'completed', 'failed', 'cancelled'] as const;

export type GenerationJobStatus = (typeof GENERATION_JOB_STATUSES)[number];

export type TerminalJobStatus = Extract<GenerationJobStatus, 'completed' | 'failed' | 'cancelled'>;

export const TERMINAL_JOB_STATUSES: readonly TerminalJobStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminalStatus(status: GenerationJobStatus): status is TerminalJobStatus {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

export interface GenerationJob {
  id: string;
  tenantId: string;
  createdByUserId: string;
  type: GenerationJobType;
  status: GenerationJobStatus;
  parentJobId: string | null;
  courseId: string | null;
  lessonId: string | null;
  outlineLessonId: string | null;
  smeId: string | null;
  payload: Record<string, unknown>;
  progressPercent: number;
  progressMessage: string | null;
  retryCount: number;
  maxRetries: number;
  errorMessage: string | null;
  tokensUsed: number;
  result?: unknown;
  nextAttemptAt: string | null;
  lastHeartbeatAt: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  updatedAt: string;
}

export interface CourseGenerationInput {
  courseId: string;
  knowledgeSourceIds: string[];
  targetAudienceIds: string[];
  desiredOutcome: string;
  additionalContext?: string;
}

export type OutlineApprovalStatus = 'pending_review' | 'approved' | 'rejected' | 'revision_requested';

export interface OutlineLesson {
  id: string;
  title: string;
  description: string;
  estimatedDurationMinutes: number | null;
  learningObjectives: string[];
}

export interface OutlineSection {
  id: string;
  title: string;
  description: string;
  lessons: OutlineLesson[];
}

export interface CourseOutline {
  id: string;
  tenantId: string;
  courseId: string;
  version: number;
  approvalStatus: OutlineApprovalStatus;
  sections: OutlineSection[];
  generationInput: CourseGenerationInput;
  requestedByUserId: string;
  sourceJobId: string | null;
  rejectionReason: string | null;
  supersededByOutlineId: string | null;
  generatedAt: string;
  approvedAt: string | null;
  approvedByUserId: string | null;
  updatedAt: string;
}

export type LessonComponentType = 'text' | 'heading' | 'image' | 'quiz';

export interface ComponentAlignment {
  personaIds: string[];
  learningObjectiveIds: string[];
  kpiIds: string[];
}

export interface LessonComponent {
  id: string;
  type: LessonComponentType;
  order: number;
  /** Type-specific payload, serialized JSON. */
  contentJson: string;
  alignment?: ComponentAlignment;
}

export interface GeneratedLesson {
  id: string;
  tenantId: string;
  courseId: string;
  sectionId: string;
  outlineLessonId: string;
  title: string;
  segueText: string | null;
  components: LessonComponent[];
  generatedAt: string;
}

export interface TextContent {
  html: string;
  plaintext: string;
}

export interface HeadingContent {
  level: number;
  text: string;
}

export interface ImageContent {
  url: string;
  altText: string;
  caption?: string;
}

export interface QuizOption {
  id: string;
  text: string;
}

export interface QuizContent {
  question: string;
  questionType: 'multiple_choice' | 'true_false';
  options: QuizOption[];
  correctAnswerId: string;
  explanation: string;
  correctFeedback?: string;
  incorrectFeedback?: string;
}

export interface KnowledgeSource {
  smeId: string;
  tenantId: string;
  title: string;
  summary: string;
  chunks: string[];
  updatedAt: string;
}

export interface TargetAudience {
  id: string;
  tenantId: string;
  name: string;
  description: string;
  experienceLevel: 'beginner' | 'intermediate' | 'advanced';
}

export const NOTIFICATION_TYPES = [
  'task_assigned',
  'task_due_soon',
  'ingestion_complete',
  'ingestion_failed',
  'outline_ready',
  'generation_complete',
  'generation_failed',
  'approval_requested',
] as const;

export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export type NotificationPriority = 'low' | 'normal' | 'high';

export interface Notification {
  id: string;
  tenantId: string;
  userId: string;
  type: NotificationType;
  priority: NotificationPriority;
  title: string;
  message: string;
  courseId: string | null;
  jobId: string | null;
  taskId: string | null;
  smeId: string | null;
  dedupeKey: string | null;
  read: boolean;
  readAt: string | null;
  createdAt: string;
}

export type NotificationEventType =
  | 'NOTIFICATION_CREATED'
  | 'NOTIFICATION_READ'
  | 'NOTIFICATION_DELETED'
  | 'KEEPALIVE';

export interface NotificationEvent {
  eventType: NotificationEventType;
  notification?: Notification;
  /** Ids affected by read/delete events. */
  notificationIds?: string[];
}

/** The authenticated caller, resolved to its tenant scope. */
export interface RequestContext {
  tenantId: string;
  userId: string;
  role?: string;
}
