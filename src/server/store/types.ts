import type {
  CourseOutline,
  GeneratedLesson,
  GenerationJob,
  GenerationJobStatus,
  GenerationJobType,
  KnowledgeSource,
  LessonComponent,
  Notification,
  OutlineApprovalStatus,
  TargetAudience,
} from '../../lib/types/generation';

export type JobPatch = Partial<
  Omit<GenerationJob, 'id' | 'tenantId' | 'type' | 'createdByUserId' | 'createdAt' | 'parentJobId'>
>;

/**
 * Compare-and-set guard. An update applies only while the stored job still
 * matches; otherwise the store returns null and leaves the row untouched.
 */
export interface JobGuard {
  statuses: readonly GenerationJobStatus[];
  /** Reject the update when stored progress is already above this value. */
  progressAtMost?: number;
}

export interface JobListFilter {
  tenantId: string;
  type?: GenerationJobType;
  status?: GenerationJobStatus | readonly GenerationJobStatus[];
  courseId?: string;
  topLevelOnly?: boolean;
  limit: number;
}

export interface JobStore {
  insert(job: GenerationJob): Promise<GenerationJob>;
  get(id: string): Promise<GenerationJob | null>;
  /** Newest first. */
  list(filter: JobListFilter): Promise<GenerationJob[]>;
  /** Every child of a parent, read as one snapshot. */
  listChildren(parentJobId: string): Promise<GenerationJob[]>;
  update(id: string, guard: JobGuard, patch: JobPatch): Promise<GenerationJob | null>;
  /** Atomically move the oldest due `queued` job to `processing`. */
  claimNext(now: Date): Promise<GenerationJob | null>;
  /** `processing` jobs with no checkpoint since `cutoff`. */
  listStale(cutoff: Date): Promise<GenerationJob[]>;
}

export type OutlinePatch = Partial<
  Pick<
    CourseOutline,
    | 'approvalStatus'
    | 'sections'
    | 'rejectionReason'
    | 'supersededByOutlineId'
    | 'approvedAt'
    | 'approvedByUserId'
    | 'updatedAt'
  >
>;

export interface OutlineStore {
  insert(outline: CourseOutline): Promise<CourseOutline>;
  get(id: string): Promise<CourseOutline | null>;
  /** Newest version first. */
  listForCourse(tenantId: string, courseId: string): Promise<CourseOutline[]>;
  update(id: string, expected: readonly OutlineApprovalStatus[], patch: OutlinePatch): Promise<CourseOutline | null>;
}

export interface LessonStore {
  /** Insert or replace the lesson generated for an outline lesson. */
  upsert(lesson: GeneratedLesson): Promise<GeneratedLesson>;
  get(id: string): Promise<GeneratedLesson | null>;
  listForCourse(tenantId: string, courseId: string): Promise<GeneratedLesson[]>;
  replaceComponent(lessonId: string, component: LessonComponent): Promise<GeneratedLesson | null>;
}

export interface NotificationCursor {
  createdAt: string;
  id: string;
}

export interface NotificationQuery {
  before?: NotificationCursor;
  limit: number;
  unreadOnly?: boolean;
}

export interface NotificationStore {
  /** A second insert with the same user and dedupe key returns the stored row with `created: false`. */
  insert(notification: Notification): Promise<{ notification: Notification; created: boolean }>;
  get(id: string): Promise<Notification | null>;
  /** Newest first, strictly older than `before`. */
  list(userId: string, query: NotificationQuery): Promise<Notification[]>;
  unreadCount(userId: string): Promise<number>;
  /** Returns the ids that changed from unread to read. */
  markRead(userId: string, ids: readonly string[], readAt: string): Promise<string[]>;
  markAllRead(userId: string, readAt: string): Promise<string[]>;
  delete(userId: string, id: string): Promise<boolean>;
}

export interface CourseContextStore {
  getKnowledge(tenantId: string, smeIds: readonly string[]): Promise<KnowledgeSource[]>;
  saveKnowledge(source: KnowledgeSource): Promise<void>;
  getAudiences(tenantId: string, audienceIds: readonly string[]): Promise<TargetAudience[]>;
}

export interface Stores {
  jobs: JobStore;
  outlines: OutlineStore;
  lessons: LessonStore;
  notifications: NotificationStore;
  context: CourseContextStore;
}
