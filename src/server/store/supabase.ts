/**
 * Supabase-backed stores (service-role client).
 *
 * Guards map onto filtered updates (`.in("status", …)`), so a lost race
 * updates zero rows and returns null. Job claiming goes through the
 * `claim_next_generation_job` function (FOR UPDATE SKIP LOCKED).
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  GENERATION_JOB_STATUSES,
  GENERATION_JOB_TYPES,
  NOTIFICATION_TYPES,
  type CourseOutline,
  type GeneratedLesson,
  type GenerationJob,
  type KnowledgeSource,
  type LessonComponent,
  type Notification,
  type OutlineApprovalStatus,
  type TargetAudience,
} from '../../lib/types/generation';
import { CourseGenerationInputSchema } from '../../lib/schemas/generation';
import type {
  CourseContextStore,
  JobGuard,
  JobListFilter,
  JobPatch,
  JobStore,
  LessonStore,
  NotificationQuery,
  NotificationStore,
  OutlinePatch,
  OutlineStore,
  Stores,
} from './types';

export function createAdminSupabase(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, { auth: { persistSession: false } });
}

function fail(op: string, error: { message: string }): never {
  throw new Error(`${op} failed: ${error.message}`);
}

const ts = z.string();
const nts = z.string().nullable();

const JobRowSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  created_by_user_id: z.string(),
  type: z.enum(GENERATION_JOB_TYPES),
  status: z.enum(GENERATION_JOB_STATUSES),
  parent_job_id: nts,
  course_id: nts,
  lesson_id: nts,
  outline_lesson_id: nts,
  sme_id: nts,
  payload: z.record(z.unknown()).nullable(),
  progress_percent: z.number(),
  progress_message: nts,
  retry_count: z.number(),
  max_retries: z.number(),
  error_message: nts,
  tokens_used: z.number().nullable(),
  result: z.unknown().optional(),
  next_attempt_at: nts,
  last_heartbeat_at: nts,
  created_at: ts,
  started_at: nts,
  completed_at: nts,
  updated_at: ts,
});

type JobRow = z.infer<typeof JobRowSchema>;

function jobFromRow(row: JobRow): GenerationJob {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    createdByUserId: row.created_by_user_id,
    type: row.type,
    status: row.status,
    parentJobId: row.parent_job_id,
    courseId: row.course_id,
    lessonId: row.lesson_id,
    outlineLessonId: row.outline_lesson_id,
    smeId: row.sme_id,
    payload: row.payload ?? {},
    progressPercent: row.progress_percent,
    progressMessage: row.progress_message,
    retryCount: row.retry_count,
    maxRetries: row.max_retries,
    errorMessage: row.error_message,
    tokensUsed: row.tokens_used ?? 0,
    result: row.result ?? null,
    nextAttemptAt: row.next_attempt_at,
    lastHeartbeatAt: row.last_heartbeat_at,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    updatedAt: row.updated_at,
  };
}

function setColumn(row: Record<string, unknown>, column: string, value: unknown): void {
  if (value !== undefined) row[column] = value;
}

function jobPatchToRow(patch: JobPatch): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  setColumn(row, 'status', patch.status);
  setColumn(row, 'course_id', patch.courseId);
  setColumn(row, 'lesson_id', patch.lessonId);
  setColumn(row, 'outline_lesson_id', patch.outlineLessonId);
  setColumn(row, 'sme_id', patch.smeId);
  setColumn(row, 'payload', patch.payload);
  setColumn(row, 'progress_percent', patch.progressPercent);
  setColumn(row, 'progress_message', patch.progressMessage);
  setColumn(row, 'retry_count', patch.retryCount);
  setColumn(row, 'max_retries', patch.maxRetries);
  setColumn(row, 'error_message', patch.errorMessage);
  setColumn(row, 'tokens_used', patch.tokensUsed);
  setColumn(row, 'result', patch.result);
  setColumn(row, 'next_attempt_at', patch.nextAttemptAt);
  setColumn(row, 'last_heartbeat_at', patch.lastHeartbeatAt);
  setColumn(row, 'started_at', patch.startedAt);
  setColumn(row, 'completed_at', patch.completedAt);
  setColumn(row, 'updated_at', patch.updatedAt);
  return row;
}

function jobToRow(job: GenerationJob): Record<string, unknown> {
  return {
    id: job.id,
    tenant_id: job.tenantId,
    created_by_user_id: job.createdByUserId,
    type: job.type,
    parent_job_id: job.parentJobId,
    created_at: job.createdAt,
    ...jobPatchToRow(job),
  };
}

function parseJobRows(op: string, data: unknown): GenerationJob[] {
  const rows = Array.isArray(data) ? data : data ? [data] : [];
  return rows.map((row) => {
    const parsed = JobRowSchema.safeParse(row);
    if (!parsed.success) throw new Error(`${op}: unexpected row shape (${parsed.error.issues[0]?.message ?? 'invalid'})`);
    return jobFromRow(parsed.data);
  });
}

export class SupabaseJobStore implements JobStore {
  constructor(private readonly db: SupabaseClient) {}

  async insert(job: GenerationJob): Promise<GenerationJob> {
    const { data, error } = await this.db.from('generation_jobs').insert(jobToRow(job)).select().single();
    if (error) fail('insert_job', error);
    return parseJobRows('insert_job', data)[0] ?? job;
  }

  async get(id: string): Promise<GenerationJob | null> {
    const { data, error } = await this.db.from('generation_jobs').select('*').eq('id', id).maybeSingle();
    if (error) fail('load_job', error);
    return parseJobRows('load_job', data)[0] ?? null;
  }

  async list(filter: JobListFilter): Promise<GenerationJob[]> {
    let query = this.db.from('generation_jobs').select('*').eq('tenant_id', filter.tenantId);
    if (filter.type) query = query.eq('type', filter.type);
    if (typeof filter.status === 'string') query = query.eq('status', filter.status);
    else if (filter.status) query = query.in('status', [...filter.status]);
    if (filter.courseId) query = query.eq('course_id', filter.courseId);
    if (filter.topLevelOnly) query = query.is('parent_job_id', null);
    const { data, error } = await query.order('created_at', { ascending: false }).limit(filter.limit);
    if (error) fail('list_jobs', error);
    return parseJobRows('list_jobs', data);
  }

  async listChildren(parentJobId: string): Promise<GenerationJob[]> {
    const { data, error } = await this.db.from('generation_jobs').select('*').eq('parent_job_id', parentJobId);
    if (error) fail('list_child_jobs', error);
    return parseJobRows('list_child_jobs', data);
  }

  async update(id: string, guard: JobGuard, patch: JobPatch): Promise<GenerationJob | null> {
    let query = this.db
      .from('generation_jobs')
      .update(jobPatchToRow(patch))
      .eq('id', id)
      .in('status', [...guard.statuses]);
    if (guard.progressAtMost !== undefined) query = query.lte('progress_percent', guard.progressAtMost);
    const { data, error } = await query.select().maybeSingle();
    if (error) fail('update_job', error);
    return parseJobRows('update_job', data)[0] ?? null;
  }

  async claimNext(now: Date): Promise<GenerationJob | null> {
    const { data, error } = await this.db.rpc('claim_next_generation_job', { p_now: now.toISOString() });
    if (error) fail('claim_next_generation_job', error);
    // PostgREST returns SETOF as an array.
    return parseJobRows('claim_next_generation_job', data)[0] ?? null;
  }

  async listStale(cutoff: Date): Promise<GenerationJob[]> {
    const iso = cutoff.toISOString();
    const { data, error } = await this.db
      .from('generation_jobs')
      .select('*')
      .eq('status', 'processing')
      .or(`last_heartbeat_at.lt.${iso},and(last_heartbeat_at.is.null,started_at.lt.${iso})`);
    if (error) fail('list_stale_jobs', error);
    return parseJobRows('list_stale_jobs', data);
  }
}

const OutlineRowSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  course_id: z.string(),
  version: z.number(),
  approval_status: z.enum(['pending_review', 'approved', 'rejected', 'revision_requested']),
  sections: z.array(
    z.object({
      id: z.string(),
      title: z.string(),
      description: z.string(),
      lessons: z.array(
        z.object({
          id: z.string(),
          title: z.string(),
          description: z.string(),
          estimatedDurationMinutes: z.number().nullable(),
          learningObjectives: z.array(z.string()),
        })
      ),
    })
  ),
  generation_input: CourseGenerationInputSchema,
  requested_by_user_id: z.string(),
  source_job_id: nts,
  rejection_reason: nts,
  superseded_by_outline_id: nts,
  generated_at: ts,
  approved_at: nts,
  approved_by_user_id: nts,
  updated_at: ts,
});

function outlineFromRow(op: string, raw: unknown): CourseOutline {
  const parsed = OutlineRowSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`${op}: unexpected row shape (${parsed.error.issues[0]?.message ?? 'invalid'})`);
  const row = parsed.data;
  return {
    id: row.id,
    tenantId: row.tenant_id,
    courseId: row.course_id,
    version: row.version,
    approvalStatus: row.approval_status,
    sections: row.sections,
    generationInput: row.generation_input,
    requestedByUserId: row.requested_by_user_id,
    sourceJobId: row.source_job_id,
    rejectionReason: row.rejection_reason,
    supersededByOutlineId: row.superseded_by_outline_id,
    generatedAt: row.generated_at,
    approvedAt: row.approved_at,
    approvedByUserId: row.approved_by_user_id,
    updatedAt: row.updated_at,
  };
}

function outlinePatchToRow(patch: OutlinePatch): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  setColumn(row, 'approval_status', patch.approvalStatus);
  setColumn(row, 'sections', patch.sections);
  setColumn(row, 'rejection_reason', patch.rejectionReason);
  setColumn(row, 'superseded_by_outline_id', patch.supersededByOutlineId);
  setColumn(row, 'approved_at', patch.approvedAt);
  setColumn(row, 'approved_by_user_id', patch.approvedByUserId);
  setColumn(row, 'updated_at', patch.updatedAt);
  return row;
}

export class SupabaseOutlineStore implements OutlineStore {
  constructor(private readonly db: SupabaseClient) {}

  async insert(outline: CourseOutline): Promise<CourseOutline> {
    const { data, error } = await this.db
      .from('course_outlines')
      .insert({
        id: outline.id,
        tenant_id: outline.tenantId,
        course_id: outline.courseId,
        version: outline.version,
        generation_input: outline.generationInput,
        requested_by_user_id: outline.requestedByUserId,
        source_job_id: outline.sourceJobId,
        generated_at: outline.generatedAt,
        ...outlinePatchToRow(outline),
      })
      .select()
      .single();
    if (error) fail('insert_outline', error);
    return outlineFromRow('insert_outline', data);
  }

  async get(id: string): Promise<CourseOutline | null> {
    const { data, error } = await this.db.from('course_outlines').select('*').eq('id', id).maybeSingle();
    if (error) fail('load_outline', error);
    return data ? outlineFromRow('load_outline', data) : null;
  }

  async listForCourse(tenantId: string, courseId: string): Promise<CourseOutline[]> {
    const { data, error } = await this.db
      .from('course_outlines')
      .select('*')
      .eq('tenant_id', tenantId)
      .eq('course_id', courseId)
      .order('version', { ascending: false });
    if (error) fail('list_outlines', error);
    return (data ?? []).map((row: unknown) => outlineFromRow('list_outlines', row));
  }

  async update(id: string, expected: readonly OutlineApprovalStatus[], patch: OutlinePatch): Promise<CourseOutline | null> {
    const { data, error } = await this.db
      .from('course_outlines')
      .update(outlinePatchToRow(patch))
      .eq('id', id)
      .in('approval_status', [...expected])
      .select()
      .maybeSingle();
    if (error) fail('update_outline', error);
    return data ? outlineFromRow('update_outline', data) : null;
  }
}

const ComponentSchema = z.object({
  id: z.string(),
  type: z.enum(['text', 'heading', 'image', 'quiz']),
  order: z.number(),
  contentJson: z.string(),
  alignment: z
    .object({ personaIds: z.array(z.string()), learningObjectiveIds: z.array(z.string()), kpiIds: z.array(z.string()) })
    .optional(),
});

const LessonRowSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  course_id: z.string(),
  section_id: z.string(),
  outline_lesson_id: z.string(),
  title: z.string(),
  segue_text: nts,
  components: z.array(ComponentSchema),
  generated_at: ts,
});

function lessonFromRow(op: string, raw: unknown): GeneratedLesson {
  const parsed = LessonRowSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`${op}: unexpected row shape (${parsed.error.issues[0]?.message ?? 'invalid'})`);
  const row = parsed.data;
  return {
    id: row.id,
    tenantId: row.tenant_id,
    courseId: row.course_id,
    sectionId: row.section_id,
    outlineLessonId: row.outline_lesson_id,
    title: row.title,
    segueText: row.segue_text,
    components: row.components,
    generatedAt: row.generated_at,
  };
}

export class SupabaseLessonStore implements LessonStore {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(lesson: GeneratedLesson): Promise<GeneratedLesson> {
    const { data, error } = await this.db
      .from('generated_lessons')
      .upsert(
        {
          id: lesson.id,
          tenant_id: lesson.tenantId,
          course_id: lesson.courseId,
          section_id: lesson.sectionId,
          outline_lesson_id: lesson.outlineLessonId,
          title: lesson.title,
          segue_text: lesson.segueText,
          components: lesson.components,
          generated_at: lesson.generatedAt,
        },
        { onConflict: 'outline_lesson_id' }
      )
      .select()
      .single();
    if (error) fail('upsert_lesson', error);
    return lessonFromRow('upsert_lesson', data);
  }

  async get(id: string): Promise<GeneratedLesson | null> {
    const { data, error } = await this.db.from('generated_lessons').select('*').eq('id', id).maybeSingle();
    if (error) fail('load_lesson', error);
    return data ? lessonFromRow('load_lesson', data) : null;
  }

  async listForCourse(tenantId: string, courseId: string): Promise<GeneratedLesson[]> {
    const { data, error } = await this.db
      .from('generated_lessons')
      .select('*')
      .eq('tenant_id', tenantId)
      .eq('course_id', courseId);
    if (error) fail('list_lessons', error);
    return (data ?? []).map((row: unknown) => lessonFromRow('list_lessons', row));
  }

  async replaceComponent(lessonId: string, component: LessonComponent): Promise<GeneratedLesson | null> {
    const lesson = await this.get(lessonId);
    if (!lesson) return null;
    const index = lesson.components.findIndex((c) => c.id === component.id);
    if (index === -1) return null;
    const components = lesson.components.map((c, i) => (i === index ? component : c));
    const { data, error } = await this.db
      .from('generated_lessons')
      .update({ components })
      .eq('id', lessonId)
      .select()
      .maybeSingle();
    if (error) fail('replace_component', error);
    return data ? lessonFromRow('replace_component', data) : null;
  }
}

const NotificationRowSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  user_id: z.string(),
  type: z.enum(NOTIFICATION_TYPES),
  priority: z.enum(['low', 'normal', 'high']),
  title: z.string(),
  message: z.string(),
  course_id: nts,
  job_id: nts,
  task_id: nts,
  sme_id: nts,
  dedupe_key: nts,
  read: z.boolean(),
  read_at: nts,
  created_at: ts,
});

function notificationFromRow(op: string, raw: unknown): Notification {
  const parsed = NotificationRowSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`${op}: unexpected row shape (${parsed.error.issues[0]?.message ?? 'invalid'})`);
  const row = parsed.data;
  return {
    id: row.id,
    tenantId: row.tenant_id,
    userId: row.user_id,
    type: row.type,
    priority: row.priority,
    title: row.title,
    message: row.message,
    courseId: row.course_id,
    jobId: row.job_id,
    taskId: row.task_id,
    smeId: row.sme_id,
    dedupeKey: row.dedupe_key,
    read: row.read,
    readAt: row.read_at,
    createdAt: row.created_at,
  };
}

const IdRowsSchema = z.array(z.object({ id: z.string() }));

export class SupabaseNotificationStore implements NotificationStore {
  constructor(private readonly db: SupabaseClient) {}

  async insert(n: Notification): Promise<{ notification: Notification; created: boolean }> {
    const { data, error } = await this.db
      .from('notifications')
      .upsert(
        {
          id: n.id,
          tenant_id: n.tenantId,
          user_id: n.userId,
          type: n.type,
          priority: n.priority,
          title: n.title,
          message: n.message,
          course_id: n.courseId,
          job_id: n.jobId,
          task_id: n.taskId,
          sme_id: n.smeId,
          dedupe_key: n.dedupeKey,
          read: n.read,
          read_at: n.readAt,
          created_at: n.createdAt,
        },
        { onConflict: 'user_id,dedupe_key', ignoreDuplicates: true }
      )
      .select();
    if (error) fail('insert_notification', error);
    const inserted = Array.isArray(data) ? data[0] : undefined;
    if (inserted) return { notification: notificationFromRow('insert_notification', inserted), created: true };

    const existing = await this.db
      .from('notifications')
      .select('*')
      .eq('user_id', n.userId)
      .eq('dedupe_key', n.dedupeKey ?? '')
      .maybeSingle();
    if (existing.error) fail('load_duplicate_notification', existing.error);
    if (!existing.data) throw new Error('insert_notification: row neither inserted nor found');
    return { notification: notificationFromRow('load_duplicate_notification', existing.data), created: false };
  }

  async get(id: string): Promise<Notification | null> {
    const { data, error } = await this.db.from('notifications').select('*').eq('id', id).maybeSingle();
    if (error) fail('load_notification', error);
    return data ? notificationFromRow('load_notification', data) : null;
  }

  async list(userId: string, query: NotificationQuery): Promise<Notification[]> {
    let q = this.db.from('notifications').select('*').eq('user_id', userId);
    if (query.unreadOnly) q = q.eq('read', false);
    if (query.before) {
      const { createdAt, id } = query.before;
      q = q.or(`created_at.lt.${createdAt},and(created_at.eq.${createdAt},id.lt.${id})`);
    }
    const { data, error } = await q
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .limit(query.limit);
    if (error) fail('list_notifications', error);
    return (data ?? []).map((row: unknown) => notificationFromRow('list_notifications', row));
  }

  async unreadCount(userId: string): Promise<number> {
    const { count, error } = await this.db
      .from('notifications')
      .select('id', { count: 'exact', head: true })
      .eq('user_id', userId)
      .eq('read', false);
    if (error) fail('count_unread_notifications', error);
    return count ?? 0;
  }

  async markRead(userId: string, ids: readonly string[], readAt: string): Promise<string[]> {
    if (!ids.length) return [];
    const { data, error } = await this.db
      .from('notifications')
      .update({ read: true, read_at: readAt })
      .eq('user_id', userId)
      .eq('read', false)
      .in('id', [...ids])
      .select('id');
    if (error) fail('mark_notifications_read', error);
    return IdRowsSchema.parse(data ?? []).map((r) => r.id);
  }

  async markAllRead(userId: string, readAt: string): Promise<string[]> {
    const { data, error } = await this.db
      .from('notifications')
      .update({ read: true, read_at: readAt })
      .eq('user_id', userId)
      .eq('read', false)
      .select('id');
    if (error) fail('mark_all_notifications_read', error);
    return IdRowsSchema.parse(data ?? []).map((r) => r.id);
  }

  async delete(userId: string, id: string): Promise<boolean> {
    const { data, error } = await this.db
      .from('notifications')
      .delete()
      .eq('id', id)
      .eq('user_id', userId)
      .select('id');
    if (error) fail('delete_notification', error);
    return IdRowsSchema.parse(data ?? []).length > 0;
  }
}

const KnowledgeRowSchema = z.object({
  sme_id: z.string(),
  tenant_id: z.string(),
  title: z.string(),
  summary: z.string(),
  chunks: z.array(z.string()),
  updated_at: ts,
});

const AudienceRowSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  experience_level: z.enum(['beginner', 'intermediate', 'advanced']),
});

export class SupabaseCourseContextStore implements CourseContextStore {
  constructor(private readonly db: SupabaseClient) {}

  async getKnowledge(tenantId: string, smeIds: readonly string[]): Promise<KnowledgeSource[]> {
    if (!smeIds.length) return [];
    const { data, error } = await this.db
      .from('sme_knowledge')
      .select('*')
      .eq('tenant_id', tenantId)
      .in('sme_id', [...smeIds]);
    if (error) fail('load_knowledge', error);
    return z
      .array(KnowledgeRowSchema)
      .parse(data ?? [])
      .map((row) => ({
        smeId: row.sme_id,
        tenantId: row.tenant_id,
        title: row.title,
        summary: row.summary,
        chunks: row.chunks,
        updatedAt: row.updated_at,
      }));
  }

  async saveKnowledge(source: KnowledgeSource): Promise<void> {
    const { error } = await this.db.from('sme_knowledge').upsert(
      {
        sme_id: source.smeId,
        tenant_id: source.tenantId,
        title: source.title,
        summary: source.summary,
        chunks: source.chunks,
        updated_at: source.updatedAt,
      },
      { onConflict: 'sme_id' }
    );
    if (error) fail('save_knowledge', error);
  }

  async getAudiences(tenantId: string, audienceIds: readonly string[]): Promise<TargetAudience[]> {
    if (!audienceIds.length) return [];
    const { data, error } = await this.db
      .from('target_audiences')
      .select('id, tenant_id, name, description, experience_level')
      .eq('tenant_id', tenantId)
      .in('id', [...audienceIds]);
    if (error) fail('load_audiences', error);
    return z
      .array(AudienceRowSchema)
      .parse(data ?? [])
      .map((row) => ({
        id: row.id,
        tenantId: row.tenant_id,
        name: row.name,
        description: row.description ?? '',
        experienceLevel: row.experience_level,
      }));
  }
}

export function createSupabaseStores(db: SupabaseClient): Stores {
  return {
    jobs: new SupabaseJobStore(db),
    outlines: new SupabaseOutlineStore(db),
    lessons: new SupabaseLessonStore(db),
    notifications: new SupabaseNotificationStore(db),
    context: new SupabaseCourseContextStore(db),
  };
}
