/**
 * In-process stores for tests and `STORE=memory` runs.
 *
 * Every method completes its read-check-write without awaiting in between,
 * so guards and claims are atomic on the single JS thread. Values are cloned
 * in and out so callers never share references with the store.
 */

import type {
  CourseOutline,
  GeneratedLesson,
  GenerationJob,
  KnowledgeSource,
  LessonComponent,
  Notification,
  OutlineApprovalStatus,
  TargetAudience,
} from '../../lib/types/generation';
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

const clone = <T>(value: T): T => structuredClone(value);

function newestFirst(a: { createdAt: string }, b: { createdAt: string }): number {
  return b.createdAt.localeCompare(a.createdAt);
}

export class MemoryJobStore implements JobStore {
  private readonly rows = new Map<string, GenerationJob>();

  async insert(job: GenerationJob): Promise<GenerationJob> {
    if (this.rows.has(job.id)) throw new Error(`duplicate job id: ${job.id}`);
    this.rows.set(job.id, clone(job));
    return clone(job);
  }

  async get(id: string): Promise<GenerationJob | null> {
    const row = this.rows.get(id);
    return row ? clone(row) : null;
  }

  async list(filter: JobListFilter): Promise<GenerationJob[]> {
    const statuses = filter.status === undefined ? null : typeof filter.status === 'string' ? [filter.status] : filter.status;
    return [...this.rows.values()]
      .filter((j) => j.tenantId === filter.tenantId)
      .filter((j) => !filter.type || j.type === filter.type)
      .filter((j) => !statuses || statuses.includes(j.status))
      .filter((j) => !filter.courseId || j.courseId === filter.courseId)
      .filter((j) => !filter.topLevelOnly || j.parentJobId === null)
      .reverse()
      .sort(newestFirst)
      .slice(0, filter.limit)
      .map(clone);
  }

  async listChildren(parentJobId: string): Promise<GenerationJob[]> {
    return [...this.rows.values()].filter((j) => j.parentJobId === parentJobId).map(clone);
  }

  async update(id: string, guard: JobGuard, patch: JobPatch): Promise<GenerationJob | null> {
    const row = this.rows.get(id);
    if (!row || !guard.statuses.includes(row.status)) return null;
    if (guard.progressAtMost !== undefined && row.progressPercent > guard.progressAtMost) return null;
    const next: GenerationJob = { ...row, ...clone(patch) };
    this.rows.set(id, next);
    return clone(next);
  }

  async claimNext(now: Date): Promise<GenerationJob | null> {
    const nowIso = now.toISOString();
    const due = [...this.rows.values()]
      .filter((j) => j.status === 'queued' && (j.nextAttemptAt === null || j.nextAttemptAt <= nowIso))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    const job = due[0];
    if (!job) return null;
    const claimed: GenerationJob = {
      ...job,
      status: 'processing',
      startedAt: nowIso,
      lastHeartbeatAt: nowIso,
      progressMessage: 'Starting...',
      updatedAt: nowIso,
    };
    this.rows.set(job.id, claimed);
    return clone(claimed);
  }

  async listStale(cutoff: Date): Promise<GenerationJob[]> {
    const cutoffIso = cutoff.toISOString();
    return [...this.rows.values()]
      .filter((j) => j.status === 'processing')
      .filter((j) => (j.lastHeartbeatAt ?? j.startedAt ?? j.updatedAt) < cutoffIso)
      .map(clone);
  }
}

export class MemoryOutlineStore implements OutlineStore {
  private readonly rows = new Map<string, CourseOutline>();

  async insert(outline: CourseOutline): Promise<CourseOutline> {
    const clash = [...this.rows.values()].find((o) => o.courseId === outline.courseId && o.version === outline.version);
    if (clash) throw new Error(`outline version ${outline.version} already exists for course ${outline.courseId}`);
    this.rows.set(outline.id, clone(outline));
    return clone(outline);
  }

  async get(id: string): Promise<CourseOutline | null> {
    const row = this.rows.get(id);
    return row ? clone(row) : null;
  }

  async listForCourse(tenantId: string, courseId: string): Promise<CourseOutline[]> {
    return [...this.rows.values()]
      .filter((o) => o.tenantId === tenantId && o.courseId === courseId)
      .sort((a, b) => b.version - a.version)
      .map(clone);
  }

  async update(id: string, expected: readonly OutlineApprovalStatus[], patch: OutlinePatch): Promise<CourseOutline | null> {
    const row = this.rows.get(id);
    if (!row || !expected.includes(row.approvalStatus)) return null;
    const next: CourseOutline = { ...row, ...clone(patch) };
    this.rows.set(id, next);
    return clone(next);
  }
}

export class MemoryLessonStore implements LessonStore {
  private readonly rows = new Map<string, GeneratedLesson>();

  async upsert(lesson: GeneratedLesson): Promise<GeneratedLesson> {
    for (const [id, existing] of this.rows) {
      if (existing.outlineLessonId === lesson.outlineLessonId && id !== lesson.id) this.rows.delete(id);
    }
    this.rows.set(lesson.id, clone(lesson));
    return clone(lesson);
  }

  async get(id: string): Promise<GeneratedLesson | null> {
    const row = this.rows.get(id);
    return row ? clone(row) : null;
  }

  async listForCourse(tenantId: string, courseId: string): Promise<GeneratedLesson[]> {
    return [...this.rows.values()].filter((l) => l.tenantId === tenantId && l.courseId === courseId).map(clone);
  }

  async replaceComponent(lessonId: string, component: LessonComponent): Promise<GeneratedLesson | null> {
    const row = this.rows.get(lessonId);
    if (!row) return null;
    const index = row.components.findIndex((c) => c.id === component.id);
    if (index === -1) return null;
    const components = [...row.components];
    components[index] = clone(component);
    const next = { ...row, components };
    this.rows.set(lessonId, next);
    return clone(next);
  }
}

export class MemoryNotificationStore implements NotificationStore {
  private readonly rows = new Map<string, Notification>();

  async insert(notification: Notification): Promise<{ notification: Notification; created: boolean }> {
    if (notification.dedupeKey) {
      const existing = [...this.rows.values()].find(
        (n) => n.userId === notification.userId && n.dedupeKey === notification.dedupeKey
      );
      if (existing) return { notification: clone(existing), created: false };
    }
    this.rows.set(notification.id, clone(notification));
    return { notification: clone(notification), created: true };
  }

  async get(id: string): Promise<Notification | null> {
    const row = this.rows.get(id);
    return row ? clone(row) : null;
  }

  async list(userId: string, query: NotificationQuery): Promise<Notification[]> {
    const { before } = query;
    return [...this.rows.values()]
      .filter((n) => n.userId === userId)
      .filter((n) => !query.unreadOnly || !n.read)
      .sort((a, b) => newestFirst(a, b) || b.id.localeCompare(a.id))
      .filter(
        (n) =>
          !before || n.createdAt < before.createdAt || (n.createdAt === before.createdAt && n.id < before.id)
      )
      .slice(0, query.limit)
      .map(clone);
  }

  async unreadCount(userId: string): Promise<number> {
    return [...this.rows.values()].filter((n) => n.userId === userId && !n.read).length;
  }

  async markRead(userId: string, ids: readonly string[], readAt: string): Promise<string[]> {
    const changed: string[] = [];
    for (const id of ids) {
      const row = this.rows.get(id);
      if (!row || row.userId !== userId || row.read) continue;
      this.rows.set(id, { ...row, read: true, readAt });
      changed.push(id);
    }
    return changed;
  }

  async markAllRead(userId: string, readAt: string): Promise<string[]> {
    const ids = [...this.rows.values()].filter((n) => n.userId === userId && !n.read).map((n) => n.id);
    return this.markRead(userId, ids, readAt);
  }

  async delete(userId: string, id: string): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.userId !== userId) return false;
    return this.rows.delete(id);
  }
}

export class MemoryCourseContextStore implements CourseContextStore {
  private readonly knowledge = new Map<string, KnowledgeSource>();
  private readonly audiences = new Map<string, TargetAudience>();

  constructor(seed: { knowledge?: KnowledgeSource[]; audiences?: TargetAudience[] } = {}) {
    for (const k of seed.knowledge ?? []) this.knowledge.set(k.smeId, clone(k));
    for (const a of seed.audiences ?? []) this.audiences.set(a.id, clone(a));
  }

  async getKnowledge(tenantId: string, smeIds: readonly string[]): Promise<KnowledgeSource[]> {
    return smeIds
      .map((id) => this.knowledge.get(id))
      .filter((k): k is KnowledgeSource => !!k && k.tenantId === tenantId)
      .map(clone);
  }

  async saveKnowledge(source: KnowledgeSource): Promise<void> {
    this.knowledge.set(source.smeId, clone(source));
  }

  async getAudiences(tenantId: string, audienceIds: readonly string[]): Promise<TargetAudience[]> {
    return audienceIds
      .map((id) => this.audiences.get(id))
      .filter((a): a is TargetAudience => !!a && a.tenantId === tenantId)
      .map(clone);
  }

  addAudience(audience: TargetAudience): void {
    this.audiences.set(audience.id, clone(audience));
  }
}

export function createMemoryStores(seed?: { knowledge?: KnowledgeSource[]; audiences?: TargetAudience[] }): Stores & {
  context: MemoryCourseContextStore;
} {
  return {
    jobs: new MemoryJobStore(),
    outlines: new MemoryOutlineStore(),
    lessons: new MemoryLessonStore(),
    notifications: new MemoryNotificationStore(),
    context: new MemoryCourseContextStore(seed),
  };
}
