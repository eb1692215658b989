import { v4 as uuidv4 } from 'uuid';
import type {
  CourseOutline,
  GenerationJob,
  Notification,
  NotificationPriority,
  NotificationType,
} from '../../lib/types/generation';
import { NotFoundError, ValidationError } from '../../lib/errors';
import { createLogger, type Logger } from '../../lib/logger';
import { JOB_TYPE_LABELS } from '../../lib/pipeline/progress';
import type { NotificationCursor, NotificationStore } from '../store/types';
import type { NotificationHub } from './hub';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface CreateNotificationInput {
  tenantId: string;
  userId: string;
  type: NotificationType;
  priority?: NotificationPriority;
  title: string;
  message: string;
  courseId?: string | null;
  jobId?: string | null;
  taskId?: string | null;
  smeId?: string | null;
  /** Idempotency key; a second create with the same key for the same user is a no-op. */
  dedupeKey?: string | null;
}

export interface NotificationPage {
  notifications: Notification[];
  nextCursor: string | null;
}

export function encodeCursor(n: Pick<Notification, 'createdAt' | 'id'>): string {
  return `${n.createdAt}|${n.id}`;
}

export function decodeCursor(cursor: string): NotificationCursor {
  const sep = cursor.lastIndexOf('|');
  const createdAt = sep > 0 ? cursor.slice(0, sep) : '';
  const id = sep > 0 ? cursor.slice(sep + 1) : '';
  if (!createdAt || !id || Number.isNaN(Date.parse(createdAt))) {
    throw new ValidationError('Invalid cursor');
  }
  return { createdAt, id };
}

interface TransitionNotice {
  type: NotificationType;
  priority: NotificationPriority;
  title: string;
  message: string;
}

/**
 * Which notification (if any) a job transition produces. Child lesson jobs
 * stay silent; their parent reports for them.
 */
export function describeJobTransition(job: GenerationJob): TransitionNotice | null {
  if (job.type === 'lesson_content' && job.parentJobId) return null;
  const label = JOB_TYPE_LABELS[job.type];

  if (job.status === 'completed') {
    if (job.type === 'course_outline') {
      return {
        type: 'outline_ready',
        priority: 'normal',
        title: `${label} Complete`,
        message: 'Your course outline is ready for review.',
      };
    }
    if (job.type === 'sme_ingestion') {
      return {
        type: 'ingestion_complete',
        priority: 'normal',
        title: `${label} Complete`,
        message: 'Source material has been processed and is ready to use.',
      };
    }
    return {
      type: 'generation_complete',
      priority: 'normal',
      title: `${label} Complete`,
      message: job.progressMessage || `${label} finished successfully.`,
    };
  }

  if (job.status === 'failed') {
    return {
      type: job.type === 'sme_ingestion' ? 'ingestion_failed' : 'generation_failed',
      priority: 'high',
      title: `${label} Failed`,
      message: job.errorMessage || `${label} failed.`,
    };
  }

  return null;
}

export class NotificationService {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: NotificationStore,
    private readonly hub: NotificationHub,
    opts: { logger?: Logger; now?: () => Date } = {}
  ) {
    this.log = opts.logger ?? createLogger('notifications');
    this.now = opts.now ?? (() => new Date());
  }

  async create(input: CreateNotificationInput): Promise<{ notification: Notification; created: boolean }> {
    const notification: Notification = {
      id: uuidv4(),
      tenantId: input.tenantId,
      userId: input.userId,
      type: input.type,
      priority: input.priority ?? 'normal',
      title: input.title,
      message: input.message,
      courseId: input.courseId ?? null,
      jobId: input.jobId ?? null,
      taskId: input.taskId ?? null,
      smeId: input.smeId ?? null,
      dedupeKey: input.dedupeKey ?? null,
      read: false,
      readAt: null,
      createdAt: this.now().toISOString(),
    };
    const result = await this.store.insert(notification);
    if (result.created) {
      this.hub.publish(input.userId, { eventType: 'NOTIFICATION_CREATED', notification: result.notification });
    }
    return result;
  }

  /**
   * Best-effort: a failure here is logged and never reaches the job that triggered it.
   */
  async notifyJobTransition(job: GenerationJob): Promise<Notification | null> {
    const notice = describeJobTransition(job);
    if (!notice) return null;
    try {
      const { notification } = await this.create({
        ...notice,
        tenantId: job.tenantId,
        userId: job.createdByUserId,
        courseId: job.courseId,
        jobId: job.id,
        smeId: job.smeId,
        dedupeKey: `${job.id}:${job.status}`,
      });
      return notification;
    } catch (error) {
      this.log.warn('job notification failed', { jobId: job.id, status: job.status, error: String(error) });
      return null;
    }
  }

  async notifyApprovalRequested(outline: CourseOutline): Promise<Notification | null> {
    try {
      const { notification } = await this.create({
        tenantId: outline.tenantId,
        userId: outline.requestedByUserId,
        type: 'approval_requested',
        priority: 'normal',
        title: 'Outline Approval Requested',
        message: `Version ${outline.version} of the course outline is waiting for approval.`,
        courseId: outline.courseId,
        dedupeKey: `${outline.id}:approval_requested:${outline.updatedAt}`,
      });
      return notification;
    } catch (error) {
      this.log.warn('approval notification failed', { outlineId: outline.id, error: String(error) });
      return null;
    }
  }

  async list(
    userId: string,
    opts: { cursor?: string | null; limit?: number; unreadOnly?: boolean } = {}
  ): Promise<NotificationPage> {
    const limit = Math.min(Math.max(1, Math.floor(opts.limit ?? DEFAULT_PAGE_SIZE)), MAX_PAGE_SIZE);
    const before = opts.cursor ? decodeCursor(opts.cursor) : undefined;
    const rows = await this.store.list(userId, { before, limit: limit + 1, unreadOnly: opts.unreadOnly });
    const page = rows.slice(0, limit);
    const last = page[page.length - 1];
    return { notifications: page, nextCursor: rows.length > limit && last ? encodeCursor(last) : null };
  }

  unreadCount(userId: string): Promise<number> {
    return this.store.unreadCount(userId);
  }

  async markAsRead(userId: string, ids: readonly string[]): Promise<number> {
    const changed = await this.store.markRead(userId, ids, this.now().toISOString());
    if (changed.length) this.hub.publish(userId, { eventType: 'NOTIFICATION_READ', notificationIds: changed });
    return changed.length;
  }

  async markAllAsRead(userId: string): Promise<number> {
    const changed = await this.store.markAllRead(userId, this.now().toISOString());
    if (changed.length) this.hub.publish(userId, { eventType: 'NOTIFICATION_READ', notificationIds: changed });
    return changed.length;
  }

  async delete(userId: string, id: string): Promise<void> {
    const deleted = await this.store.delete(userId, id);
    if (!deleted) throw new NotFoundError(`Notification not found: ${id}`);
    this.hub.publish(userId, { eventType: 'NOTIFICATION_DELETED', notificationIds: [id] });
  }
}
