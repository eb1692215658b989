/**
 * Notification hub fan-out and the notification service inbox.
 */

import { NotFoundError, ValidationError } from '../../src/lib/errors';
import type { NotificationEvent } from '../../src/lib/types/generation';
import { NotificationHub } from '../../src/server/notifications/hub';
import {
  NotificationService,
  decodeCursor,
  describeJobTransition,
  encodeCursor,
} from '../../src/server/notifications/service';
import { MemoryNotificationStore } from '../../src/server/store/memory';
import { makeJob } from '../../src/store/fakes';
import { createClock, quietLogger } from '../helpers/pipeline';

function keepalive(): NotificationEvent {
  return { eventType: 'KEEPALIVE' };
}

function readEvent(ids: string[]): NotificationEvent {
  return { eventType: 'NOTIFICATION_READ', notificationIds: ids };
}

describe('NotificationHub', () => {
  it('fans one publish out to every stream of that user only', async () => {
    const hub = new NotificationHub({ logger: quietLogger });
    const a = hub.subscribeUserEvents('user-1');
    const b = hub.subscribeUserEvents('user-1');
    const other = hub.subscribeUserEvents('user-2');

    expect(hub.publish('user-1', readEvent(['n-1']))).toBe(2);
    expect((await a.stream.next()).value).toEqual(readEvent(['n-1']));
    expect((await b.stream.next()).value).toEqual(readEvent(['n-1']));

    other.cancel();
    expect((await other.stream.next()).done).toBe(true);
  });

  it('drops the oldest buffered event when a subscriber falls behind', async () => {
    const hub = new NotificationHub({ bufferSize: 2, logger: quietLogger });
    const sub = hub.subscribeUserEvents('user-1');

    hub.publish('user-1', readEvent(['n-1']));
    hub.publish('user-1', readEvent(['n-2']));
    hub.publish('user-1', readEvent(['n-3']));

    expect(sub.dropped).toBe(1);
    expect((await sub.stream.next()).value).toEqual(readEvent(['n-2']));
    expect((await sub.stream.next()).value).toEqual(readEvent(['n-3']));
  });

  it('disconnects slow subscribers under the disconnect policy', async () => {
    const hub = new NotificationHub({ bufferSize: 1, overflow: 'disconnect', logger: quietLogger });
    const sub = hub.subscribeUserEvents('user-1');

    expect(hub.publish('user-1', readEvent(['n-1']))).toBe(1);
    expect(hub.publish('user-1', readEvent(['n-2']))).toBe(0);

    expect(hub.subscriberCount('user-1')).toBe(0);
    expect((await sub.stream.next()).done).toBe(true);
  });

  it('hands a waiting reader the next event directly', async () => {
    const hub = new NotificationHub({ logger: quietLogger });
    const sub = hub.subscribeUserEvents('user-1');
    const pending = sub.stream.next();
    hub.publish('user-1', keepalive());
    expect((await pending).value).toEqual(keepalive());
  });

  it('releases the subscription on cancel and on close', async () => {
    const hub = new NotificationHub({ logger: quietLogger });
    const first = hub.subscribeUserEvents('user-1');
    const second = hub.subscribeUserEvents('user-1');
    expect(hub.subscriberCount()).toBe(2);

    first.cancel();
    first.cancel();
    expect(hub.subscriberCount('user-1')).toBe(1);

    const pending = second.stream.next();
    hub.close();
    expect((await pending).done).toBe(true);
    expect(hub.subscriberCount()).toBe(0);
  });

  it('passes publishes to listeners but not local-only deliveries', () => {
    const hub = new NotificationHub({ logger: quietLogger });
    const seen: string[] = [];
    const detach = hub.onPublish((userId, event) => seen.push(`${userId}:${event.eventType}`));

    hub.publish('user-1', keepalive());
    hub.deliverLocal('user-1', keepalive());
    detach();
    hub.publish('user-1', keepalive());

    expect(seen).toEqual(['user-1:KEEPALIVE']);
  });
});

describe('NotificationService', () => {
  function setup() {
    const clock = createClock();
    const hub = new NotificationHub({ logger: quietLogger });
    const service = new NotificationService(new MemoryNotificationStore(), hub, { now: clock.now, logger: quietLogger });
    return { clock, hub, service };
  }

  const base = {
    tenantId: 'tenant-1',
    userId: 'user-1',
    type: 'generation_complete' as const,
    title: 'Course Content Complete',
    message: 'All lessons generated successfully',
  };

  it('creates a keyed notification once and publishes it once', async () => {
    const { hub, service } = setup();
    const sub = hub.subscribeUserEvents('user-1');

    const first = await service.create({ ...base, dedupeKey: 'job-1:completed' });
    const second = await service.create({ ...base, dedupeKey: 'job-1:completed' });

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.notification.id).toBe(first.notification.id);
    expect(await service.unreadCount('user-1')).toBe(1);

    const event = await sub.stream.next();
    expect(event.value).toMatchObject({ eventType: 'NOTIFICATION_CREATED', notification: { id: first.notification.id } });
    hub.publish('user-1', keepalive());
    expect((await sub.stream.next()).value).toEqual(keepalive());
  });

  it('pages newest first with an opaque cursor', async () => {
    const { clock, service } = setup();
    const ids: string[] = [];
    for (const title of ['one', 'two', 'three']) {
      ids.push((await service.create({ ...base, title })).notification.id);
      clock.advanceMs(1000);
    }

    const page1 = await service.list('user-1', { limit: 2 });
    expect(page1.notifications.map((n) => n.title)).toEqual(['three', 'two']);
    expect(page1.nextCursor).toBe(`2026-03-01T10:00:01.000Z|${ids[1]}`);

    const page2 = await service.list('user-1', { limit: 2, cursor: page1.nextCursor });
    expect(page2.notifications.map((n) => n.title)).toEqual(['one']);
    expect(page2.nextCursor).toBeNull();
  });

  it('round-trips cursors and rejects malformed ones', () => {
    const cursor = encodeCursor({ createdAt: '2026-03-01T10:00:00.000Z', id: 'n-1' });
    expect(decodeCursor(cursor)).toEqual({ createdAt: '2026-03-01T10:00:00.000Z', id: 'n-1' });
    expect(() => decodeCursor('garbage')).toThrow(new ValidationError('Invalid cursor'));
  });

  it('marks read and publishes only the ids that changed', async () => {
    const { hub, service } = setup();
    const { notification } = await service.create(base);
    const sub = hub.subscribeUserEvents('user-1');

    expect(await service.markAsRead('user-1', [notification.id, 'missing'])).toBe(1);
    expect(await service.markAsRead('user-1', [notification.id])).toBe(0);
    expect((await sub.stream.next()).value).toEqual(readEvent([notification.id]));
    expect(await service.unreadCount('user-1')).toBe(0);
  });

  it('marks everything read in one call', async () => {
    const { service } = setup();
    await service.create({ ...base, title: 'a' });
    await service.create({ ...base, title: 'b' });
    expect(await service.markAllAsRead('user-1')).toBe(2);
    expect((await service.list('user-1', { unreadOnly: true })).notifications).toEqual([]);
  });

  it("does not delete another user's notification", async () => {
    const { service } = setup();
    const { notification } = await service.create(base);
    await expect(service.delete('user-2', notification.id)).rejects.toBeInstanceOf(NotFoundError);
    await service.delete('user-1', notification.id);
    expect(await service.unreadCount('user-1')).toBe(0);
  });

  describe('describeJobTransition', () => {
    it('stays silent for child lessons and cancellations', () => {
      expect(describeJobTransition(makeJob({ type: 'lesson_content', parentJobId: 'p-1', status: 'completed' }))).toBeNull();
      expect(describeJobTransition(makeJob({ status: 'cancelled' }))).toBeNull();
      expect(describeJobTransition(makeJob({ status: 'processing' }))).toBeNull();
    });

    it('maps ingestion failures to a high priority notice', () => {
      const notice = describeJobTransition(
        makeJob({ type: 'sme_ingestion', status: 'failed', errorMessage: 'Document is empty' })
      );
      expect(notice).toEqual({
        type: 'ingestion_failed',
        priority: 'high',
        title: 'SME Ingestion Failed',
        message: 'Document is empty',
      });
    });

    it('reports top-level lesson completion', () => {
      const notice = describeJobTransition(
        makeJob({ type: 'lesson_content', status: 'completed', progressMessage: 'Lesson generation complete' })
      );
      expect(notice?.type).toBe('generation_complete');
      expect(notice?.title).toBe('Lesson Content Complete');
      expect(notice?.message).toBe('Lesson generation complete');
    });
  });
});
