/**
 * Notification inbox and live event stream.
 */

import { z } from 'zod';
import type { ApiClient } from './common';
import { NetworkError, errorMessage } from '../errors';
import { NotificationPageSchema, NotificationSchema } from '../schemas/api';
import type { NotificationEvent } from '../types/generation';

export type NotificationPage = z.infer<typeof NotificationPageSchema>;

export interface ListNotificationsParams {
  cursor?: string | null;
  limit?: number;
  unreadOnly?: boolean;
}

const CountSchema = z.object({ count: z.number().int() });
const EmptySchema = z.object({}).passthrough();

export function listNotifications(client: ApiClient, params: ListNotificationsParams = {}): Promise<NotificationPage> {
  return client.get('/notifications', NotificationPageSchema, {
    query: { cursor: params.cursor, limit: params.limit, unreadOnly: params.unreadOnly },
  });
}

export async function getUnreadCount(client: ApiClient): Promise<number> {
  const data = await client.get('/notifications/unread-count', CountSchema);
  return data.count;
}

export async function markAsRead(client: ApiClient, ids: string[]): Promise<number> {
  const data = await client.post('/notifications/read', CountSchema, { body: { ids } });
  return data.count;
}

export async function markAllAsRead(client: ApiClient): Promise<number> {
  const data = await client.post('/notifications/read-all', CountSchema);
  return data.count;
}

export async function deleteNotification(client: ApiClient, id: string): Promise<void> {
  await client.delete(`/notifications/${encodeURIComponent(id)}`, EmptySchema);
}

const EventSchema = z.object({
  eventType: z.enum(['NOTIFICATION_CREATED', 'NOTIFICATION_READ', 'NOTIFICATION_DELETED', 'KEEPALIVE']),
  notification: NotificationSchema.optional(),
  notificationIds: z.array(z.string()).optional(),
});

export interface SseFrame {
  event: string;
  data: string;
}

/**
 * Incremental text/event-stream parser. Feed it decoded chunks; it returns
 * every frame completed by a blank line.
 */
export class SseParser {
  private buffer = '';

  feed(chunk: string): SseFrame[] {
    this.buffer += chunk.replace(/\r\n/g, '\n');
    const frames: SseFrame[] = [];
    let boundary = this.buffer.indexOf('\n\n');
    while (boundary !== -1) {
      const block = this.buffer.slice(0, boundary);
      this.buffer = this.buffer.slice(boundary + 2);
      const frame = parseBlock(block);
      if (frame) frames.push(frame);
      boundary = this.buffer.indexOf('\n\n');
    }
    return frames;
  }
}

function parseBlock(block: string): SseFrame | null {
  let event = 'message';
  const data: string[] = [];
  for (const line of block.split('\n')) {
    if (!line || line.startsWith(':')) continue;
    const sep = line.indexOf(':');
    const field = sep === -1 ? line : line.slice(0, sep);
    const value = sep === -1 ? '' : line.slice(sep + 1).replace(/^ /, '');
    if (field === 'event') event = value;
    else if (field === 'data') data.push(value);
  }
  if (!data.length) return null;
  return { event, data: data.join('\n') };
}

export function parseNotificationEvent(frame: SseFrame): NotificationEvent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(frame.data);
  } catch {
    return null;
  }
  const parsed = EventSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Hold the live event stream open until `signal` aborts or the server ends it.
 * Delivery is at-most-once: after a reconnect, callers re-fetch the inbox.
 */
export async function streamNotifications(
  client: ApiClient,
  opts: { signal: AbortSignal; onEvent: (event: NotificationEvent) => void; fetchImpl?: typeof fetch }
): Promise<void> {
  const doFetch = opts.fetchImpl ?? fetch;
  let res: Response;
  try {
    res = await doFetch(client.url('/notifications/stream'), {
      headers: { Accept: 'text/event-stream', ...(await client.authHeaders()) },
      signal: opts.signal,
    });
  } catch (error) {
    if (opts.signal.aborted) return;
    throw new NetworkError(`Notification stream failed: ${errorMessage(error)}`);
  }
  if (!res.ok || !res.body) {
    throw new NetworkError(`Notification stream failed: HTTP ${res.status}`);
  }

  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  const parser = new SseParser();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      for (const frame of parser.feed(decoder.decode(value, { stream: true }))) {
        const event = parseNotificationEvent(frame);
        if (event) opts.onEvent(event);
      }
    }
  } catch (error) {
    if (opts.signal.aborted) return;
    throw new NetworkError(`Notification stream interrupted: ${errorMessage(error)}`);
  } finally {
    reader.releaseLock();
  }
}
