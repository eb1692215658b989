import type { RealtimeChannel, SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { NotificationEvent } from '../../lib/types/generation';
import { NotificationSchema } from '../../lib/schemas/api';
import { createLogger, type Logger } from '../../lib/logger';
import type { NotificationHub } from './hub';

export const RELAY_CHANNEL = 'notification-events';
const RELAY_EVENT = 'notification';

const RelayMessageSchema = z.object({
  origin: z.string(),
  userId: z.string(),
  event: z.object({
    eventType: z.enum(['NOTIFICATION_CREATED', 'NOTIFICATION_READ', 'NOTIFICATION_DELETED', 'KEEPALIVE']),
    notification: NotificationSchema.optional(),
    notificationIds: z.array(z.string()).optional(),
  }),
});

/**
 * Bridges hub publishes across processes over a Supabase Realtime broadcast
 * channel. Delivery stays best-effort: send failures are logged only.
 */
export class SupabaseRealtimeRelay {
  private readonly origin = uuidv4();
  private readonly log: Logger;
  private channel: RealtimeChannel | null = null;
  private detach: (() => void) | null = null;

  constructor(
    private readonly db: SupabaseClient,
    private readonly hub: NotificationHub,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger('realtime-relay');
  }

  start(): void {
    if (this.channel) return;
    const channel = this.db.channel(RELAY_CHANNEL, { config: { broadcast: { self: false } } });
    channel
      .on('broadcast', { event: RELAY_EVENT }, (message) => this.receive(message.payload))
      .subscribe((status) => {
        this.log.info('relay channel status', { status });
      });
    this.channel = channel;
    this.detach = this.hub.onPublish((userId, event) => this.send(userId, event));
  }

  async stop(): Promise<void> {
    this.detach?.();
    this.detach = null;
    const channel = this.channel;
    this.channel = null;
    if (channel) await this.db.removeChannel(channel);
  }

  private send(userId: string, event: NotificationEvent): void {
    const channel = this.channel;
    if (!channel || event.eventType === 'KEEPALIVE') return;
    channel
      .send({ type: 'broadcast', event: RELAY_EVENT, payload: { origin: this.origin, userId, event } })
      .then((result) => {
        if (result !== 'ok') this.log.warn('relay broadcast not acknowledged', { userId, result });
      })
      .catch((error: unknown) => {
        this.log.warn('relay broadcast failed', { userId, error: String(error) });
      });
  }

  private receive(payload: unknown): void {
    const parsed = RelayMessageSchema.safeParse(payload);
    if (!parsed.success) {
      this.log.warn('ignoring malformed relay message', { issues: parsed.error.issues.length });
      return;
    }
    if (parsed.data.origin === this.origin) return;
    this.hub.deliverLocal(parsed.data.userId, parsed.data.event);
  }
}
