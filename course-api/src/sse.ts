import type { NotificationEvent } from "../../src/lib/types/generation";
import type { UserEventSubscription } from "../../src/server/notifications/hub";

export const DEFAULT_HEARTBEAT_MS = 15_000;

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache, no-transform",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
} as const;

export function formatSseEvent(event: NotificationEvent): string {
  const data = event.eventType === "KEEPALIVE" ? { eventType: "KEEPALIVE" } : event;
  return `event: ${event.eventType}\ndata: ${JSON.stringify(data)}\n\n`;
}

export interface PumpOptions {
  subscription: UserEventSubscription;
  write: (frame: string) => void;
  signal: AbortSignal;
  heartbeatMs?: number;
}

export type PumpEnd = "closed" | "aborted";

type Wake =
  | { kind: "event"; result: IteratorResult<NotificationEvent> }
  | { kind: "tick" }
  | { kind: "abort" };

/**
 * Forward a user's events to an SSE sink until the stream ends or the client
 * goes away, with a KEEPALIVE frame on every heartbeat interval.
 * The subscription is cancelled on every exit path.
 */
export async function pumpUserEvents(opts: PumpOptions): Promise<PumpEnd> {
  const heartbeatMs = opts.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
  const { subscription, write, signal } = opts;

  let wakeOnAbort: (wake: Wake) => void = () => undefined;
  const aborted = new Promise<Wake>((resolve) => {
    wakeOnAbort = resolve;
  });
  const onAbort = () => wakeOnAbort({ kind: "abort" });
  if (signal.aborted) onAbort();
  else signal.addEventListener("abort", onAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  let pendingEvent: Promise<Wake> | null = null;
  let pendingTick: Promise<Wake> | null = null;

  try {
    for (;;) {
      pendingEvent ??= subscription.stream.next().then((result): Wake => ({ kind: "event", result }));
      pendingTick ??= new Promise<Wake>((resolve) => {
        timer = setTimeout(() => resolve({ kind: "tick" }), heartbeatMs);
      });

      const wake = await Promise.race([aborted, pendingEvent, pendingTick]);
      if (wake.kind === "abort") return "aborted";
      if (wake.kind === "tick") {
        pendingTick = null;
        write(formatSseEvent({ eventType: "KEEPALIVE" }));
        continue;
      }
      pendingEvent = null;
      if (wake.result.done) return "closed";
      write(formatSseEvent(wake.result.value));
    }
  } finally {
    clearTimeout(timer);
    signal.removeEventListener("abort", onAbort);
    subscription.cancel();
  }
}
