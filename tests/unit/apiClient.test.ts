import { ApiClient, buildQuery, type FetchLike } from '../../src/lib/api/common';
import { cancelJob, getJob, listJobs } from '../../src/lib/api/jobs';
import { SseParser, parseNotificationEvent, streamNotifications } from '../../src/lib/api/notifications';
import { NetworkError, PreconditionError } from '../../src/lib/errors';
import type { NotificationEvent } from '../../src/lib/types/generation';
import { makeJob } from '../../src/store/fakes';

interface Call {
  url: string;
  method: string | undefined;
  headers: unknown;
  body: unknown;
}

function stubFetch(status: number, body: unknown, calls: Call[] = []): FetchLike {
  return async (url, init) => {
    calls.push({ url, method: init?.method, headers: init?.headers, body: init?.body });
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
  };
}

function client(fetchImpl: FetchLike): ApiClient {
  return new ApiClient({ baseUrl: 'http://api.test/', getAccessToken: () => 'test-token', fetchImpl });
}

describe('ApiClient', () => {
  it('unwraps the success envelope and sends the bearer token', async () => {
    const calls: Call[] = [];
    const job = makeJob({ status: 'processing', progressPercent: 40 });
    const result = await getJob(client(stubFetch(200, { ok: true, data: job }, calls)), 'job 1');

    expect(result.progressPercent).toBe(40);
    expect(calls[0].url).toBe('http://api.test/jobs/job%201');
    expect(calls[0].method).toBe('GET');
    expect(calls[0].headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-token' });
  });

  it('rebuilds typed errors from the error envelope', async () => {
    const api = client(
      stubFetch(409, { ok: false, error: { code: 'conflict', message: 'Job job-1 is completed' } })
    );
    const error = await cancelJob(api, 'job-1').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PreconditionError);
    expect(error).toHaveProperty('message', 'Job job-1 is completed');
  });

  it('turns transport failures into NetworkError', async () => {
    const api = client(async () => {
      throw new TypeError('fetch failed');
    });
    await expect(getJob(api, 'job-1')).rejects.toThrow(new NetworkError('Network request failed: fetch failed'));
  });

  it('rejects payloads that do not match the schema', async () => {
    await expect(getJob(client(stubFetch(200, { ok: true, data: { id: 1 } })), 'job-1')).rejects.toThrow(
      'Unexpected payload from /jobs/job-1'
    );
  });

  it('serializes list filters into the query string', async () => {
    const calls: Call[] = [];
    await listJobs(client(stubFetch(200, { ok: true, data: { jobs: [] } }, calls)), {
      type: 'full_course',
      topLevelOnly: true,
    });
    expect(calls[0].url).toBe('http://api.test/jobs?type=full_course&topLevelOnly=true');
  });

  it('skips empty query values', () => {
    expect(buildQuery({ a: 'x', b: undefined, c: null, d: '', e: 0 })).toBe('?a=x&e=0');
    expect(buildQuery({})).toBe('');
  });
});

describe('SseParser', () => {
  it('emits frames only once their blank line arrives', () => {
    const parser = new SseParser();
    expect(parser.feed('event: KEEPALIVE\ndata: {"eventType":')).toEqual([]);
    expect(parser.feed('"KEEPALIVE"}\n\n: comment\n\nevent: x\r\ndata: a\r\ndata: b\r\n\r\n')).toEqual([
      { event: 'KEEPALIVE', data: '{"eventType":"KEEPALIVE"}' },
      { event: 'x', data: 'a\nb' },
    ]);
  });

  it('drops frames that are not notification events', () => {
    expect(parseNotificationEvent({ event: 'x', data: 'not json' })).toBeNull();
    expect(parseNotificationEvent({ event: 'x', data: '{"eventType":"OTHER"}' })).toBeNull();
    expect(parseNotificationEvent({ event: 'NOTIFICATION_READ', data: '{"eventType":"NOTIFICATION_READ","notificationIds":["n-1"]}' })).toEqual({
      eventType: 'NOTIFICATION_READ',
      notificationIds: ['n-1'],
    });
  });
});

describe('streamNotifications', () => {
  function streamOf(chunks: string[]): ReadableStream<Uint8Array> {
    const encoder = new TextEncoder();
    return new ReadableStream({
      start(controller) {
        for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
        controller.close();
      },
    });
  }

  it('delivers parsed events until the server ends the stream', async () => {
    const events: NotificationEvent[] = [];
    const api = new ApiClient({ baseUrl: 'http://api.test' });
    await streamNotifications(api, {
      signal: new AbortController().signal,
      onEvent: (event) => events.push(event),
      fetchImpl: async () =>
        new Response(streamOf(['event: KEEPALIVE\ndata: {"eventType":"KEEPALIVE"}\n', '\n']), { status: 200 }),
    });
    expect(events).toEqual([{ eventType: 'KEEPALIVE' }]);
  });

  it('reports HTTP failures as NetworkError', async () => {
    const api = new ApiClient({ baseUrl: 'http://api.test' });
    await expect(
      streamNotifications(api, {
        signal: new AbortController().signal,
        onEvent: () => undefined,
        fetchImpl: async () => new Response('nope', { status: 401 }),
      })
    ).rejects.toThrow(new NetworkError('Notification stream failed: HTTP 401'));
  });
});
