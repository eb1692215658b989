import type { z } from 'zod';
import { AppError, NetworkError, errorMessage, fromErrorBody } from '../errors';
import { ApiEnvelopeSchema } from '../schemas/api';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ApiClientOptions {
  baseUrl: string;
  /** Bearer token source; called per request so refreshed sessions are picked up. */
  getAccessToken?: () => string | null | Promise<string | null>;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export type QueryValue = string | number | boolean | undefined | null;

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: unknown;
  timeoutMs?: number;
}

/**
 * Fetch with a hard timeout. A timeout or transport failure becomes NetworkError.
 */
export async function fetchWithTimeout(
  fetchImpl: FetchLike,
  url: string,
  options: RequestInit = {},
  timeoutMs: number = 30000
): Promise<Response> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  const timeoutPromise = new Promise<Response>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new NetworkError('Request timeout', { url, timeoutMs }));
    }, timeoutMs);
  });

  try {
    const fetchPromise = fetchImpl(url, { ...options, signal: controller.signal });
    return await Promise.race([fetchPromise, timeoutPromise]);
  } catch (error) {
    if (error instanceof AppError) throw error;
    if (error instanceof Error && error.name === 'AbortError') {
      throw new NetworkError('Request timeout', { url, timeoutMs });
    }
    throw new NetworkError(`Network request failed: ${errorMessage(error)}`, { url });
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

export function buildQuery(query?: Record<string, QueryValue>): string {
  if (!query) return '';
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null || value === '') continue;
    params.set(key, String(value));
  }
  const qs = params.toString();
  return qs ? `?${qs}` : '';
}

/**
 * Thin JSON client for the course API.
 *
 * Success bodies are `{ ok: true, data }`; failures are `{ ok: false, error: { code, message } }`
 * and are rethrown as the matching AppError subclass.
 */
export class ApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(private readonly options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, opts: RequestOptions = {}): Promise<T> {
    return this.request('GET', path, schema, opts);
  }

  post<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, opts: RequestOptions = {}): Promise<T> {
    return this.request('POST', path, schema, opts);
  }

  put<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, opts: RequestOptions = {}): Promise<T> {
    return this.request('PUT', path, schema, opts);
  }

  delete<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, opts: RequestOptions = {}): Promise<T> {
    return this.request('DELETE', path, schema, opts);
  }

  async authHeaders(): Promise<Record<string, string>> {
    const token = this.options.getAccessToken ? await this.options.getAccessToken() : null;
    return token ? { Authorization: `Bearer ${token}` } : {};
  }

  url(path: string, query?: Record<string, QueryValue>): string {
    return `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}${buildQuery(query)}`;
  }

  async request<T>(
    method: 'GET' | 'POST' | 'PUT' | 'DELETE',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    opts: RequestOptions = {}
  ): Promise<T> {
    const url = this.url(path, opts.query);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...(await this.authHeaders()),
    };
    const init: RequestInit = { method, headers };
    if (opts.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(opts.body);
    }

    const res = await fetchWithTimeout(this.fetchImpl, url, init, opts.timeoutMs ?? this.timeoutMs);

    let raw: unknown;
    try {
      raw = await res.json();
    } catch (error) {
      if (!res.ok) throw new AppError(`HTTP ${res.status}`, 'internal_error', res.status);
      throw new NetworkError(`Invalid JSON from ${path}: ${errorMessage(error)}`);
    }

    const envelope = ApiEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new AppError(`Unexpected response shape from ${path}`, 'internal_error', res.status, raw);
    }
    if (!envelope.data.ok) {
      const { code, message, details } = envelope.data.error;
      throw fromErrorBody(code, message, details);
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      throw new AppError(`Unexpected payload from ${path}`, 'internal_error', res.status, parsed.error.flatten());
    }
    return parsed.data;
  }
}
