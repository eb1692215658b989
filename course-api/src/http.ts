import type { IncomingMessage, ServerResponse } from "node:http";
import { AppError, ValidationError, toAppError } from "../../src/lib/errors";

export const MAX_BODY_BYTES = 1024 * 1024;

export type ApiBody =
  | { ok: true; data: unknown }
  | { ok: false; error: { code: string; message: string; details?: unknown } };

export function send(res: ServerResponse, status: number, body: ApiBody): void {
  const json = JSON.stringify(body);
  res.writeHead(status, { "Content-Type": "application/json", "Content-Length": Buffer.byteLength(json) });
  res.end(json);
}

/** Map any thrown value to its status and error envelope. */
export function errorResponse(error: unknown): { status: number; body: ApiBody } {
  const appError = toAppError(error);
  const status = appError.status >= 400 ? appError.status : 500;
  return { status, body: { ok: false, error: appError.toJSON() } };
}

/** Empty bodies read as `{}`. */
export async function readBody(req: IncomingMessage, maxBytes: number = MAX_BODY_BYTES): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > maxBytes) throw new AppError("Request body too large", "invalid_request", 413);
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString("utf8").trim();
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Request body is not valid JSON");
  }
}

export function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  if (Array.isArray(value)) return value[0];
  return value;
}
