import { z } from "zod";
import { AppError, NotFoundError, PreconditionError, ValidationError } from "../../src/lib/errors";
import { CourseGenerationInputSchema } from "../../src/lib/schemas/generation";
import {
  GENERATION_JOB_STATUSES,
  GENERATION_JOB_TYPES,
  type RequestContext,
} from "../../src/lib/types/generation";
import type { Services } from "../../src/server/runtime";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface RouteRequest {
  ctx: RequestContext;
  params: Record<string, string>;
  query: URLSearchParams;
  body: unknown;
}

export interface Route {
  method: HttpMethod;
  path: string;
  /** 202 for routes that enqueue work. */
  status?: number;
  handler: (req: RouteRequest) => Promise<unknown>;
}

export interface RouteMatch {
  route: Route;
  params: Record<string, string>;
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new ValidationError("Invalid input", parsed.error.flatten());
  return parsed.data;
}

function queryObject(query: URLSearchParams): Record<string, string> {
  return Object.fromEntries(query.entries());
}

const boolParam = z.enum(["true", "false"]).transform((v) => v === "true");

const SubmitJobBody = z.object({
  type: z.enum(GENERATION_JOB_TYPES),
  payload: z.record(z.unknown()).default({}),
});

const ListJobsQuery = z.object({
  type: z.enum(GENERATION_JOB_TYPES).optional(),
  status: z.enum(GENERATION_JOB_STATUSES).optional(),
  courseId: z.string().min(1).optional(),
  topLevelOnly: boolParam.optional(),
  limit: z.coerce.number().int().positive().optional(),
});

const OutlineQuery = z.object({ version: z.coerce.number().int().positive().optional() });
const RejectBody = z.object({ reason: z.string().default("") });
const RevisionBody = z.object({ notes: z.string().optional() });
const UpdateBody = z.object({ sections: z.unknown() });
const RegenerateBody = z.object({ prompt: z.string().default("") });
const IngestBody = z.object({ documents: z.unknown() });

const NotificationsQuery = z.object({
  cursor: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
  unreadOnly: boolParam.optional(),
});
const MarkReadBody = z.object({ ids: z.array(z.string().min(1)).max(500) });

/**
 * The JSON surface of the gateway. The SSE stream is served separately in index.ts.
 */
export function createRoutes(services: Services): Route[] {
  const { generation, orchestrator, notifications } = services;

  return [
    {
      method: "POST",
      path: "/jobs",
      status: 202,
      handler: ({ ctx, body }) => {
        const { type, payload } = parse(SubmitJobBody, body);
        if (type === "full_course") {
          throw new PreconditionError("full_course jobs are created by approving an outline");
        }
        return orchestrator.submit(type, ctx, payload);
      },
    },
    {
      method: "GET",
      path: "/jobs",
      handler: async ({ ctx, query }) => {
        const q = parse(ListJobsQuery, queryObject(query));
        return { jobs: await orchestrator.list({ ...q, tenantId: ctx.tenantId }) };
      },
    },
    {
      method: "GET",
      path: "/jobs/:id",
      handler: ({ ctx, params }) => orchestrator.get(params.id, ctx.tenantId),
    },
    {
      method: "POST",
      path: "/jobs/:id/cancel",
      handler: async ({ ctx, params }) => (await orchestrator.cancel(params.id, ctx.tenantId)).job,
    },
    {
      method: "POST",
      path: "/courses/:courseId/outline/generate",
      status: 202,
      handler: ({ ctx, params, body }) => {
        const input = parse(CourseGenerationInputSchema, { ...parse(z.record(z.unknown()), body), courseId: params.courseId });
        return generation.generateOutline(ctx, input);
      },
    },
    {
      method: "GET",
      path: "/courses/:courseId/outline",
      handler: ({ ctx, params, query }) =>
        generation.getOutline(ctx, params.courseId, parse(OutlineQuery, queryObject(query)).version),
    },
    {
      method: "GET",
      path: "/courses/:courseId/outlines",
      handler: async ({ ctx, params }) => ({ outlines: await generation.listOutlines(ctx, params.courseId) }),
    },
    {
      method: "POST",
      path: "/courses/:courseId/outlines/:outlineId/approve",
      status: 202,
      handler: ({ ctx, params }) => generation.approveOutline(ctx, params.courseId, params.outlineId),
    },
    {
      method: "POST",
      path: "/courses/:courseId/outlines/:outlineId/reject",
      status: 202,
      handler: ({ ctx, params, body }) =>
        generation.rejectOutline(ctx, params.courseId, params.outlineId, parse(RejectBody, body).reason),
    },
    {
      method: "POST",
      path: "/courses/:courseId/outlines/:outlineId/revision",
      handler: ({ ctx, params, body }) =>
        generation.requestRevision(ctx, params.courseId, params.outlineId, parse(RevisionBody, body).notes),
    },
    {
      method: "POST",
      path: "/courses/:courseId/outlines/:outlineId/submit",
      handler: ({ ctx, params }) => generation.submitForReview(ctx, params.courseId, params.outlineId),
    },
    {
      method: "PUT",
      path: "/courses/:courseId/outlines/:outlineId",
      handler: ({ ctx, params, body }) =>
        generation.updateOutline(ctx, params.courseId, params.outlineId, parse(UpdateBody, body).sections),
    },
    {
      method: "POST",
      path: "/courses/:courseId/lessons/generate",
      status: 202,
      handler: ({ ctx, params }) => generation.generateAllLessons(ctx, params.courseId),
    },
    {
      method: "GET",
      path: "/courses/:courseId/lessons",
      handler: async ({ ctx, params }) => ({ lessons: await generation.listGeneratedLessons(ctx, params.courseId) }),
    },
    {
      method: "POST",
      path: "/lessons/:lessonId/components/:componentId/regenerate",
      status: 202,
      handler: ({ ctx, params, body }) =>
        generation.regenerateComponent(ctx, params.lessonId, params.componentId, parse(RegenerateBody, body).prompt),
    },
    {
      method: "POST",
      path: "/smes/:smeId/ingest",
      status: 202,
      handler: ({ ctx, params, body }) => generation.ingestSme(ctx, params.smeId, parse(IngestBody, body).documents),
    },
    {
      method: "GET",
      path: "/notifications",
      handler: ({ ctx, query }) => notifications.list(ctx.userId, parse(NotificationsQuery, queryObject(query))),
    },
    {
      method: "GET",
      path: "/notifications/unread-count",
      handler: async ({ ctx }) => ({ count: await notifications.unreadCount(ctx.userId) }),
    },
    {
      method: "POST",
      path: "/notifications/read",
      handler: async ({ ctx, body }) => ({ count: await notifications.markAsRead(ctx.userId, parse(MarkReadBody, body).ids) }),
    },
    {
      method: "POST",
      path: "/notifications/read-all",
      handler: async ({ ctx }) => ({ count: await notifications.markAllAsRead(ctx.userId) }),
    },
    {
      method: "DELETE",
      path: "/notifications/:id",
      handler: async ({ ctx, params }) => {
        await notifications.delete(ctx.userId, params.id);
        return {};
      },
    },
  ];
}

function matchPath(pattern: string, pathname: string): Record<string, string> | null {
  const want = pattern.split("/").filter(Boolean);
  const got = pathname.split("/").filter(Boolean);
  if (want.length !== got.length) return null;
  const params: Record<string, string> = {};
  for (let i = 0; i < want.length; i++) {
    const segment = want[i];
    const actual = got[i];
    if (segment.startsWith(":")) {
      try {
        params[segment.slice(1)] = decodeURIComponent(actual);
      } catch {
        return null;
      }
    } else if (segment !== actual) {
      return null;
    }
  }
  return params;
}

export class MethodNotAllowedError extends AppError {
  constructor(method: string, pathname: string) {
    super(`Method ${method} not allowed on ${pathname}`, "invalid_request", 405);
    this.name = "MethodNotAllowedError";
  }
}

/**
 * First match in table order wins.
 * @throws NotFoundError when no route matches the path
 * @throws MethodNotAllowedError when the path exists under another method
 */
export function matchRoute(routes: readonly Route[], method: string, pathname: string): RouteMatch {
  let pathExists = false;
  for (const route of routes) {
    const params = matchPath(route.path, pathname);
    if (!params) continue;
    pathExists = true;
    if (route.method === method) return { route, params };
  }
  if (pathExists) throw new MethodNotAllowedError(method, pathname);
  throw new NotFoundError(`Unknown route: ${method} ${pathname}`);
}

export interface DispatchResult {
  status: number;
  data: unknown;
}

export async function dispatch(
  routes: readonly Route[],
  input: { method: string; pathname: string; ctx: RequestContext; query: URLSearchParams; body: unknown }
): Promise<DispatchResult> {
  const { route, params } = matchRoute(routes, input.method, input.pathname);
  const data = await route.handler({ ctx: input.ctx, params, query: input.query, body: input.body });
  return { status: route.status ?? 200, data };
}
