import { createRoutes, dispatch, matchRoute, MethodNotAllowedError, type Route } from '../../course-api/src/routes';
import { errorResponse } from '../../course-api/src/http';
import { NotFoundError, PreconditionError, ValidationError } from '../../src/lib/errors';
import type { GenerationJob } from '../../src/lib/types/generation';
import { courseInput, createTestPipeline, ctx, type TestPipeline } from '../helpers/pipeline';

describe('course API routes', () => {
  let p: TestPipeline;
  let routes: Route[];

  beforeEach(() => {
    p = createTestPipeline();
    routes = createRoutes(p);
  });

  function call(method: string, path: string, body: unknown = {}) {
    const url = new URL(path, 'http://api.test');
    return dispatch(routes, { method, pathname: url.pathname, query: url.searchParams, ctx, body });
  }

  it('matches path parameters and decodes them', () => {
    const { route, params } = matchRoute(routes, 'POST', '/courses/course%201/outlines/o-1/approve');
    expect(route.path).toBe('/courses/:courseId/outlines/:outlineId/approve');
    expect(params).toEqual({ courseId: 'course 1', outlineId: 'o-1' });
  });

  it('separates unknown paths from wrong methods', () => {
    expect(() => matchRoute(routes, 'GET', '/nope')).toThrow(new NotFoundError('Unknown route: GET /nope'));
    expect(() => matchRoute(routes, 'PUT', '/jobs')).toThrow(MethodNotAllowedError);
    expect(errorResponse(new MethodNotAllowedError('PUT', '/jobs')).status).toBe(405);
  });

  it('starts outline generation with the course id from the path', async () => {
    const { courseId, ...rest } = courseInput;
    const result = await call('POST', `/courses/${courseId}/outline/generate`, rest);
    expect(result.status).toBe(202);

    const jobs = await p.orchestrator.list({ tenantId: 'tenant-1' });
    expect(jobs).toHaveLength(1);
    expect(jobs[0].type).toBe('course_outline');
    expect(jobs[0].courseId).toBe('course-1');
  });

  it('refuses to create full_course jobs directly', async () => {
    await expect(
      call('POST', '/jobs', { type: 'full_course', payload: { courseId: 'course-1', outlineId: 'outline-1' } })
    ).rejects.toThrow(new PreconditionError('full_course jobs are created by approving an outline'));
  });

  it('validates list filters', async () => {
    await p.orchestrator.submit('sme_ingestion', ctx, { smeId: 'sme-3', documents: [{ title: 'T', text: 'x' }] });

    const result = await call('GET', '/jobs?type=sme_ingestion&limit=5');
    expect(result.status).toBe(200);
    expect(result.data).toMatchObject({ jobs: [{ type: 'sme_ingestion' }] });

    await expect(call('GET', '/jobs?topLevelOnly=yes')).rejects.toBeInstanceOf(ValidationError);
  });

  it('cancels through the job route and returns the job', async () => {
    const job = await p.orchestrator.submit('component_regen', ctx, {
      lessonId: 'lesson-1',
      componentId: 'cmp-1',
      modificationPrompt: 'Shorter',
    });
    const result = await call('POST', `/jobs/${job.id}/cancel`);
    const cancelled: Partial<GenerationJob> = { id: job.id, status: 'cancelled' };
    expect(result.data).toMatchObject(cancelled);
  });

  it('wraps notification counts and deletes', async () => {
    const { notification } = await p.notifications.create({
      tenantId: 'tenant-1',
      userId: 'user-1',
      type: 'outline_ready',
      title: 'Course Outline Complete',
      message: 'Ready',
    });
    expect((await call('GET', '/notifications/unread-count')).data).toEqual({ count: 1 });
    expect((await call('POST', '/notifications/read', { ids: [notification.id] })).data).toEqual({ count: 1 });
    expect((await call('DELETE', `/notifications/${notification.id}`)).data).toEqual({});
  });
});
