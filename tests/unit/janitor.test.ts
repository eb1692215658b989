import { StaleJobJanitor } from '../../queue-pump/src/janitor';
import { createTestPipeline, ctx, quietLogger, type TestPipeline } from '../helpers/pipeline';

const outlinePayload = {
  courseId: 'course-1',
  knowledgeSourceIds: ['sme-1'],
  targetAudienceIds: ['aud-1'],
  desiredOutcome: 'Reduce churn',
};

describe('StaleJobJanitor', () => {
  let p: TestPipeline;
  let janitor: StaleJobJanitor;

  beforeEach(() => {
    p = createTestPipeline();
    janitor = new StaleJobJanitor({ orchestrator: p.orchestrator, now: p.clock.now, logger: quietLogger });
  });

  it('fails processing jobs with no checkpoint for 30 minutes without retrying them', async () => {
    const job = await p.orchestrator.submit('course_outline', ctx, outlinePayload);
    await p.orchestrator.claimNext();

    p.clock.advanceMs(29 * 60_000);
    expect(await janitor.sweep()).toEqual([]);

    p.clock.advanceMs(2 * 60_000);
    expect(await janitor.sweep()).toEqual([job.id]);

    const failed = await p.orchestrator.get(job.id);
    expect(failed.status).toBe('failed');
    expect(failed.retryCount).toBe(0);
    expect(failed.errorMessage).toBe('Job stalled: no checkpoint for 31 minutes');
  });

  it('counts from the last heartbeat', async () => {
    const job = await p.orchestrator.submit('course_outline', ctx, outlinePayload);
    await p.orchestrator.claimNext();
    p.clock.advanceMs(20 * 60_000);
    await p.orchestrator.heartbeat(job.id);

    p.clock.advanceMs(20 * 60_000);
    expect(await janitor.sweep()).toEqual([]);
  });

  it('leaves a waiting full_course parent alone while children are active', async () => {
    const parent = await p.orchestrator.submit('full_course', ctx, { courseId: 'course-1', outlineId: 'outline-1' });
    await p.orchestrator.claimNext();
    await p.orchestrator.recordFanOut(parent.id, ['ol-1']);
    await p.orchestrator.submit(
      'lesson_content',
      ctx,
      { courseId: 'course-1', outlineId: 'outline-1', outlineLessonId: 'ol-1' },
      { parentJobId: parent.id }
    );

    p.clock.advanceMs(45 * 60_000);
    expect(await janitor.sweep()).toEqual([]);
    expect((await p.orchestrator.get(parent.id)).status).toBe('processing');
  });

  it('completes a stale full_course parent whose children all finished', async () => {
    const parent = await p.orchestrator.submit('full_course', ctx, { courseId: 'course-1', outlineId: 'outline-1' });
    await p.orchestrator.claimNext();
    await p.orchestrator.recordFanOut(parent.id, ['ol-1']);
    const child = await p.orchestrator.submit(
      'lesson_content',
      ctx,
      { courseId: 'course-1', outlineId: 'outline-1', outlineLessonId: 'ol-1' },
      { parentJobId: parent.id }
    );
    // The child finished but the worker died before folding it into the parent.
    await p.stores.jobs.update(child.id, { statuses: ['queued'] }, { status: 'completed', progressPercent: 100 });

    p.clock.advanceMs(31 * 60_000);
    expect(await janitor.sweep()).toEqual([]);

    const finished = await p.orchestrator.get(parent.id);
    expect(finished.status).toBe('completed');
    expect(finished.progressMessage).toBe('All lessons generated successfully');
    expect(finished.errorMessage).toBeNull();
  });

  it('still fails a stale full_course parent that never fanned out', async () => {
    const parent = await p.orchestrator.submit('full_course', ctx, { courseId: 'course-1', outlineId: 'outline-1' });
    await p.orchestrator.claimNext();

    p.clock.advanceMs(31 * 60_000);
    expect(await janitor.sweep()).toEqual([parent.id]);
    expect((await p.orchestrator.get(parent.id)).errorMessage).toBe('Job stalled: no checkpoint for 31 minutes');
  });
});
