/**
 * Generation controller driven by the in-memory strategies and fake timers.
 */

import { NetworkError, PreconditionError } from '../../src/lib/errors';
import { generatedLessonsToCourseContent } from '../../src/lib/pipeline/contentTransform';
import { createGenerationStore, displayProgress, type GenerationStore } from '../../src/store/generationStore';
import { createFakeStrategies, makeJob, type FakeStrategies } from '../../src/store/fakes';
import { quietLogger } from '../helpers/pipeline';

const input = {
  courseId: 'course-1',
  knowledgeSourceIds: ['sme-1', 'sme-2'],
  targetAudienceIds: ['aud-1'],
  desiredOutcome: 'Reduce churn',
};

const FULL_JOB = 'full-course-job-outline-1';

describe('generation controller', () => {
  let s: FakeStrategies;
  let store: GenerationStore;
  let transform: jest.MockedFunction<typeof generatedLessonsToCourseContent>;

  beforeEach(() => {
    jest.useFakeTimers();
    s = createFakeStrategies();
    transform = jest.fn(generatedLessonsToCourseContent);
    store = createGenerationStore({ ...s, transform, logger: quietLogger });
  });

  afterEach(() => {
    store.getState().dispose();
    jest.useRealTimers();
  });

  const state = () => store.getState();

  async function reachReview(): Promise<void> {
    await state().submitConfiguration(input);
    s.jobs.advance('outline-job-1', { status: 'completed', progressPercent: 100 });
    await jest.advanceTimersByTimeAsync(3000);
    expect(state().phase.step).toBe('reviewOutline');
  }

  async function reachLessons(): Promise<void> {
    await reachReview();
    await state().approveOutline();
    state().watch();
    expect(state().phase.step).toBe('generatingLessons');
  }

  it('walks from configuration to completed content', async () => {
    await state().submitConfiguration(input);
    expect(state().phase).toMatchObject({ step: 'generatingOutline', job: { id: 'outline-job-1' } });
    expect(state().progress).toEqual({ percent: 20, message: 'Queued' });
    expect(s.outlines.started).toEqual([input]);

    s.jobs.advance('outline-job-1', {
      status: 'processing',
      progressPercent: 40,
      progressMessage: 'Generating course outline with AI...',
    });
    await jest.advanceTimersByTimeAsync(2999);
    expect(s.jobs.polled).toEqual([]);
    await jest.advanceTimersByTimeAsync(1);
    expect(s.jobs.polled).toEqual(['outline-job-1']);
    expect(state().progress).toEqual({ percent: 42, message: 'Generating course outline with AI...' });

    s.jobs.advance('outline-job-1', { status: 'completed', progressPercent: 100 });
    await jest.advanceTimersByTimeAsync(3000);
    expect(state().phase).toMatchObject({ step: 'reviewOutline', outline: { id: 'outline-1' } });
    expect(state().progress).toEqual({ percent: 100, message: 'Outline ready for review' });

    await state().approveOutline();
    expect(state().phase).toMatchObject({ step: 'jobQueued', job: { id: FULL_JOB }, outline: { approvalStatus: 'approved' } });
    expect(state().progress).toEqual({ percent: 10, message: 'Queued' });

    state().watch();
    await jest.advanceTimersByTimeAsync(7000);
    expect(s.jobs.polled.filter((id) => id === FULL_JOB)).toHaveLength(1);
    expect(state().phase.step).toBe('generatingLessons');

    s.jobs.advance(FULL_JOB, { status: 'completed', progressPercent: 100 });
    await jest.advanceTimersByTimeAsync(7000);

    const { phase } = state();
    if (phase.step !== 'complete') throw new Error(`expected complete, got ${phase.step}`);
    expect(phase.lessons.map((l) => l.id)).toEqual(['lesson-1']);
    expect(phase.content.sections.map((sec) => sec.name)).toEqual(['Basics']);
    expect(phase.content.courseBlocks.map((b) => b.content)).toEqual(['First Steps']);
    expect(state().progress).toEqual({ percent: 100, message: 'Course content ready' });
    expect(transform).toHaveBeenCalledTimes(1);
    expect(jest.getTimerCount()).toBe(0);
  });

  it('reports invalid configuration without starting a job', async () => {
    await state().submitConfiguration({ ...input, knowledgeSourceIds: [] });
    expect(state().error).toEqual({
      kind: 'validation',
      message: 'At least one knowledge source is required',
      stage: 'outline',
    });
    expect(s.outlines.started).toEqual([]);
  });

  it('keeps polling through network errors and clears them on recovery', async () => {
    await state().submitConfiguration(input);
    s.jobs.failNextPoll(new NetworkError('offline'));

    await jest.advanceTimersByTimeAsync(3000);
    expect(state().error).toEqual({ kind: 'network', message: 'offline', stage: 'outline' });
    expect(state().phase.step).toBe('generatingOutline');

    await jest.advanceTimersByTimeAsync(3000);
    expect(s.jobs.polled).toEqual(['outline-job-1', 'outline-job-1']);
    expect(state().error).toBeNull();
  });

  it('returns to configuration on a failed outline job and retries with the same input', async () => {
    await state().submitConfiguration(input);
    s.jobs.advance('outline-job-1', { status: 'failed', errorMessage: 'Knowledge source not found: sme-2' });
    await jest.advanceTimersByTimeAsync(3000);

    expect(state().phase.step).toBe('configure');
    expect(state().error).toEqual({ kind: 'job', message: 'Knowledge source not found: sme-2', stage: 'outline' });
    expect(state().progress).toEqual({ percent: 0, message: '' });

    await state().retry();
    expect(state().phase).toMatchObject({ step: 'generatingOutline', job: { id: 'outline-job-2' } });
    expect(s.outlines.started).toEqual([input, input]);
    expect(state().error).toBeNull();
  });

  it('cancels the outline job and stops polling', async () => {
    await state().submitConfiguration(input);
    await state().cancel();

    expect(s.jobs.cancelRequests).toEqual(['outline-job-1']);
    expect(state().phase.step).toBe('configure');
    expect(state().error).toBeNull();

    await jest.advanceTimersByTimeAsync(10_000);
    expect(s.jobs.polled).toEqual([]);
  });

  it('takes the finished result when a cancel loses the race', async () => {
    await state().submitConfiguration(input);
    s.jobs.advance('outline-job-1', { status: 'completed', progressPercent: 100 });

    await state().cancel();

    expect(s.jobs.polled).toEqual(['outline-job-1']);
    expect(state().phase.step).toBe('reviewOutline');
    expect(state().busy).toBe(false);
  });

  it('keeps polling when the cancel request itself fails', async () => {
    await state().submitConfiguration(input);
    s.jobs.cancelError = new NetworkError('offline');

    await state().cancel();
    expect(state().error).toEqual({ kind: 'network', message: 'offline', stage: 'outline' });

    await jest.advanceTimersByTimeAsync(3000);
    expect(s.jobs.polled).toEqual(['outline-job-1']);
  });

  it('requires a reason to reject and regenerates with it', async () => {
    await reachReview();

    await state().rejectOutline('  ');
    expect(state().error).toEqual({ kind: 'validation', message: 'Rejection reason is required', stage: 'outline' });
    expect(s.outlines.rejected).toEqual([]);

    await state().rejectOutline('Too shallow');
    expect(s.outlines.rejected).toEqual(['Too shallow']);
    expect(state().phase).toMatchObject({ step: 'generatingOutline', job: { id: 'outline-job-2' } });
  });

  it('surfaces a conflicting approval and stays on the review', async () => {
    await reachReview();
    s.outlines.failNext(new PreconditionError('Outline outline-1 is approved and cannot be approved'));

    await state().approveOutline();
    expect(state().phase.step).toBe('reviewOutline');
    expect(state().error).toEqual({
      kind: 'conflict',
      message: 'Outline outline-1 is approved and cannot be approved',
      stage: 'lessons',
    });
  });

  it('goes back to the approved outline when lesson generation fails, then retries lessons only', async () => {
    await reachLessons();
    s.jobs.advance(FULL_JOB, { status: 'failed', errorMessage: '1 lesson(s) failed to generate: c-2' });
    await jest.advanceTimersByTimeAsync(7000);

    expect(state().phase).toMatchObject({ step: 'reviewOutline', outline: { approvalStatus: 'approved' } });
    expect(state().error).toEqual({ kind: 'job', message: '1 lesson(s) failed to generate: c-2', stage: 'lessons' });

    await state().retry();
    expect(s.lessons.started).toEqual(['course-1']);
    expect(state().phase).toMatchObject({ step: 'generatingLessons', job: { id: 'lessons-job-1' } });
  });

  it('restarts lessons on the approved outline after cancelling them', async () => {
    await reachLessons();
    await state().cancel();

    expect(s.jobs.cancelRequests).toEqual([FULL_JOB]);
    expect(state().phase).toMatchObject({ step: 'reviewOutline', outline: { approvalStatus: 'approved' } });
    expect(state().error).toBeNull();

    await state().generateLessons();
    expect(s.lessons.started).toEqual(['course-1']);
    expect(state().phase).toMatchObject({ step: 'generatingLessons', job: { id: 'lessons-job-1' } });
    expect(state().error).toBeNull();
  });

  it('treats approving an already approved outline as a lesson restart', async () => {
    await reachLessons();
    await state().cancel();

    await state().approveOutline();
    expect(state().error).toBeNull();
    expect(s.lessons.started).toEqual(['course-1']);
    expect(state().phase).toMatchObject({ step: 'generatingLessons', job: { id: 'lessons-job-1' } });
  });

  it('ignores generateLessons while the outline is still pending review', async () => {
    await reachReview();
    await state().generateLessons();
    expect(s.lessons.started).toEqual([]);
    expect(state().phase.step).toBe('reviewOutline');
  });

  it('detaches into background generation without further polling', async () => {
    await reachReview();
    await state().approveOutline();
    state().navigateAway();

    expect(state().phase).toEqual({ step: 'backgroundGeneration', jobId: FULL_JOB, courseId: 'course-1' });
    await jest.advanceTimersByTimeAsync(20_000);
    expect(s.jobs.polled).toEqual(['outline-job-1']);
  });

  it('drops a poll result that arrives after reset', async () => {
    await state().submitConfiguration(input);
    let release: () => void = () => undefined;
    const original = s.jobs.getJob.bind(s.jobs);
    jest.spyOn(s.jobs, 'getJob').mockImplementation(async (id) => {
      await new Promise<void>((resolve) => {
        release = resolve;
      });
      return original(id);
    });
    s.jobs.advance('outline-job-1', { status: 'completed', progressPercent: 100 });

    await jest.advanceTimersByTimeAsync(3000);
    state().reset();
    release();
    await jest.advanceTimersByTimeAsync(0);

    expect(s.jobs.polled).toEqual(['outline-job-1']);
    expect(state().phase.step).toBe('configure');
    expect(state().progress).toEqual({ percent: 0, message: '' });
  });
});

describe('displayProgress', () => {
  it('compresses server progress into each stage band', () => {
    expect(displayProgress('outline', makeJob({ progressPercent: 100, progressMessage: null }))).toEqual({
      percent: 75,
      message: 'Generating course outline...',
    });
    expect(displayProgress('lessons', makeJob({ progressPercent: 60 }))).toEqual({ percent: 55, message: 'Queued' });
  });
});
