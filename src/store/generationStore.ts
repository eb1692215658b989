/**
 * Course generation wizard controller.
 *
 * configure -> generatingOutline -> reviewOutline -> jobQueued -> generatingLessons -> complete
 *
 * Approving an outline lands in `jobQueued`: the lesson job already exists and
 * the user picks `watch()` (keep polling) or `navigateAway()` (detach, the job
 * keeps running and completion arrives as a notification).
 *
 * The store owns the only poll timer. Every transition bumps an epoch; async
 * results captured under an older epoch are dropped.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { NetworkError, PreconditionError, ValidationError, errorMessage } from '../lib/errors';
import { createLogger, type Logger } from '../lib/logger';
import { generatedLessonsToCourseContent, type CourseContent } from '../lib/pipeline/contentTransform';
import { lessonsDisplayProgress, outlineDisplayProgress } from '../lib/pipeline/progress';
import { CourseGenerationInputSchema } from '../lib/schemas/generation';
import type { CourseGenerationInput, CourseOutline, GeneratedLesson, GenerationJob } from '../lib/types/generation';
import type { GenerationStrategies } from './strategies';

export const OUTLINE_POLL_MS = 3000;
export const LESSON_POLL_MS = 7000;

export type GenerationPhase =
  | { step: 'configure' }
  | { step: 'generatingOutline'; job: GenerationJob }
  | { step: 'reviewOutline'; outline: CourseOutline }
  | { step: 'jobQueued'; job: GenerationJob; outline: CourseOutline }
  | { step: 'generatingLessons'; job: GenerationJob; outline: CourseOutline }
  | { step: 'backgroundGeneration'; jobId: string; courseId: string }
  | { step: 'complete'; outline: CourseOutline; lessons: GeneratedLesson[]; content: CourseContent };

export type GenerationStep = GenerationPhase['step'];

export type GenerationStage = 'outline' | 'lessons';

export type ControllerErrorKind = 'job' | 'network' | 'validation' | 'conflict';

export interface ControllerError {
  kind: ControllerErrorKind;
  message: string;
  stage: GenerationStage;
}

export interface DisplayProgress {
  percent: number;
  message: string;
}

export interface GenerationControllerState {
  phase: GenerationPhase;
  /** Last accepted configuration; kept across failures so retry can reuse it. */
  input: CourseGenerationInput | null;
  progress: DisplayProgress;
  error: ControllerError | null;
  /** A request started by a user event is in flight. */
  busy: boolean;

  submitConfiguration: (input: unknown) => Promise<void>;
  approveOutline: () => Promise<void>;
  /** Restarts lesson generation for an outline that is already approved. */
  generateLessons: () => Promise<void>;
  rejectOutline: (reason: string) => Promise<void>;
  regenerateOutline: () => Promise<void>;
  watch: () => void;
  navigateAway: () => void;
  cancel: () => Promise<void>;
  retry: () => Promise<void>;
  dismissError: () => void;
  reset: () => void;
  dispose: () => void;
}

export type GenerationStore = StoreApi<GenerationControllerState>;

export interface GenerationStoreOptions extends GenerationStrategies {
  outlinePollMs?: number;
  lessonPollMs?: number;
  transform?: (lessons: GeneratedLesson[], outline: CourseOutline) => CourseContent;
  logger?: Logger;
}

const IDLE_PROGRESS: DisplayProgress = { percent: 0, message: '' };

export function displayProgress(stage: GenerationStage, job: GenerationJob): DisplayProgress {
  if (stage === 'outline') {
    return {
      percent: outlineDisplayProgress(job.progressPercent),
      message: job.progressMessage || 'Generating course outline...',
    };
  }
  return {
    percent: lessonsDisplayProgress(job.progressPercent),
    message: job.progressMessage || 'Generating lesson content...',
  };
}

export function toControllerError(error: unknown, stage: GenerationStage): ControllerError {
  const message = errorMessage(error);
  if (error instanceof NetworkError) return { kind: 'network', message, stage };
  if (error instanceof ValidationError) return { kind: 'validation', message, stage };
  if (error instanceof PreconditionError) return { kind: 'conflict', message, stage };
  return { kind: 'job', message, stage };
}

function phaseOutline(phase: GenerationPhase): CourseOutline | null {
  switch (phase.step) {
    case 'reviewOutline':
    case 'jobQueued':
    case 'generatingLessons':
    case 'complete':
      return phase.outline;
    default:
      return null;
  }
}

/** Where a stage goes back to after a failure or a cancel. */
function startOf(stage: GenerationStage, phase: GenerationPhase): GenerationPhase {
  const outline = phaseOutline(phase);
  if (stage === 'lessons' && outline) return { step: 'reviewOutline', outline };
  return { step: 'configure' };
}

export function createGenerationStore(opts: GenerationStoreOptions): GenerationStore {
  const log = opts.logger ?? createLogger('generation-store');
  const outlinePollMs = opts.outlinePollMs ?? OUTLINE_POLL_MS;
  const lessonPollMs = opts.lessonPollMs ?? LESSON_POLL_MS;
  const transform = opts.transform ?? generatedLessonsToCourseContent;

  let timer: ReturnType<typeof setTimeout> | null = null;
  let epoch = 0;
  let disposed = false;

  return createStore<GenerationControllerState>()((set, get) => {
    const intervalFor = (stage: GenerationStage) => (stage === 'outline' ? outlinePollMs : lessonPollMs);

    const stopPolling = () => {
      if (timer) clearTimeout(timer);
      timer = null;
    };

    const enter = (phase: GenerationPhase, patch: Partial<Pick<GenerationControllerState, 'progress' | 'error'>> = {}) => {
      stopPolling();
      epoch += 1;
      log.debug('transition', { from: get().phase.step, to: phase.step });
      set({ phase, ...patch });
      return epoch;
    };

    const activeJob = (): { job: GenerationJob; stage: GenerationStage } | null => {
      const { phase } = get();
      if (phase.step === 'generatingOutline') return { job: phase.job, stage: 'outline' };
      if (phase.step === 'generatingLessons') return { job: phase.job, stage: 'lessons' };
      return null;
    };

    const schedule = (stage: GenerationStage, token: number) => {
      stopPolling();
      if (disposed || token !== epoch) return;
      timer = setTimeout(() => {
        timer = null;
        void poll(token);
      }, intervalFor(stage));
    };

    const fail = (stage: GenerationStage, error: ControllerError) => {
      enter(startOf(stage, get().phase), { error, progress: IDLE_PROGRESS });
    };

    const finishOutline = async (job: GenerationJob, token: number): Promise<void> => {
      const courseId = job.courseId ?? get().input?.courseId;
      if (!courseId) {
        fail('outline', { kind: 'job', message: 'Outline job has no course', stage: 'outline' });
        return;
      }
      let outline: CourseOutline;
      try {
        outline = await opts.outlines.fetchOutline(courseId);
      } catch (error) {
        if (token !== epoch) return;
        if (error instanceof NetworkError) {
          set({ error: toControllerError(error, 'outline') });
          schedule('outline', token);
          return;
        }
        fail('outline', toControllerError(error, 'outline'));
        return;
      }
      if (token !== epoch) return;
      enter({ step: 'reviewOutline', outline }, { progress: { percent: 100, message: 'Outline ready for review' }, error: null });
    };

    const finishLessons = async (outline: CourseOutline, token: number): Promise<void> => {
      let lessons: GeneratedLesson[];
      try {
        lessons = await opts.lessons.listLessons(outline.courseId);
      } catch (error) {
        if (token !== epoch) return;
        if (error instanceof NetworkError) {
          set({ error: toControllerError(error, 'lessons') });
          schedule('lessons', token);
          return;
        }
        fail('lessons', toControllerError(error, 'lessons'));
        return;
      }
      if (token !== epoch) return;
      const content = transform(lessons, outline);
      enter({ step: 'complete', outline, lessons, content }, { progress: { percent: 100, message: 'Course content ready' }, error: null });
    };

    const applyJob = async (job: GenerationJob, token: number): Promise<void> => {
      const active = activeJob();
      if (disposed || token !== epoch || !active || active.job.id !== job.id) return;
      const { stage } = active;
      const { phase, error } = get();

      switch (job.status) {
        case 'queued':
        case 'processing': {
          const next: GenerationPhase = phase.step === 'generatingLessons' ? { ...phase, job } : { step: 'generatingOutline', job };
          set({
            phase: next,
            progress: displayProgress(stage, job),
            error: error?.kind === 'network' ? null : error,
          });
          schedule(stage, token);
          return;
        }
        case 'completed':
          stopPolling();
          if (phase.step === 'generatingLessons') await finishLessons(phase.outline, token);
          else await finishOutline(job, token);
          return;
        case 'failed':
          fail(stage, {
            kind: 'job',
            message: job.errorMessage || (stage === 'outline' ? 'Outline generation failed' : 'Lesson generation failed'),
            stage,
          });
          return;
        case 'cancelled':
          enter(startOf(stage, phase), { progress: IDLE_PROGRESS, error: null });
          return;
      }
    };

    const poll = async (token: number): Promise<void> => {
      const active = activeJob();
      if (!active || token !== epoch) return;
      let job: GenerationJob;
      try {
        job = await opts.jobs.getJob(active.job.id);
      } catch (error) {
        if (token !== epoch) return;
        if (error instanceof NetworkError) {
          log.warn('poll failed, will retry', { jobId: active.job.id, error: error.message });
          set({ error: toControllerError(error, active.stage) });
          schedule(active.stage, token);
          return;
        }
        fail(active.stage, toControllerError(error, active.stage));
        return;
      }
      await applyJob(job, token);
    };

    /** Run one user-initiated request; errors land in `error` for the given stage. */
    const request = async <T>(stage: GenerationStage, call: () => Promise<T>, onResult: (result: T) => void) => {
      const token = epoch;
      set({ busy: true, error: null });
      try {
        const result = await call();
        if (token === epoch && !disposed) onResult(result);
      } catch (error) {
        if (token === epoch && !disposed) set({ error: toControllerError(error, stage) });
      } finally {
        set({ busy: false });
      }
    };

    const startOutline = (call: () => Promise<GenerationJob>) =>
      request('outline', call, (job) => {
        const token = enter({ step: 'generatingOutline', job }, { progress: displayProgress('outline', job), error: null });
        schedule('outline', token);
      });

    const startLessons = (outline: CourseOutline) =>
      request('lessons', () => opts.lessons.start(outline.courseId), (job) => {
        const token = enter({ step: 'generatingLessons', job, outline }, { progress: displayProgress('lessons', job), error: null });
        schedule('lessons', token);
      });

    const approve = (outline: CourseOutline) =>
      request('lessons', () => opts.outlines.approve(outline.courseId, outline.id), (decision) => {
        enter(
          { step: 'jobQueued', job: decision.job, outline: decision.outline },
          { progress: displayProgress('lessons', decision.job), error: null }
        );
      });

    return {
      phase: { step: 'configure' },
      input: null,
      progress: IDLE_PROGRESS,
      error: null,
      busy: false,

      submitConfiguration: async (raw) => {
        if (get().phase.step !== 'configure' || get().busy) return;
        const parsed = CourseGenerationInputSchema.safeParse(raw);
        if (!parsed.success) {
          const message = parsed.error.issues[0]?.message ?? 'Invalid configuration';
          set({ error: { kind: 'validation', message, stage: 'outline' } });
          return;
        }
        const input = parsed.data;
        set({ input });
        await startOutline(() => opts.outlines.start(input));
      },

      approveOutline: async () => {
        const { phase, busy } = get();
        if (phase.step !== 'reviewOutline' || busy) return;
        if (phase.outline.approvalStatus === 'approved') await startLessons(phase.outline);
        else await approve(phase.outline);
      },

      generateLessons: async () => {
        const { phase, busy } = get();
        if (phase.step !== 'reviewOutline' || busy) return;
        if (phase.outline.approvalStatus !== 'approved') return;
        await startLessons(phase.outline);
      },

      rejectOutline: async (reason) => {
        const { phase, busy } = get();
        if (phase.step !== 'reviewOutline' || busy) return;
        if (!reason.trim()) {
          set({ error: { kind: 'validation', message: 'Rejection reason is required', stage: 'outline' } });
          return;
        }
        await startOutline(async () => {
          const decision = await opts.outlines.reject(phase.outline.courseId, phase.outline.id, reason);
          return decision.job;
        });
      },

      regenerateOutline: async () => {
        const { phase, busy, input } = get();
        if (phase.step !== 'reviewOutline' || busy) return;
        const source = input ?? phase.outline.generationInput;
        await startOutline(() => opts.outlines.regenerate(source));
      },

      watch: () => {
        const { phase } = get();
        if (phase.step !== 'jobQueued') return;
        const token = enter(
          { step: 'generatingLessons', job: phase.job, outline: phase.outline },
          { progress: displayProgress('lessons', phase.job) }
        );
        schedule('lessons', token);
      },

      navigateAway: () => {
        const { phase } = get();
        if (phase.step !== 'jobQueued' && phase.step !== 'generatingLessons') return;
        enter({ step: 'backgroundGeneration', jobId: phase.job.id, courseId: phase.outline.courseId });
      },

      cancel: async () => {
        const active = activeJob();
        if (!active || get().busy) return;
        stopPolling();
        const token = epoch;
        set({ busy: true });
        try {
          const job = await opts.jobs.cancel(active.job.id);
          if (token !== epoch) return;
          await applyJob(job, token);
        } catch (error) {
          if (token !== epoch) return;
          if (error instanceof PreconditionError) {
            // Already terminal: take whatever the job ended as.
            await poll(token);
            return;
          }
          set({ error: toControllerError(error, active.stage) });
          schedule(active.stage, token);
        } finally {
          set({ busy: false });
        }
      },

      retry: async () => {
        const { error, input, phase, busy } = get();
        if (!error || busy) return;
        if (error.stage === 'outline') {
          if (phase.step !== 'configure' || !input) return;
          await startOutline(() => opts.outlines.start(input));
          return;
        }
        if (phase.step !== 'reviewOutline') return;
        if (phase.outline.approvalStatus === 'approved') await startLessons(phase.outline);
        else await approve(phase.outline);
      },

      dismissError: () => set({ error: null }),

      reset: () => {
        stopPolling();
        epoch += 1;
        set({ phase: { step: 'configure' }, input: null, progress: IDLE_PROGRESS, error: null, busy: false });
      },

      dispose: () => {
        disposed = true;
        stopPolling();
        epoch += 1;
      },
    };
  });
}
