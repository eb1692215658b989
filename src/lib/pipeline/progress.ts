// Progress checkpoints and labels shared by the worker, notifications and the client.

import type { GenerationJobType } from '../types/generation';

export interface ProgressCheckpoint {
  percent: number;
  message: string;
}

export const OUTLINE_STEPS = {
  ANALYZING: { percent: 20, message: 'Analyzing target audience...' },
  GENERATING: { percent: 40, message: 'Generating course outline with AI...' },
  STORING: { percent: 70, message: 'Storing outline...' },
  DONE: { percent: 100, message: 'Outline generation complete' },
} as const satisfies Record<string, ProgressCheckpoint>;

export const LESSON_STEPS = {
  GENERATING: { percent: 30, message: 'Generating lesson content with AI...' },
  STORING: { percent: 70, message: 'Storing lesson content...' },
  DONE: { percent: 100, message: 'Lesson generation complete' },
} as const satisfies Record<string, ProgressCheckpoint>;

export const COMPONENT_STEPS = {
  GENERATING: { percent: 30, message: 'Regenerating component with AI...' },
  STORING: { percent: 80, message: 'Storing component...' },
  DONE: { percent: 100, message: 'Component regeneration complete' },
} as const satisfies Record<string, ProgressCheckpoint>;

export const INGESTION_STEPS = {
  READING: { percent: 10, message: 'Reading source documents...' },
  SUMMARIZING: { percent: 40, message: 'Summarizing knowledge with AI...' },
  STORING: { percent: 80, message: 'Storing knowledge...' },
  DONE: { percent: 100, message: 'Ingestion complete' },
} as const satisfies Record<string, ProgressCheckpoint>;

/** Parent progress while children run: 10 reserved for fan-out, 90 for lessons. */
export const PARENT_FANOUT_PERCENT = 10;

export const JOB_TYPE_LABELS: Record<GenerationJobType, string> = {
  course_outline: 'Course Outline',
  lesson_content: 'Lesson Content',
  full_course: 'Course Content',
  component_regen: 'Component Regeneration',
  sme_ingestion: 'SME Ingestion',
};

export function parentProgressMessage(done: number, total: number): string {
  return `Generated ${done} of ${total} lessons...`;
}

/**
 * Display progress for the outline stage. Server progress is compressed into
 * 20..75 so the bar never looks finished before the outline is fetched.
 */
export function outlineDisplayProgress(serverPercent: number): number {
  return Math.min(75, Math.round(20 + serverPercent * 0.55));
}

export function lessonsDisplayProgress(serverPercent: number): number {
  return Math.min(85, Math.round(10 + serverPercent * 0.75));
}
