/**
 * Ports the generation controller drives. The store never talks to the API
 * client directly, so tests can swap in the fakes from ./fakes.
 */

import type { ApiClient } from '../lib/api/common';
import {
  approveOutline,
  generateAllLessons,
  generateOutline,
  getOutline,
  listGeneratedLessons,
  rejectOutline,
  type OutlineDecision,
} from '../lib/api/generation';
import { cancelJob, getJob } from '../lib/api/jobs';
import type { CourseGenerationInput, CourseOutline, GeneratedLesson, GenerationJob } from '../lib/types/generation';

export interface OutlineGenerator {
  start(input: CourseGenerationInput): Promise<GenerationJob>;
  /** Latest outline version for the course. */
  fetchOutline(courseId: string): Promise<CourseOutline>;
  approve(courseId: string, outlineId: string): Promise<OutlineDecision>;
  reject(courseId: string, outlineId: string, reason: string): Promise<OutlineDecision>;
  regenerate(input: CourseGenerationInput): Promise<GenerationJob>;
}

export interface LessonGenerator {
  start(courseId: string): Promise<GenerationJob>;
  listLessons(courseId: string): Promise<GeneratedLesson[]>;
}

export interface JobPoller {
  getJob(jobId: string): Promise<GenerationJob>;
  cancel(jobId: string): Promise<GenerationJob>;
}

export interface GenerationStrategies {
  outlines: OutlineGenerator;
  lessons: LessonGenerator;
  jobs: JobPoller;
}

export function createApiStrategies(client: ApiClient): GenerationStrategies {
  return {
    outlines: {
      start: (input) => generateOutline(client, input),
      fetchOutline: (courseId) => getOutline(client, courseId),
      approve: (courseId, outlineId) => approveOutline(client, courseId, outlineId),
      reject: (courseId, outlineId, reason) => rejectOutline(client, courseId, outlineId, reason),
      regenerate: (input) => generateOutline(client, input),
    },
    lessons: {
      start: (courseId) => generateAllLessons(client, courseId),
      listLessons: (courseId) => listGeneratedLessons(client, courseId),
    },
    jobs: {
      getJob: (jobId) => getJob(client, jobId),
      cancel: (jobId) => cancelJob(client, jobId),
    },
  };
}
