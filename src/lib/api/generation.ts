/**
 * Outline and lesson lifecycle calls.
 */

import { z } from 'zod';
import type { ApiClient } from './common';
import { CourseOutlineSchema, GeneratedLessonRecordSchema, GenerationJobSchema } from '../schemas/api';
import type { OutlineSectionUpdate, SmeDocument } from '../schemas/generation';
import type { CourseGenerationInput, CourseOutline, GeneratedLesson, GenerationJob } from '../types/generation';

const OutlineWithJobSchema = z.object({ outline: CourseOutlineSchema, job: GenerationJobSchema });
const OutlineListSchema = z.object({ outlines: z.array(CourseOutlineSchema) });
const LessonListSchema = z.object({ lessons: z.array(GeneratedLessonRecordSchema) });

export type OutlineDecision = z.infer<typeof OutlineWithJobSchema>;

function coursePath(courseId: string): string {
  return `/courses/${encodeURIComponent(courseId)}`;
}

function outlinePath(courseId: string, outlineId: string): string {
  return `${coursePath(courseId)}/outlines/${encodeURIComponent(outlineId)}`;
}

export function generateOutline(client: ApiClient, input: CourseGenerationInput): Promise<GenerationJob> {
  return client.post(`${coursePath(input.courseId)}/outline/generate`, GenerationJobSchema, { body: input });
}

export function getOutline(client: ApiClient, courseId: string, version?: number): Promise<CourseOutline> {
  return client.get(`${coursePath(courseId)}/outline`, CourseOutlineSchema, { query: { version } });
}

export async function listOutlines(client: ApiClient, courseId: string): Promise<CourseOutline[]> {
  const data = await client.get(`${coursePath(courseId)}/outlines`, OutlineListSchema);
  return data.outlines;
}

export function approveOutline(client: ApiClient, courseId: string, outlineId: string): Promise<OutlineDecision> {
  return client.post(`${outlinePath(courseId, outlineId)}/approve`, OutlineWithJobSchema);
}

export function rejectOutline(client: ApiClient, courseId: string, outlineId: string, reason: string): Promise<OutlineDecision> {
  return client.post(`${outlinePath(courseId, outlineId)}/reject`, OutlineWithJobSchema, { body: { reason } });
}

export function requestOutlineRevision(client: ApiClient, courseId: string, outlineId: string, notes?: string): Promise<CourseOutline> {
  return client.post(`${outlinePath(courseId, outlineId)}/revision`, CourseOutlineSchema, { body: { notes } });
}

export function submitOutlineForReview(client: ApiClient, courseId: string, outlineId: string): Promise<CourseOutline> {
  return client.post(`${outlinePath(courseId, outlineId)}/submit`, CourseOutlineSchema);
}

export function updateOutline(
  client: ApiClient,
  courseId: string,
  outlineId: string,
  sections: OutlineSectionUpdate[]
): Promise<CourseOutline> {
  return client.put(outlinePath(courseId, outlineId), CourseOutlineSchema, { body: { sections } });
}

export function generateAllLessons(client: ApiClient, courseId: string): Promise<GenerationJob> {
  return client.post(`${coursePath(courseId)}/lessons/generate`, GenerationJobSchema);
}

export async function listGeneratedLessons(client: ApiClient, courseId: string): Promise<GeneratedLesson[]> {
  const data = await client.get(`${coursePath(courseId)}/lessons`, LessonListSchema);
  return data.lessons;
}

export function regenerateComponent(
  client: ApiClient,
  lessonId: string,
  componentId: string,
  prompt: string
): Promise<GenerationJob> {
  return client.post(
    `/lessons/${encodeURIComponent(lessonId)}/components/${encodeURIComponent(componentId)}/regenerate`,
    GenerationJobSchema,
    { body: { prompt } }
  );
}

export function ingestSme(client: ApiClient, smeId: string, documents: SmeDocument[]): Promise<GenerationJob> {
  return client.post(`/smes/${encodeURIComponent(smeId)}/ingest`, GenerationJobSchema, { body: { documents } });
}
