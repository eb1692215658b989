/**
 * Jobs API
 * Submit, inspect and cancel generation jobs through the course API.
 */

import { z } from 'zod';
import type { ApiClient } from './common';
import { GenerationJobSchema } from '../schemas/api';
import type { GenerationJob, GenerationJobStatus, GenerationJobType } from '../types/generation';

export interface ListJobsParams {
  type?: GenerationJobType;
  status?: GenerationJobStatus;
  courseId?: string;
  /** Hide lesson_content children of full_course jobs. */
  topLevelOnly?: boolean;
  limit?: number;
}

const JobListSchema = z.object({ jobs: z.array(GenerationJobSchema) });

export function submitJob(client: ApiClient, type: GenerationJobType, payload: Record<string, unknown>): Promise<GenerationJob> {
  return client.post('/jobs', GenerationJobSchema, { body: { type, payload } });
}

export function getJob(client: ApiClient, jobId: string): Promise<GenerationJob> {
  return client.get(`/jobs/${encodeURIComponent(jobId)}`, GenerationJobSchema);
}

export async function listJobs(client: ApiClient, params: ListJobsParams = {}): Promise<GenerationJob[]> {
  const data = await client.get('/jobs', JobListSchema, {
    query: {
      type: params.type,
      status: params.status,
      courseId: params.courseId,
      topLevelOnly: params.topLevelOnly,
      limit: params.limit,
    },
  });
  return data.jobs;
}

/**
 * Cancel a queued or processing job. Cancelling a finished job returns it unchanged.
 */
export function cancelJob(client: ApiClient, jobId: string): Promise<GenerationJob> {
  return client.post(`/jobs/${encodeURIComponent(jobId)}/cancel`, GenerationJobSchema);
}
