import type { CourseGenerationInput, RequestContext } from '../../src/lib/types/generation';
import { Logger } from '../../src/lib/logger';
import type { DraftSection } from '../../src/server/approval';
import { createServices, type Services } from '../../src/server/runtime';
import { createMemoryStores } from '../../src/server/store/memory';

export const ctx: RequestContext = { tenantId: 'tenant-1', userId: 'user-1', role: 'admin' };
export const otherTenant: RequestContext = { tenantId: 'tenant-2', userId: 'user-9', role: 'admin' };

export const quietLogger = new Logger({ component: 'test' }, 'error');

export interface TestClock {
  now: () => Date;
  set(iso: string): void;
  advanceMs(ms: number): void;
}

export function createClock(startIso = '2026-03-01T10:00:00.000Z'): TestClock {
  let current = new Date(startIso);
  return {
    now: () => new Date(current.getTime()),
    set(iso) {
      current = new Date(iso);
    },
    advanceMs(ms) {
      current = new Date(current.getTime() + ms);
    },
  };
}

export const courseInput: CourseGenerationInput = {
  courseId: 'course-1',
  knowledgeSourceIds: ['sme-1', 'sme-2'],
  targetAudienceIds: ['aud-1'],
  desiredOutcome: 'Reduce churn',
};

export const draftSections: DraftSection[] = [
  {
    title: 'Foundations',
    description: 'Core ideas',
    lessons: [
      { title: 'Key Concepts', description: '', estimatedDurationMinutes: 10, learningObjectives: ['Name the concepts'] },
      { title: 'Why It Matters', description: '', estimatedDurationMinutes: 8, learningObjectives: [] },
    ],
  },
];

export interface TestPipeline extends Services {
  clock: TestClock;
}

/** Memory-backed services on a fixed clock with jitter-free retry delays. */
export function createTestPipeline(): TestPipeline {
  const clock = createClock();
  const stores = createMemoryStores({
    knowledge: [
      { smeId: 'sme-1', tenantId: 'tenant-1', title: 'Returns', summary: 'Return rules', chunks: [], updatedAt: '2026-01-01T00:00:00.000Z' },
      { smeId: 'sme-2', tenantId: 'tenant-1', title: 'Escalation', summary: 'Escalation paths', chunks: [], updatedAt: '2026-01-01T00:00:00.000Z' },
    ],
    audiences: [
      { id: 'aud-1', tenantId: 'tenant-1', name: 'Support agents', description: 'Front line', experienceLevel: 'beginner' },
    ],
  });
  const services = createServices(stores, { now: clock.now, random: () => 0.5, logger: quietLogger });
  return { ...services, clock };
}
