/**
 * Composition root shared by the gateway and the worker.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { createLogger, type Logger } from '../lib/logger';
import { ApprovalGate } from './approval';
import type { CommonConfig } from './config';
import { CourseGenerationService } from './generation';
import { StaticIdentityProvider } from './identity';
import { NotificationHub, type HubOptions } from './notifications/hub';
import { NotificationService } from './notifications/service';
import { JobOrchestrator } from './orchestrator';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry';
import { createMemoryStores } from './store/memory';
import { createAdminSupabase, createSupabaseStores } from './store/supabase';
import type { Stores } from './store/types';

export interface Services {
  stores: Stores;
  hub: NotificationHub;
  notifications: NotificationService;
  orchestrator: JobOrchestrator;
  approval: ApprovalGate;
  generation: CourseGenerationService;
}

export interface ServiceOptions {
  hub?: HubOptions;
  retryPolicy?: RetryPolicy;
  now?: () => Date;
  random?: () => number;
  logger?: Logger;
}

export function createServices(stores: Stores, opts: ServiceOptions = {}): Services {
  const log = opts.logger ?? createLogger('runtime');
  const hub = new NotificationHub({ ...opts.hub, logger: log.child({ component: 'notification-hub' }) });
  const notifications = new NotificationService(stores.notifications, hub, {
    now: opts.now,
    logger: log.child({ component: 'notifications' }),
  });
  const orchestrator = new JobOrchestrator({
    jobs: stores.jobs,
    notifier: notifications,
    now: opts.now,
    random: opts.random,
    retryPolicy: opts.retryPolicy ?? DEFAULT_RETRY_POLICY,
    logger: log.child({ component: 'orchestrator' }),
  });
  const approval = new ApprovalGate({
    outlines: stores.outlines,
    lessons: stores.lessons,
    orchestrator,
    notifier: notifications,
    now: opts.now,
    logger: log.child({ component: 'approval' }),
  });
  const generation = new CourseGenerationService({
    orchestrator,
    approval,
    lessons: stores.lessons,
    logger: log.child({ component: 'generation' }),
  });
  return { stores, hub, notifications, orchestrator, approval, generation };
}

const SeedSchema = z.object({
  audiences: z
    .array(
      z.object({
        id: z.string(),
        tenantId: z.string(),
        name: z.string(),
        description: z.string().default(''),
        experienceLevel: z.enum(['beginner', 'intermediate', 'advanced']),
      })
    )
    .default([]),
  knowledge: z
    .array(
      z.object({
        smeId: z.string(),
        tenantId: z.string(),
        title: z.string(),
        summary: z.string(),
        chunks: z.array(z.string()).default([]),
        updatedAt: z.string(),
      })
    )
    .default([]),
  members: z
    .array(
      z.object({
        token: z.string(),
        principalId: z.string(),
        userId: z.string(),
        tenantId: z.string(),
        role: z.string().default('member'),
        email: z.string().nullable().default(null),
      })
    )
    .default([]),
});

export type MemorySeed = z.infer<typeof SeedSchema>;

export function loadMemorySeed(path: string | undefined): MemorySeed {
  if (!path) return SeedSchema.parse({});
  return SeedSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

export function staticIdentityFromSeed(seed: MemorySeed): StaticIdentityProvider {
  const identities = new StaticIdentityProvider();
  for (const m of seed.members) {
    identities.add(m.token, m.principalId, { userId: m.userId, tenantId: m.tenantId, role: m.role }, m.email);
  }
  return identities;
}

export function createStores(config: CommonConfig, seed: MemorySeed): Stores {
  if (config.store === 'memory' || !config.supabase) {
    return createMemoryStores({ audiences: seed.audiences, knowledge: seed.knowledge });
  }
  return createSupabaseStores(createAdminSupabase(config.supabase.url, config.supabase.serviceRoleKey));
}
