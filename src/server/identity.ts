/**
 * Tenant-aware identity resolution.
 *
 * A bearer token is validated on every request; the principal's tenant
 * membership is cached for an hour. Entries are never invalidated, so a
 * membership change takes effect when the entry expires.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { RequestContext } from '../lib/types/generation';
import { UnauthenticatedError } from '../lib/errors';
import { createLogger, type Logger } from '../lib/logger';

export const DEFAULT_IDENTITY_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_IDENTITY_CACHE_SIZE = 10_000;

export interface Credentials {
  bearerToken: string;
}

export interface Principal {
  principalId: string;
  email: string | null;
  active: boolean;
}

export interface TenantMembership {
  userId: string;
  tenantId: string;
  role: string;
}

export interface IdentityProvider {
  /** @throws UnauthenticatedError when the credentials are not valid */
  validate(credentials: Credentials): Promise<Principal>;
}

export interface TenantDirectory {
  lookup(principalId: string): Promise<TenantMembership | null>;
}

interface CacheEntry {
  value: TenantMembership;
  expiresAt: number;
}

export class TenantIdentityCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(opts: { ttlMs?: number; maxEntries?: number; now?: () => number } = {}) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_IDENTITY_TTL_MS;
    this.maxEntries = Math.max(1, opts.maxEntries ?? DEFAULT_IDENTITY_CACHE_SIZE);
    this.now = opts.now ?? Date.now;
  }

  get(principalId: string): TenantMembership | null {
    const entry = this.entries.get(principalId);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(principalId);
      return null;
    }
    return entry.value;
  }

  /** Last write wins. */
  set(principalId: string, value: TenantMembership): void {
    this.entries.delete(principalId);
    this.entries.set(principalId, { value, expiresAt: this.now() + this.ttlMs });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

export class IdentityResolver {
  private readonly log: Logger;

  constructor(
    private readonly provider: IdentityProvider,
    private readonly directory: TenantDirectory,
    private readonly cache: TenantIdentityCache,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger('identity');
  }

  async resolve(credentials: Credentials): Promise<RequestContext> {
    const principal = await this.provider.validate(credentials);
    if (!principal.active) throw new UnauthenticatedError('Account is disabled');

    const cached = this.cache.get(principal.principalId);
    if (cached) return { tenantId: cached.tenantId, userId: cached.userId, role: cached.role };

    const membership = await this.directory.lookup(principal.principalId);
    if (!membership) {
      this.log.warn('principal has no tenant membership', { principalId: principal.principalId });
      throw new UnauthenticatedError('No tenant membership');
    }
    this.cache.set(principal.principalId, membership);
    return { tenantId: membership.tenantId, userId: membership.userId, role: membership.role };
  }
}

export interface AgentHeaders {
  token: string | undefined;
  tenantId: string | undefined;
  userId: string | undefined;
}

/**
 * Service callers present the shared agent token plus explicit tenant and
 * user ids. Returns null when no agent token was presented.
 */
export function resolveAgentIdentity(headers: AgentHeaders, agentToken: string | null): RequestContext | null {
  if (!headers.token) return null;
  if (!agentToken || headers.token !== agentToken) throw new UnauthenticatedError('Invalid agent token');
  if (!headers.tenantId || !headers.userId) {
    throw new UnauthenticatedError('Agent requests require X-Tenant-Id and X-User-Id');
  }
  return { tenantId: headers.tenantId, userId: headers.userId, role: 'agent' };
}

export class SupabaseIdentityProvider implements IdentityProvider {
  constructor(private readonly db: SupabaseClient) {}

  async validate(credentials: Credentials): Promise<Principal> {
    const { data, error } = await this.db.auth.getUser(credentials.bearerToken);
    if (error || !data.user) throw new UnauthenticatedError();
    return {
      principalId: data.user.id,
      email: data.user.email ?? null,
      active: data.user.app_metadata.disabled !== true,
    };
  }
}

const MemberRowSchema = z.object({
  user_id: z.string(),
  tenant_id: z.string(),
  role: z.string(),
});

export class SupabaseTenantDirectory implements TenantDirectory {
  constructor(private readonly db: SupabaseClient) {}

  async lookup(principalId: string): Promise<TenantMembership | null> {
    const { data, error } = await this.db
      .from('tenant_members')
      .select('user_id, tenant_id, role')
      .eq('principal_id', principalId)
      .maybeSingle();
    if (error) throw new Error(`tenant_members lookup failed: ${error.message}`);
    if (!data) return null;
    const row = MemberRowSchema.parse(data);
    return { userId: row.user_id, tenantId: row.tenant_id, role: row.role };
  }
}

/** Fixed token-to-membership table for local `STORE=memory` runs and tests. */
export class StaticIdentityProvider implements IdentityProvider, TenantDirectory {
  private readonly byToken = new Map<string, string>();
  private readonly members = new Map<string, TenantMembership>();
  private readonly emails = new Map<string, string | null>();
  lookups = 0;

  add(token: string, principalId: string, membership: TenantMembership | null, email: string | null = null): this {
    this.byToken.set(token, principalId);
    if (membership) this.members.set(principalId, membership);
    this.emails.set(principalId, email);
    return this;
  }

  async validate(credentials: Credentials): Promise<Principal> {
    const principalId = this.byToken.get(credentials.bearerToken);
    if (!principalId) throw new UnauthenticatedError();
    return { principalId, email: this.emails.get(principalId) ?? null, active: true };
  }

  async lookup(principalId: string): Promise<TenantMembership | null> {
    this.lookups += 1;
    return this.members.get(principalId) ?? null;
  }
}
