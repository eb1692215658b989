/**
 * Tenant identity cache, resolver and gateway authentication.
 */

import { IncomingMessage } from 'node:http';
import { Socket } from 'node:net';
import { createAuthenticator } from '../../course-api/src/auth';
import { UnauthenticatedError } from '../../src/lib/errors';
import {
  IdentityResolver,
  StaticIdentityProvider,
  TenantIdentityCache,
  resolveAgentIdentity,
} from '../../src/server/identity';
import { quietLogger } from '../helpers/pipeline';

const HOUR = 60 * 60 * 1000;

function request(headers: Record<string, string>): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.headers = headers;
  return req;
}

describe('TenantIdentityCache', () => {
  it('serves entries for an hour by default', () => {
    let now = 1_000;
    const cache = new TenantIdentityCache({ now: () => now });
    cache.set('p-1', { userId: 'user-1', tenantId: 'tenant-1', role: 'admin' });

    now += HOUR - 1;
    expect(cache.get('p-1')?.tenantId).toBe('tenant-1');

    now += 1;
    expect(cache.get('p-1')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('keeps the last write', () => {
    const cache = new TenantIdentityCache({ now: () => 0 });
    cache.set('p-1', { userId: 'user-1', tenantId: 'tenant-1', role: 'admin' });
    cache.set('p-1', { userId: 'user-1', tenantId: 'tenant-2', role: 'member' });
    expect(cache.get('p-1')).toEqual({ userId: 'user-1', tenantId: 'tenant-2', role: 'member' });
  });

  it('evicts the oldest entries past its size bound', () => {
    const cache = new TenantIdentityCache({ maxEntries: 2, now: () => 0 });
    cache.set('p-1', { userId: 'u1', tenantId: 't', role: 'member' });
    cache.set('p-2', { userId: 'u2', tenantId: 't', role: 'member' });
    cache.set('p-3', { userId: 'u3', tenantId: 't', role: 'member' });
    expect(cache.size).toBe(2);
    expect(cache.get('p-1')).toBeNull();
    expect(cache.get('p-3')?.userId).toBe('u3');
  });
});

describe('IdentityResolver', () => {
  function setup() {
    const identities = new StaticIdentityProvider()
      .add('test-token', 'p-1', { userId: 'user-1', tenantId: 'tenant-1', role: 'admin' })
      .add('orphan-token', 'p-2', null);
    let now = 0;
    const cache = new TenantIdentityCache({ now: () => now });
    const resolver = new IdentityResolver(identities, identities, cache, quietLogger);
    return { identities, resolver, advance: (ms: number) => (now += ms) };
  }

  it('looks the membership up once per TTL window', async () => {
    const { identities, resolver, advance } = setup();

    expect(await resolver.resolve({ bearerToken: 'test-token' })).toEqual({
      tenantId: 'tenant-1',
      userId: 'user-1',
      role: 'admin',
    });
    await resolver.resolve({ bearerToken: 'test-token' });
    expect(identities.lookups).toBe(1);

    advance(HOUR);
    await resolver.resolve({ bearerToken: 'test-token' });
    expect(identities.lookups).toBe(2);
  });

  it('rejects unknown tokens and principals without a tenant', async () => {
    const { resolver } = setup();
    await expect(resolver.resolve({ bearerToken: 'nope' })).rejects.toBeInstanceOf(UnauthenticatedError);
    await expect(resolver.resolve({ bearerToken: 'orphan-token' })).rejects.toThrow('No tenant membership');
  });
});

describe('agent identity', () => {
  it('is skipped when no agent token is presented', () => {
    expect(resolveAgentIdentity({ token: undefined, tenantId: 't', userId: 'u' }, 'test-agent-secret')).toBeNull();
  });

  it('requires a matching token and explicit ids', () => {
    expect(() => resolveAgentIdentity({ token: 'wrong', tenantId: 't', userId: 'u' }, 'test-agent-secret')).toThrow(
      'Invalid agent token'
    );
    expect(() =>
      resolveAgentIdentity({ token: 'test-agent-secret', tenantId: undefined, userId: 'u' }, 'test-agent-secret')
    ).toThrow('Agent requests require X-Tenant-Id and X-User-Id');
    expect(
      resolveAgentIdentity({ token: 'test-agent-secret', tenantId: 't', userId: 'u' }, 'test-agent-secret')
    ).toEqual({ tenantId: 't', userId: 'u', role: 'agent' });
  });
});

describe('createAuthenticator', () => {
  const identities = new StaticIdentityProvider().add('test-token', 'p-1', {
    userId: 'user-1',
    tenantId: 'tenant-1',
    role: 'admin',
  });
  const authenticate = createAuthenticator(
    new IdentityResolver(identities, identities, new TenantIdentityCache(), quietLogger),
    'test-agent-secret'
  );

  it('resolves bearer tokens', async () => {
    await expect(authenticate(request({ authorization: 'Bearer test-token' }))).resolves.toEqual({
      tenantId: 'tenant-1',
      userId: 'user-1',
      role: 'admin',
    });
  });

  it('prefers agent headers', async () => {
    const ctx = await authenticate(
      request({ 'x-agent-token': 'test-agent-secret', 'x-tenant-id': 'tenant-7', 'x-user-id': 'svc-1' })
    );
    expect(ctx).toEqual({ tenantId: 'tenant-7', userId: 'svc-1', role: 'agent' });
  });

  it('rejects requests without credentials', async () => {
    await expect(authenticate(request({}))).rejects.toThrow(new UnauthenticatedError('Unauthorized'));
  });
});
