import type { IncomingMessage } from "node:http";
import { UnauthenticatedError } from "../../src/lib/errors";
import type { RequestContext } from "../../src/lib/types/generation";
import { resolveAgentIdentity, type IdentityResolver } from "../../src/server/identity";
import { headerValue } from "./http";

export type Authenticator = (req: IncomingMessage) => Promise<RequestContext>;

export function bearerToken(req: IncomingMessage): string {
  const authHeader = headerValue(req, "authorization") || "";
  return authHeader.startsWith("Bearer ") ? authHeader.slice(7).trim() : "";
}

/**
 * Agent-token headers win when present; otherwise the bearer token is
 * resolved to a tenant membership.
 */
export function createAuthenticator(resolver: IdentityResolver, agentToken?: string): Authenticator {
  return async (req) => {
    const agent = resolveAgentIdentity(
      {
        token: headerValue(req, "x-agent-token"),
        tenantId: headerValue(req, "x-tenant-id"),
        userId: headerValue(req, "x-user-id"),
      },
      agentToken ?? null
    );
    if (agent) return agent;

    const token = bearerToken(req);
    if (!token) throw new UnauthenticatedError();
    return resolver.resolve({ bearerToken: token });
  };
}
