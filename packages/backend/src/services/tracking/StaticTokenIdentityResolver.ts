import { AuthenticatedIdentity, IdentityResolver, StaticIdentity } from '../../types/tracking';

/**
 * Resolves bearer tokens against a fixed table (AUTH_TOKENS). Used for local
 * development and tests; production deployments inject their own resolver.
 */
export class StaticTokenIdentityResolver implements IdentityResolver {
  private identities: Map<string, AuthenticatedIdentity> = new Map();

  constructor(entries: StaticIdentity[]) {
    for (const { token, userId, role } of entries) {
      this.identities.set(token, { userId, role });
    }
  }

  async resolve(token: string): Promise<AuthenticatedIdentity | null> {
    return this.identities.get(token) ?? null;
  }

  size(): number {
    return this.identities.size;
  }
}
