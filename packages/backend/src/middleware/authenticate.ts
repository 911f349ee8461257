/**
 * Authentication middleware
 *
 * Resolves the bearer token (or the access_token cookie) to an identity and
 * stores it on `res.locals`. Requests without a valid token pass through with
 * no identity; the service layer decides whether that is acceptable.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { USER_ROLES } from '@safetrail/shared';
import { AuthenticatedIdentity, IdentityResolver } from '../types/tracking';
import { extractToken } from '../services/tracking/SubscriptionGateway';

const ROLES: readonly string[] = Object.values(USER_ROLES);

function isIdentity(value: unknown): value is AuthenticatedIdentity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'userId' in value &&
    typeof value.userId === 'string' &&
    'role' in value &&
    typeof value.role === 'string' &&
    ROLES.includes(value.role)
  );
}

export function authenticate(identities: IdentityResolver): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = extractToken({
        url: req.originalUrl,
        cookie: req.headers.cookie,
        authorization: req.headers.authorization,
      });
      res.locals.identity = token ? await identities.resolve(token) : null;
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Identity attached by `authenticate`, or null for anonymous requests
 */
export function getIdentity(res: Response): AuthenticatedIdentity | null {
  const identity: unknown = res.locals.identity;
  return isIdentity(identity) ? identity : null;
}
