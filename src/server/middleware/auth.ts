import type { Context, MiddlewareHandler, Next } from 'hono';
import { getCookie } from 'hono/cookie';
import type { User } from '../../db/schema';
import type { MemberStore, SessionStore } from '../../db/store';
import { Ability } from '../../core/ability';
import { Errors } from '../../core/errors';
import { logger } from '../logger';

/**
 * Extended context with user information
 */
declare module 'hono' {
  interface ContextVariableMap {
    user?: User;
    ability: Ability;
  }
}

const SESSION_COOKIE = 'mergedesk_session';

/**
 * Session token from a Bearer Authorization header, or the session cookie
 * set for browsers
 */
export function sessionToken(c: Context): string | undefined {
  const authHeader = c.req.header('Authorization');
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.slice(7);
  }
  return getCookie(c, SESSION_COOKIE);
}

/**
 * Authentication middleware.
 * Sets c.get('user') when a valid session is found and c.get('ability')
 * for every request, anonymous ones included.
 */
export function authMiddleware(sessions: SessionStore, members: MemberStore): MiddlewareHandler {
  return async (c, next) => {
    const token = sessionToken(c);

    if (token) {
      try {
        const user = await sessions.findUserByToken(token);
        if (user) {
          c.set('user', user);
        }
      } catch (error) {
        // Treat the request as anonymous
        logger.error('Session lookup failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    c.set('ability', new Ability(c.get('user'), members));
    await next();
  };
}

/**
 * Require authentication middleware - returns 401 if not authenticated
 */
export async function requireAuth(c: Context, next: Next): Promise<Response | void> {
  if (!c.get('user')) {
    return c.json({ error: 'Authentication required' }, 401);
  }

  await next();
}

/**
 * The signed in user; throws UNAUTHENTICATED for anonymous requests
 */
export function currentUser(c: Context): User {
  const user = c.get('user');
  if (!user) {
    throw Errors.unauthenticated();
  }
  return user;
}
