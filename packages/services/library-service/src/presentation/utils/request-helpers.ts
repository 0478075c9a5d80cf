import type { Request } from 'express';
import { getAuthenticatedUser, parseId } from '@shelfwise/platform-core';
import { AccountError } from '@application/errors';

/**
 * Id of the signed-in caller. Routes using this sit behind
 * requireAuthenticated, so the throw only guards direct misuse.
 */
export function callerId(req: Request): number {
  const user = getAuthenticatedUser(req);
  if (!user) {
    throw AccountError.unauthorized();
  }
  return user.userId;
}

export function optionalCallerId(req: Request): number | null {
  return getAuthenticatedUser(req)?.userId ?? null;
}

/**
 * `:id` as a positive integer; anything else reads as a missing `resource`.
 */
export function pathId(req: Request, resource: string): number {
  const id = parseId(req.params.id);
  if (id === null) {
    throw AccountError.notFound(resource);
  }
  return id;
}
