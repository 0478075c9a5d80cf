/**
 * Mounts a ResourceHandler on an Express router:
 *
 *   GET    {base}        list
 *   GET    {base}/:id    retrieve
 *   POST   {base}        create
 *   PUT    {base}/:id    full update
 *   PATCH  {base}/:id    partial update
 *   DELETE {base}/:id    destroy
 */

import type { Request, Response, Router } from 'express';
import { asyncHandler } from '../error-handling/errors.js';
import { extractAuthContext } from '../auth/policy-guards.js';
import type { HandlerOutcome } from './types.js';
import type { ResourceHandler } from './resource-handler.js';

export function sendOutcome(res: Response, outcome: HandlerOutcome): void {
  res.status(outcome.statusCode).json(outcome.body);
}

function bodyOf(req: Request): unknown {
  return req.body ?? {};
}

export function registerResourceRoutes<TEntity, TInput, TCreate, TQuery>(
  router: Router,
  basePath: string,
  handler: ResourceHandler<TEntity, TInput, TCreate, TQuery>
): void {
  router.get(
    basePath,
    asyncHandler(async (req, res) => sendOutcome(res, await handler.list(extractAuthContext(req), req.query)))
  );

  router.get(
    `${basePath}/:id`,
    asyncHandler(async (req, res) => sendOutcome(res, await handler.retrieve(extractAuthContext(req), req.params.id)))
  );

  router.post(
    basePath,
    asyncHandler(async (req, res) => sendOutcome(res, await handler.create(extractAuthContext(req), bodyOf(req))))
  );

  router.put(
    `${basePath}/:id`,
    asyncHandler(async (req, res) =>
      sendOutcome(res, await handler.update(extractAuthContext(req), req.params.id, bodyOf(req), false))
    )
  );

  router.patch(
    `${basePath}/:id`,
    asyncHandler(async (req, res) =>
      sendOutcome(res, await handler.update(extractAuthContext(req), req.params.id, bodyOf(req), true))
    )
  );

  router.delete(
    `${basePath}/:id`,
    asyncHandler(async (req, res) => sendOutcome(res, await handler.destroy(extractAuthContext(req), req.params.id)))
  );
}
