/**
 * API routes, mounted under /api by the app.
 *
 * - catalog.routes.ts: books, authors, libraries, book stats
 * - auth.routes.ts: register, login, current user, own profile
 * - user.routes.ts: public profiles, roles, follows
 * - social.routes.ts: posts, comments, likes, feed, notifications
 */

import { Router, type RequestHandler } from 'express';
import type { ServiceFactory } from '@infrastructure/composition/ServiceFactory';
import { registerAuthRoutes } from './auth.routes';
import { registerCatalogRoutes } from './catalog.routes';
import { registerSocialRoutes } from './social.routes';
import { registerUserRoutes } from './user.routes';

export function createRoutes(factory: ServiceFactory, credentialLimiter: RequestHandler): Router {
  const router = Router();

  registerCatalogRoutes(router, {
    catalogController: factory.createCatalogController(),
    books: factory.createBookHandler(),
    authors: factory.createAuthorHandler(),
    libraries: factory.createLibraryHandler(),
  });
  registerAuthRoutes(router, { authController: factory.createAuthController(), credentialLimiter });
  registerUserRoutes(router, factory.createUserController());
  registerSocialRoutes(router, {
    socialController: factory.createSocialController(),
    posts: factory.createPostHandler(),
    comments: factory.createCommentHandler(),
  });

  return router;
}
