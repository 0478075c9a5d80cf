/**
 * Creates the library-service Express app. `main.ts` adds the network-facing
 * middleware and starts listening; tests drive this directly with supertest.
 */

import express, { type Express } from 'express';
import {
  StandardAuthMiddleware,
  errorHandler,
  notFoundHandler,
  requestLogger,
} from '@shelfwise/platform-core';
import { SERVICE_NAME, type ServiceConfig } from '@config/service-config';
import type { Repositories } from '@infrastructure/composition/repositories';
import { ServiceFactory } from '@infrastructure/composition/ServiceFactory';
import { credentialRateLimit } from './middleware/rateLimit';
import { createHealthRoutes } from './routes/health.routes';
import { createRoutes } from './routes';

export const JSON_BODY_LIMIT = '1mb';

export interface AppDependencies {
  config: ServiceConfig;
  repositories: Repositories;
}

export function createApp({ config, repositories }: AppDependencies): Express {
  const app = express();
  const factory = new ServiceFactory(config, repositories);

  app.disable('x-powered-by');
  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  // after the body parser, so the correlation context survives into handlers
  app.use(requestLogger(SERVICE_NAME));

  app.use('/', createHealthRoutes(repositories));

  const auth = new StandardAuthMiddleware(SERVICE_NAME, factory.jwtService, factory.createCallerLookup());
  app.use('/api', auth.authenticate(), createRoutes(factory, credentialRateLimit(config.authRateLimit)));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
