import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import express from 'express';
import { registerShutdownHook, serializeError, setupGracefulShutdown } from '@shelfwise/platform-core';
import { SERVICE_NAME, getLogger, loadServiceConfig } from '@config/service-config';
import { createRepositories } from '@infrastructure/composition/repositories';
import { ServiceFactory } from '@infrastructure/composition/ServiceFactory';
import { createApp } from '@presentation/app';

const logger = getLogger('main');

async function startServer(): Promise<void> {
  const config = loadServiceConfig();
  const repositories = createRepositories(config);

  const bootstrapAdmin = config.bootstrapAdmin;
  if (bootstrapAdmin) {
    await new ServiceFactory(config, repositories).createEnsureBootstrapAdminUseCase().execute(bootstrapAdmin);
  }

  const server = express();
  server.use(helmet());
  server.use(
    cors({
      origin: config.allowedOrigins.length > 0 ? config.allowedOrigins : config.nodeEnv !== 'production',
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-ID'],
    })
  );
  server.use(compression());
  server.use(createApp({ config, repositories }));

  const listener = server.listen(config.port, '0.0.0.0', () => {
    logger.info(`${SERVICE_NAME} started`, { port: config.port, storeDriver: config.storeDriver });
  });

  registerShutdownHook(() => repositories.close());
  setupGracefulShutdown(listener);
}

startServer().catch(error => {
  logger.error('Failed to start service', { error: serializeError(error) });
  process.exit(1);
});
