import { CatalogRequest, CatalogResponse, LineServer, Logger, catalogRequestSchema } from '@marketline/shared';
import { CatalogController } from './controllers/catalog.controller';
import { CatalogRepository, InMemoryCatalogRepository } from './repositories/catalog.repository';
import { CatalogService } from './services/catalog.service';
import { logger as defaultLogger } from './utils/logger';
import { loadConfig } from './config';

export interface CatalogServerOptions {
  repository?: CatalogRepository;
  logger?: Logger;
}

export function buildServer(options: CatalogServerOptions = {}): LineServer<CatalogRequest, CatalogResponse> {
  const controller = new CatalogController(
    new CatalogService(options.repository ?? new InMemoryCatalogRepository())
  );

  return new LineServer<CatalogRequest, CatalogResponse>({
    serviceName: 'catalog-service',
    logger: options.logger ?? defaultLogger,
    requestSchema: catalogRequestSchema,
    handler: (request) => controller.handle(request),
  });
}

async function startServer(): Promise<LineServer<CatalogRequest, CatalogResponse>> {
  const config = loadConfig();
  defaultLogger.info({ env: config.env }, `Starting ${config.serviceName}`);
  const server = buildServer();
  await server.listen(config.bindAddress);

  const shutdown = (signal: string) => {
    defaultLogger.info(`${signal} received, shutting down gracefully`);
    server.close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        defaultLogger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}

export { startServer };
