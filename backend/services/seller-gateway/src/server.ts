import {
  AccountServiceClient,
  SellerRequest,
  SellerResponse,
  CatalogServiceClient,
  Clock,
  LineServer,
  Logger,
  ServiceAddress,
  SessionValidator,
  sellerRequestSchema,
} from '@marketline/shared';
import { SellerController } from './controllers/seller.controller';
import { SellerService } from './services/seller.service';
import { logger as defaultLogger } from './utils/logger';
import { loadConfig } from './config';

export interface SellerGatewayOptions {
  accountServiceAddress: ServiceAddress;
  catalogServiceAddress: ServiceAddress;
  logger?: Logger;
  clock?: Clock;
}

export function buildServer(options: SellerGatewayOptions): LineServer<SellerRequest, SellerResponse> {
  const logger = options.logger ?? defaultLogger;
  const accounts = new AccountServiceClient(options.accountServiceAddress, logger);
  const controller = new SellerController(new SellerService({
    accounts,
    catalog: new CatalogServiceClient(options.catalogServiceAddress, logger),
    sessions: new SessionValidator(accounts, logger, options.clock),
    logger,
  }));

  return new LineServer<SellerRequest, SellerResponse>({
    serviceName: 'seller-gateway',
    logger,
    requestSchema: sellerRequestSchema,
    handler: (request) => controller.handle(request),
  });
}

async function startServer(): Promise<LineServer<SellerRequest, SellerResponse>> {
  const config = loadConfig();
  defaultLogger.info({ env: config.env }, `Starting ${config.serviceName}`);
  const server = buildServer({
    accountServiceAddress: config.accountServiceAddress,
    catalogServiceAddress: config.catalogServiceAddress,
  });
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
