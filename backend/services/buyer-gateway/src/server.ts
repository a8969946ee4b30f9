import {
  AccountServiceClient,
  BuyerRequest,
  BuyerResponse,
  CatalogServiceClient,
  Clock,
  LineServer,
  Logger,
  ServiceAddress,
  SessionValidator,
  buyerRequestSchema,
} from '@marketline/shared';
import { BuyerController } from './controllers/buyer.controller';
import { BuyerService } from './services/buyer.service';
import { logger as defaultLogger } from './utils/logger';
import { loadConfig } from './config';

export interface BuyerGatewayOptions {
  accountServiceAddress: ServiceAddress;
  catalogServiceAddress: ServiceAddress;
  logger?: Logger;
  clock?: Clock;
}

export function buildServer(options: BuyerGatewayOptions): LineServer<BuyerRequest, BuyerResponse> {
  const logger = options.logger ?? defaultLogger;
  const accounts = new AccountServiceClient(options.accountServiceAddress, logger);
  const controller = new BuyerController(new BuyerService({
    accounts,
    catalog: new CatalogServiceClient(options.catalogServiceAddress, logger),
    sessions: new SessionValidator(accounts, logger, options.clock),
    logger,
  }));

  return new LineServer<BuyerRequest, BuyerResponse>({
    serviceName: 'buyer-gateway',
    logger,
    requestSchema: buyerRequestSchema,
    handler: (request) => controller.handle(request),
  });
}

async function startServer(): Promise<LineServer<BuyerRequest, BuyerResponse>> {
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
