import dotenv from 'dotenv';
import { DEFAULT_ADDRESSES, ServiceAddress, addressFromEnv } from '@marketline/shared';

// Load environment variables
dotenv.config();

export interface GatewayConfig {
  env: string;
  serviceName: string;
  bindAddress: ServiceAddress;

  // Downstream services
  accountServiceAddress: ServiceAddress;
  catalogServiceAddress: ServiceAddress;
}

export function loadConfig(): GatewayConfig {
  return {
    env: process.env.NODE_ENV || 'development',
    serviceName: process.env.SERVICE_NAME || 'seller-gateway',
    bindAddress: addressFromEnv('SELLER_GATEWAY_BIND_ADDR', DEFAULT_ADDRESSES.sellerGateway),
    accountServiceAddress: addressFromEnv('ACCOUNT_SERVICE_ADDR', DEFAULT_ADDRESSES.accountService),
    catalogServiceAddress: addressFromEnv('CATALOG_SERVICE_ADDR', DEFAULT_ADDRESSES.catalogService),
  };
}
