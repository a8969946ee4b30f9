import dotenv from 'dotenv';
import { DEFAULT_ADDRESSES, ServiceAddress, addressFromEnv } from '@marketline/shared';

// Load environment variables
dotenv.config();

export interface CatalogServiceConfig {
  env: string;
  serviceName: string;
  bindAddress: ServiceAddress;
}

export function loadConfig(): CatalogServiceConfig {
  return {
    env: process.env.NODE_ENV || 'development',
    serviceName: process.env.SERVICE_NAME || 'catalog-service',
    bindAddress: addressFromEnv('CATALOG_SERVICE_BIND_ADDR', DEFAULT_ADDRESSES.catalogService),
  };
}
