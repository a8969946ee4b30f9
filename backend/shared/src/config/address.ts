import { ConfigurationError } from '../errors';

export interface ServiceAddress {
  host: string;
  port: number;
}

export const DEFAULT_ADDRESSES = {
  accountService: '127.0.0.1:8080',
  catalogService: '127.0.0.1:8081',
  sellerGateway: '127.0.0.1:8082',
  buyerGateway: '127.0.0.1:8083',
} as const;

/**
 * Parse a `host:port` string. IPv6 hosts go in brackets: `[::1]:8081`.
 */
export function parseAddress(value: string): ServiceAddress {
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d+)$/.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid address "${value}", expected host:port`, { value });
  }

  const host = match[1] ?? match[2];
  const port = parseInt(match[3], 10);
  if (port > 65535) {
    throw new ConfigurationError(`Invalid port in address "${value}"`, { value });
  }
  return { host, port };
}

export function addressFromEnv(name: string, fallback: string): ServiceAddress {
  return parseAddress(process.env[name] || fallback);
}

export function formatAddress(address: ServiceAddress): string {
  return address.host.includes(':') ? `[${address.host}]:${address.port}` : `${address.host}:${address.port}`;
}
