/**
 * Base Service Client
 *
 * Standard client for one-shot calls to another marketplace service. Every
 * call opens its own connection; nothing is pooled, retried or timed out.
 */

import { RemoteError, ServiceClientError } from '../errors';
import { ErrorFrame } from '../protocol/types';
import { TaggedUnionSchema } from '../protocol/schema';
import { ServiceAddress } from '../config/address';
import { sendRequest } from '../transport/send-request';
import { Logger } from '../utils/logger';

export interface ServiceClientConfig<TResponse extends { type: string }> {
  /** Peer address, resolved on every call */
  address: ServiceAddress;
  /** Service name for logging and error context */
  serviceName: string;
  responseSchema: TaggedUnionSchema<TResponse>;
  logger: Logger;
}

export function isVariant<T extends { type: string }, K extends T['type']>(
  value: T,
  type: K
): value is Extract<T, { type: K }> {
  return value.type === type;
}

export function isErrorFrame(value: { type: string }): value is ErrorFrame {
  return value.type === 'Error' && 'message' in value && typeof value.message === 'string';
}

export abstract class BaseServiceClient<TRequest extends { type: string }, TResponse extends { type: string }> {
  protected readonly config: ServiceClientConfig<TResponse>;

  constructor(config: ServiceClientConfig<TResponse>) {
    this.config = config;
  }

  get serviceName(): string {
    return this.config.serviceName;
  }

  /**
   * Send one request and narrow the reply to the `expected` variant.
   *
   * @throws RemoteError when the peer answers with an Error frame
   * @throws ServiceClientError on transport failure or any other variant
   */
  protected async call<K extends TResponse['type']>(
    request: TRequest,
    expected: K
  ): Promise<Extract<TResponse, { type: K }>> {
    const startTime = Date.now();
    const response = await sendRequest(request, {
      serviceName: this.config.serviceName,
      address: this.config.address,
      responseSchema: this.config.responseSchema,
    });

    this.config.logger.debug({
      service: this.config.serviceName,
      request: request.type,
      response: response.type,
      duration: Date.now() - startTime,
    }, 'Downstream call completed');

    if (isVariant(response, expected)) {
      return response;
    }
    if (isErrorFrame(response)) {
      throw new RemoteError(this.config.serviceName, response.message);
    }
    throw ServiceClientError.unexpectedResponse(this.config.serviceName, expected, response.type);
  }
}
