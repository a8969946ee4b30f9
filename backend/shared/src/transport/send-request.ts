import net from 'net';
import { ErrorCode, ServiceClientError } from '../errors';
import { TaggedUnionSchema } from '../protocol/schema';
import { ServiceAddress, formatAddress } from '../config/address';
import { FRAME_DELIMITER, decodeFrame, encodeFrame } from './frame-codec';

export interface SendRequestOptions<TResponse extends { type: string }> {
  serviceName: string;
  address: ServiceAddress;
  responseSchema: TaggedUnionSchema<TResponse>;
}

/**
 * Dial, write one frame, read one line, close.
 *
 * There is no timeout and no retry: a peer that never answers keeps the
 * returned promise pending.
 */
export function sendRequest<TRequest extends { type: string }, TResponse extends { type: string }>(
  request: TRequest,
  options: SendRequestOptions<TResponse>
): Promise<TResponse> {
  const { serviceName, address, responseSchema } = options;

  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: address.host, port: address.port });
    let buffer = '';
    let settled = false;

    const finish = (outcome: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      socket.destroy();
      outcome();
    };

    socket.setEncoding('utf8');

    socket.once('connect', () => {
      socket.write(encodeFrame(request));
    });

    socket.on('data', (chunk: string) => {
      buffer += chunk;
      const end = buffer.indexOf(FRAME_DELIMITER);
      if (end === -1) {
        return;
      }

      const line = buffer.slice(0, end);
      finish(() => {
        try {
          resolve(decodeFrame(line, responseSchema));
        } catch (error) {
          reject(new ServiceClientError(
            `Undecodable response from ${serviceName}: ${error instanceof Error ? error.message : String(error)}`,
            serviceName,
            ErrorCode.UNEXPECTED_RESPONSE,
            error instanceof Error ? error : undefined
          ));
        }
      });
    });

    socket.on('error', (error) => {
      finish(() => reject(new ServiceClientError(
        `Request to ${serviceName} at ${formatAddress(address)} failed: ${error.message}`,
        serviceName,
        ErrorCode.SERVICE_UNAVAILABLE,
        error
      )));
    });

    socket.once('close', () => {
      finish(() => reject(new ServiceClientError(
        `${serviceName} closed the connection before responding`,
        serviceName,
        ErrorCode.SERVICE_UNAVAILABLE
      )));
    });
  });
}
