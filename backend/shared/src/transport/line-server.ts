/**
 * Accept loop shared by every service.
 *
 * Each accepted socket gets its own async task. Lines on one socket are
 * answered strictly in order: the next line is not handled until the
 * response to the current one has been written.
 */

import net from 'net';
import { v4 as uuidv4 } from 'uuid';
import { BaseError, toErrorFrame } from '../errors';
import { ErrorFrame } from '../protocol/types';
import { TaggedUnionSchema } from '../protocol/schema';
import { ServiceAddress } from '../config/address';
import { Logger, createConnectionLogger } from '../utils/logger';
import { decodeFrame, encodeFrame, readLines } from './frame-codec';

export interface RequestContext {
  connectionId: string;
  logger: Logger;
}

export type RequestHandler<TRequest, TResponse> = (
  request: TRequest,
  ctx: RequestContext
) => Promise<TResponse>;

export interface LineServerOptions<TRequest extends { type: string }, TResponse extends { type: string }> {
  serviceName: string;
  logger: Logger;
  requestSchema: TaggedUnionSchema<TRequest>;
  handler: RequestHandler<TRequest, TResponse>;
}

export class LineServer<TRequest extends { type: string }, TResponse extends { type: string }> {
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();

  constructor(private readonly options: LineServerOptions<TRequest, TResponse>) {
    this.server = net.createServer({ allowHalfOpen: true }, (socket) => {
      this.sockets.add(socket);
      socket.once('close', () => this.sockets.delete(socket));
      this.serveConnection(socket).catch((error: unknown) => {
        this.options.logger.error({ err: error }, 'Connection task failed');
        socket.destroy();
      });
    });
  }

  listen(address: ServiceAddress): Promise<ServiceAddress> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once('error', onError);
      this.server.listen(address.port, address.host, () => {
        this.server.off('error', onError);
        const bound = this.server.address();
        const port = bound !== null && typeof bound === 'object' ? bound.port : address.port;
        this.options.logger.info({ host: address.host, port }, `${this.options.serviceName} listening`);
        resolve({ host: address.host, port });
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      for (const socket of this.sockets) {
        socket.destroy();
      }
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private async serveConnection(socket: net.Socket): Promise<void> {
    const connectionId = uuidv4();
    const log = createConnectionLogger(this.options.logger, {
      connectionId,
      remoteAddress: socket.remoteAddress,
      remotePort: socket.remotePort,
    });
    const ctx: RequestContext = { connectionId, logger: log };

    socket.on('error', (error) => {
      log.warn({ err: error }, 'Socket error');
    });

    socket.setEncoding('utf8');
    log.debug('Connection accepted');

    try {
      for await (const line of readLines(socket)) {
        const response = await this.respond(line, ctx);
        await writeFrame(socket, response);
      }
      // Half-open: the peer finished sending, our replies are flushed, now close our side.
      socket.end();
      log.debug('Connection closed by peer');
    } catch (error) {
      log.warn({ err: error }, 'Dropping connection');
      socket.destroy();
    }
  }

  private async respond(line: string, ctx: RequestContext): Promise<TResponse | ErrorFrame> {
    let request: TRequest;
    try {
      request = decodeFrame(line, this.options.requestSchema);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      ctx.logger.debug({ detail }, 'Rejected undecodable frame');
      return { type: 'Error', message: `Invalid request: ${detail}` };
    }

    try {
      return await this.options.handler(request, ctx);
    } catch (error) {
      if (!(error instanceof BaseError) || !error.isOperational) {
        ctx.logger.error({ err: error, requestType: request.type }, 'Handler failed');
      }
      return toErrorFrame(error, 'Internal error');
    }
  }
}

function writeFrame(socket: net.Socket, frame: { type: string }): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(encodeFrame(frame), (error) => (error ? reject(error) : resolve()));
  });
}
