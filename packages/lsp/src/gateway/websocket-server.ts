import type { IncomingMessage } from 'node:http';

import { WebSocketServer, type WebSocket } from 'ws';

import { DebugLogger } from '@symbolgate/core';

import { errorMessage } from '../protocol/errors.js';
import { WebSocketTransport } from '../transport/websocket-transport.js';
import type { ProtocolGateway } from './gateway.js';

export interface WebSocketServerOptions {
  host?: string;
  /** 0 picks a free port. */
  port?: number;
  path?: string;
  logger?: DebugLogger;
}

export interface WebSocketServerHandle {
  host: string;
  port: number;
  path: string;
  url: string;
  connectionCount(): number;
  close(): Promise<void>;
}

export const DEFAULT_WEBSOCKET_HOST = 'localhost';
export const DEFAULT_WEBSOCKET_PORT = 3000;
export const DEFAULT_WEBSOCKET_PATH = '/mcp';

/**
 * Accepts clients on one route; each connection gets its own transport and
 * its requests are dispatched concurrently. Upgrades on other paths are
 * refused.
 */
export async function startWebSocketServer(
  gateway: ProtocolGateway,
  options: WebSocketServerOptions = {},
): Promise<WebSocketServerHandle> {
  const host = options.host ?? DEFAULT_WEBSOCKET_HOST;
  const path = options.path ?? DEFAULT_WEBSOCKET_PATH;
  const logger = options.logger ?? DebugLogger.getLogger('symbolgate:gateway');

  const server = new WebSocketServer({
    host,
    port: options.port ?? DEFAULT_WEBSOCKET_PORT,
    path,
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = (): void => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
  });

  server.on('error', (error: Error) => {
    logger.error(`WebSocket server error: ${error.message}`);
  });

  let nextConnection = 1;
  server.on('connection', (socket: WebSocket, request: IncomingMessage) => {
    const label = `ws#${nextConnection++}(${request.socket.remoteAddress ?? 'unknown'})`;
    const transport = new WebSocketTransport(socket, { label, logger });
    gateway.attach(transport, { label, inbound: 'concurrent' });
    transport.start().then(
      () => logger.debug(() => `${label}: connected`),
      (error: unknown) =>
        logger.warn(`${label}: failed to start: ${errorMessage(error)}`),
    );
  });

  const address = server.address();
  const port =
    typeof address === 'object' && address !== null
      ? address.port
      : (options.port ?? DEFAULT_WEBSOCKET_PORT);
  logger.log(`listening on ws://${host}:${port}${path}`);

  return {
    host,
    port,
    path,
    url: `ws://${host}:${port}${path}`,
    connectionCount: () => server.clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of server.clients) {
          client.terminate();
        }
        server.close((error?: Error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }),
  };
}
