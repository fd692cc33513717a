import WebSocket from 'ws';

import { DebugLogger } from '@symbolgate/core';

import { DecodeError, TransportError } from '../protocol/errors.js';
import {
  parseMessage,
  serializeMessage,
  type JsonRpcMessage,
} from '../protocol/messages.js';
import { BaseTransport } from './transport.js';

const rawDataToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
};

/**
 * One JSON-RPC message per WebSocket text frame.
 */
export class WebSocketTransport extends BaseTransport {
  private readonly logger: DebugLogger;
  private started = false;

  constructor(
    private readonly socket: WebSocket,
    options: { label?: string; logger?: DebugLogger } = {},
  ) {
    super(options.label ?? 'websocket');
    this.logger =
      options.logger ?? DebugLogger.getLogger('symbolgate:lsp:transport');
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    if (this.socket.readyState !== WebSocket.OPEN) {
      const failure = new TransportError(
        'closed',
        `WebSocket '${this.label}' is not open`,
      );
      this.markClosed(failure);
      throw failure;
    }

    this.socket.on('message', (data: WebSocket.RawData) => {
      let message: JsonRpcMessage;
      try {
        message = parseMessage(rawDataToString(data));
      } catch (error) {
        if (error instanceof DecodeError) {
          this.logger.warn(`${this.label}: ${error.message}`);
          this.emitDecodeError(error);
          return;
        }
        throw error;
      }
      this.emitMessage(message);
    });
    this.socket.on('close', (code: number) => {
      this.markClosed(
        new TransportError(
          'closed',
          `WebSocket '${this.label}' closed with code ${code}`,
        ),
      );
    });
    this.socket.on('error', (error: Error) => {
      this.logger.warn(`${this.label}: socket error: ${error.message}`);
      this.markClosed(
        new TransportError('closed', `WebSocket '${this.label}' failed`, {
          cause: error,
        }),
      );
    });
  }

  send(message: JsonRpcMessage): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.closed || this.socket.readyState !== WebSocket.OPEN) {
        reject(
          new TransportError(
            'closed',
            `Cannot write to closed WebSocket '${this.label}'`,
          ),
        );
        return;
      }
      this.socket.send(serializeMessage(message), (error?: Error) => {
        if (error) {
          reject(
            new TransportError(
              'write',
              `WebSocket '${this.label}' write failed: ${error.message}`,
              { cause: error },
            ),
          );
          return;
        }
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (
      this.socket.readyState === WebSocket.OPEN ||
      this.socket.readyState === WebSocket.CONNECTING
    ) {
      this.socket.close(1000, 'shutdown');
    }
    this.markClosed(
      new TransportError('closed', `WebSocket '${this.label}' was stopped`),
    );
  }

  dispose(): void {
    this.socket.terminate();
    this.markClosed(
      new TransportError('closed', `WebSocket '${this.label}' was disposed`),
    );
  }
}
