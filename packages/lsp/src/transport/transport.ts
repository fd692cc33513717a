import { EventEmitter } from 'node:events';

import type { DecodeError, TransportError } from '../protocol/errors.js';
import type { JsonRpcMessage } from '../protocol/messages.js';

export type Unsubscribe = () => void;

/**
 * A bidirectional, message-oriented channel. Implementations own the
 * underlying stream or socket and run their own read loop; `send` may be
 * called concurrently and never interleaves two messages.
 */
export interface MessageTransport {
  readonly label: string;
  readonly closed: boolean;
  start(): Promise<void>;
  send(message: JsonRpcMessage): Promise<void>;
  stop(): Promise<void>;
  /** Tears the channel down synchronously, e.g. from a process exit hook. */
  dispose(): void;
  onMessage(handler: (message: JsonRpcMessage) => void): Unsubscribe;
  onDecodeError(handler: (error: DecodeError) => void): Unsubscribe;
  onClose(handler: (reason: TransportError) => void): Unsubscribe;
}

const MESSAGE = 'message';
const DECODE_ERROR = 'decode-error';
const CLOSE = 'close';

export abstract class BaseTransport implements MessageTransport {
  private readonly events = new EventEmitter();
  private closeReason: TransportError | null = null;

  protected constructor(readonly label: string) {
    this.events.setMaxListeners(0);
  }

  get closed(): boolean {
    return this.closeReason !== null;
  }

  abstract start(): Promise<void>;
  abstract send(message: JsonRpcMessage): Promise<void>;
  abstract stop(): Promise<void>;
  abstract dispose(): void;

  onMessage(handler: (message: JsonRpcMessage) => void): Unsubscribe {
    return this.subscribe(MESSAGE, handler);
  }

  onDecodeError(handler: (error: DecodeError) => void): Unsubscribe {
    return this.subscribe(DECODE_ERROR, handler);
  }

  /**
   * Handlers registered after the transport closed are called immediately.
   */
  onClose(handler: (reason: TransportError) => void): Unsubscribe {
    if (this.closeReason) {
      handler(this.closeReason);
      return () => undefined;
    }
    return this.subscribe(CLOSE, handler);
  }

  protected emitMessage(message: JsonRpcMessage): void {
    this.events.emit(MESSAGE, message);
  }

  protected emitDecodeError(error: DecodeError): void {
    this.events.emit(DECODE_ERROR, error);
  }

  /** Marks the transport closed; only the first reason is reported. */
  protected markClosed(reason: TransportError): void {
    if (this.closeReason) {
      return;
    }
    this.closeReason = reason;
    this.events.emit(CLOSE, reason);
    this.events.removeAllListeners();
  }

  private subscribe<T>(event: string, handler: (value: T) => void): Unsubscribe {
    this.events.on(event, handler);
    return () => {
      this.events.off(event, handler);
    };
  }
}
