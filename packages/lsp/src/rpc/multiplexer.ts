import { DebugLogger } from '@symbolgate/core';

import {
  ConnectionClosedError,
  DecodeError,
  ErrorCodes,
  InvalidParamsError,
  NotReadyError,
  RequestCancelledError,
  RequestTimeoutError,
  RpcError,
  TransportError,
  UnknownMethodError,
  UnknownToolError,
  errorMessage,
} from '../protocol/errors.js';
import {
  createErrorResponse,
  createNotification,
  createRequest,
  createSuccessResponse,
  isErrorResponse,
  isNotification,
  isRequest,
  type JsonRpcErrorObject,
  type JsonRpcId,
  type JsonRpcMessage,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from '../protocol/messages.js';
import type { MessageTransport, Unsubscribe } from '../transport/transport.js';

export interface CallOptions {
  /** Overrides the multiplexer's default deadline; 0 disables it. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface InboundRequestContext {
  id: JsonRpcId;
  method: string;
}

export type RequestHandler = (
  params: unknown,
  context: InboundRequestContext,
) => unknown;

export type FallbackRequestHandler = (
  method: string,
  params: unknown,
  context: InboundRequestContext,
) => unknown;

export type NotificationListener = (method: string, params: unknown) => void;

export interface MultiplexerOptions {
  label?: string;
  /** Deadline for calls that do not pass one; omit for none. */
  defaultTimeoutMs?: number;
  /**
   * `sequential` answers one inbound request at a time in arrival order;
   * `concurrent` dispatches each as soon as it arrives.
   */
  inbound?: 'sequential' | 'concurrent';
  /**
   * `reply` answers undecodable input with an `id: null` error and keeps
   * going; `close` stops the transport.
   */
  malformed?: 'reply' | 'close';
  /** Notification sent with `{ id }` when a call times out or is aborted. */
  cancelMethod?: string;
  logger?: DebugLogger;
}

interface PendingCall {
  id: number;
  method: string;
  submittedAt: number;
  deadline: number | undefined;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | undefined;
  detachSignal: () => void;
}

/**
 * Maps a handler failure onto the JSON-RPC error object sent back to the
 * peer.
 */
export function toErrorObject(error: unknown): JsonRpcErrorObject {
  if (error instanceof RpcError) {
    return error.data === undefined
      ? { code: error.code, message: error.message }
      : { code: error.code, message: error.message, data: error.data };
  }
  if (error instanceof UnknownMethodError) {
    return { code: ErrorCodes.MethodNotFound, message: error.message };
  }
  if (error instanceof InvalidParamsError || error instanceof UnknownToolError) {
    return { code: ErrorCodes.InvalidParams, message: error.message };
  }
  if (error instanceof NotReadyError) {
    return { code: ErrorCodes.ServerNotInitialized, message: error.message };
  }
  return { code: ErrorCodes.InternalError, message: errorMessage(error) };
}

/**
 * Correlates requests and responses over one transport and routes inbound
 * requests and notifications. Used in both directions: as the LSP client
 * towards a language server and as the gateway's server side.
 */
export class RequestMultiplexer {
  private nextId = 1;
  private readonly pending = new Map<number, PendingCall>();
  private readonly handlers = new Map<string, RequestHandler>();
  private fallbackHandler: FallbackRequestHandler | undefined;
  private readonly notificationListeners = new Set<NotificationListener>();
  private inboundChain: Promise<void> = Promise.resolve();
  private readonly subscriptions: Unsubscribe[] = [];
  private readonly logger: DebugLogger;
  private readonly label: string;

  constructor(
    private readonly transport: MessageTransport,
    private readonly options: MultiplexerOptions = {},
  ) {
    this.label = options.label ?? transport.label;
    this.logger = options.logger ?? DebugLogger.getLogger('symbolgate:lsp:rpc');
    this.subscriptions.push(
      transport.onMessage((message) => this.handleMessage(message)),
      transport.onDecodeError((error) => this.handleDecodeError(error)),
      transport.onClose((reason) => this.failAll(reason)),
    );
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get closed(): boolean {
    return this.transport.closed;
  }

  call(
    method: string,
    params?: unknown,
    options: CallOptions = {},
  ): Promise<unknown> {
    if (this.transport.closed) {
      return Promise.reject(
        new ConnectionClosedError(
          `Cannot call '${method}': connection '${this.label}' is closed`,
        ),
      );
    }
    if (options.signal?.aborted) {
      return Promise.reject(new RequestCancelledError(method));
    }

    const id = this.nextId++;
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    const submittedAt = Date.now();

    return new Promise<unknown>((resolve, reject) => {
      const signal = options.signal;
      const onAbort = (): void => {
        if (this.take(id)) {
          this.sendCancel(id);
          reject(new RequestCancelledError(method));
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const call: PendingCall = {
        id,
        method,
        submittedAt,
        deadline:
          timeoutMs !== undefined && timeoutMs > 0
            ? submittedAt + timeoutMs
            : undefined,
        resolve,
        reject,
        timer: undefined,
        detachSignal: () => signal?.removeEventListener('abort', onAbort),
      };

      if (timeoutMs !== undefined && timeoutMs > 0) {
        call.timer = setTimeout(() => {
          if (this.take(id)) {
            this.logger.warn(
              `${this.label}: '${method}' (id ${id}) timed out after ${timeoutMs}ms`,
            );
            this.sendCancel(id);
            reject(new RequestTimeoutError(method, timeoutMs));
          }
        }, timeoutMs);
      }

      this.pending.set(id, call);
      this.logger.debug(() => `${this.label}: --> ${method} (id ${id})`);

      const failSend = (error: unknown): void => {
        const entry = this.take(id);
        if (!entry) {
          return;
        }
        entry.reject(
          error instanceof TransportError
            ? new ConnectionClosedError(error.message)
            : new ConnectionClosedError(
                `Failed to send '${method}': ${errorMessage(error)}`,
              ),
        );
      };

      // A transport may throw while encoding, e.g. on a BigInt param.
      try {
        this.transport.send(createRequest(id, method, params)).catch(failSend);
      } catch (error) {
        failSend(error);
      }
    });
  }

  /** Fire-and-forget; a failed write is logged, never thrown. */
  notify(method: string, params?: unknown): void {
    if (this.transport.closed) {
      this.logger.debug(
        () => `${this.label}: dropping notification '${method}' on closed connection`,
      );
      return;
    }
    this.logger.debug(() => `${this.label}: --> ${method} (notification)`);
    this.transport
      .send(createNotification(method, params))
      .catch((error: unknown) => {
        this.logger.warn(
          `${this.label}: failed to send '${method}': ${errorMessage(error)}`,
        );
      });
  }

  onRequest(method: string, handler: RequestHandler): Unsubscribe {
    this.handlers.set(method, handler);
    return () => {
      if (this.handlers.get(method) === handler) {
        this.handlers.delete(method);
      }
    };
  }

  /** Receives every inbound request without a dedicated handler. */
  setFallbackHandler(handler: FallbackRequestHandler | undefined): void {
    this.fallbackHandler = handler;
  }

  onNotification(listener: NotificationListener): Unsubscribe {
    this.notificationListeners.add(listener);
    return () => {
      this.notificationListeners.delete(listener);
    };
  }

  /** Stops the transport; pending calls fail with ConnectionClosedError. */
  async close(): Promise<void> {
    await this.transport.stop();
    this.failAll(
      new TransportError('closed', `Connection '${this.label}' was closed`),
    );
  }

  /** Resolves once every queued sequential inbound request is answered. */
  async drain(): Promise<void> {
    await this.inboundChain;
  }

  private handleMessage(message: JsonRpcMessage): void {
    if (isRequest(message)) {
      this.logger.debug(
        () => `${this.label}: <-- ${message.method} (id ${String(message.id)})`,
      );
      if (this.options.inbound === 'concurrent') {
        void this.dispatch(message);
      } else {
        this.inboundChain = this.inboundChain.then(() =>
          this.dispatch(message),
        );
      }
      return;
    }

    if (isNotification(message)) {
      this.logger.debug(() => `${this.label}: <-- ${message.method}`);
      for (const listener of [...this.notificationListeners]) {
        try {
          listener(message.method, message.params);
        } catch (error) {
          this.logger.error(
            `${this.label}: notification listener for '${message.method}' failed: ${errorMessage(error)}`,
          );
        }
      }
      return;
    }

    this.handleResponse(message);
  }

  private handleResponse(response: JsonRpcResponse): void {
    const id = response.id;
    const entry = typeof id === 'number' ? this.take(id) : undefined;
    if (!entry) {
      this.logger.warn(
        `${this.label}: dropping response for unknown or settled id ${String(id)}`,
      );
      return;
    }

    this.logger.debug(
      () =>
        `${this.label}: <-- ${entry.method} (id ${entry.id}) in ${Date.now() - entry.submittedAt}ms`,
    );
    if (isErrorResponse(response)) {
      entry.reject(
        new RpcError(
          response.error.code,
          response.error.message,
          response.error.data,
        ),
      );
      return;
    }
    entry.resolve(response.result);
  }

  private handleDecodeError(error: DecodeError): void {
    if (this.options.malformed === 'reply') {
      const code =
        error.kind === 'parse' ? ErrorCodes.ParseError : ErrorCodes.InvalidRequest;
      this.reply(createErrorResponse(null, { code, message: error.message }));
      return;
    }

    this.logger.error(
      `${this.label}: closing after undecodable message: ${error.message}`,
    );
    this.transport.stop().catch((stopError: unknown) => {
      this.logger.warn(
        `${this.label}: failed to stop transport: ${errorMessage(stopError)}`,
      );
    });
  }

  private async dispatch(request: JsonRpcRequest): Promise<void> {
    const context: InboundRequestContext = {
      id: request.id,
      method: request.method,
    };
    let response: JsonRpcResponse;
    try {
      const result = await this.invoke(request, context);
      response = createSuccessResponse(request.id, result);
    } catch (error) {
      this.logger.debug(
        () => `${this.label}: '${request.method}' failed: ${errorMessage(error)}`,
      );
      response = createErrorResponse(request.id, toErrorObject(error));
    }
    this.reply(response);
  }

  private async invoke(
    request: JsonRpcRequest,
    context: InboundRequestContext,
  ): Promise<unknown> {
    const handler = this.handlers.get(request.method);
    if (handler) {
      return await handler(request.params, context);
    }
    if (this.fallbackHandler) {
      return await this.fallbackHandler(request.method, request.params, context);
    }
    throw new UnknownMethodError(request.method);
  }

  private reply(response: JsonRpcResponse): void {
    if (this.transport.closed) {
      this.logger.debug(
        () => `${this.label}: connection closed, dropping reply to ${String(response.id)}`,
      );
      return;
    }
    this.transport.send(response).catch((error: unknown) => {
      this.logger.warn(
        `${this.label}: failed to reply to ${String(response.id)}: ${errorMessage(error)}`,
      );
    });
  }

  private sendCancel(id: number): void {
    if (this.options.cancelMethod) {
      this.notify(this.options.cancelMethod, { id });
    }
  }

  /** Removes a pending call; only the first taker may settle it. */
  private take(id: number): PendingCall | undefined {
    const entry = this.pending.get(id);
    if (!entry) {
      return undefined;
    }
    this.pending.delete(id);
    clearTimeout(entry.timer);
    entry.detachSignal();
    return entry;
  }

  private failAll(reason: TransportError): void {
    for (const id of [...this.pending.keys()]) {
      const entry = this.take(id);
      entry?.reject(new ConnectionClosedError(reason.message));
    }
    if (this.transport.closed) {
      for (const unsubscribe of this.subscriptions.splice(0)) {
        unsubscribe();
      }
    }
  }
}
