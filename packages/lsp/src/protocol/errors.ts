export const ErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  ConnectionClosed: -32000,
  RequestTimeout: -32001,
  ServerNotInitialized: -32002,
  RequestCancelled: -32800,
} as const;

export const SERVER_ERROR_RANGE = { min: -32099, max: -32000 } as const;

/**
 * Codes in the reserved -32099..-32000 band carry implementation-defined
 * server errors.
 */
export const isServerErrorCode = (code: number): boolean =>
  code >= SERVER_ERROR_RANGE.min && code <= SERVER_ERROR_RANGE.max;

export class ProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type DecodeErrorKind = 'parse' | 'invalid-message' | 'framing';

export class DecodeError extends ProtocolError {
  constructor(
    readonly kind: DecodeErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type TransportErrorKind =
  | 'spawn'
  | 'exited'
  | 'closed'
  | 'write'
  | 'framing';

export class TransportError extends ProtocolError {
  constructor(
    readonly kind: TransportErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class RpcError extends ProtocolError {
  constructor(
    readonly code: number,
    message: string,
    readonly data?: unknown,
  ) {
    super(message);
  }
}

export class RequestTimeoutError extends RpcError {
  constructor(
    readonly method: string,
    readonly timeoutMs: number,
  ) {
    super(
      ErrorCodes.RequestTimeout,
      `Request '${method}' timed out after ${timeoutMs}ms`,
    );
  }
}

export class ConnectionClosedError extends RpcError {
  constructor(reason: string) {
    super(ErrorCodes.ConnectionClosed, reason);
  }
}

export class RequestCancelledError extends RpcError {
  constructor(readonly method: string) {
    super(ErrorCodes.RequestCancelled, `Request '${method}' was cancelled`);
  }
}

export class NotReadyError extends ProtocolError {
  constructor(
    readonly state: string,
    message: string,
  ) {
    super(message);
  }
}

export class DocumentNotOpenError extends ProtocolError {
  constructor(readonly uri: string) {
    super(`Document is not open: ${uri}`);
  }
}

export class DocumentAlreadyOpenError extends ProtocolError {
  constructor(readonly uri: string) {
    super(`Document is already open: ${uri}`);
  }
}

export class UnknownToolError extends ProtocolError {
  constructor(readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
  }
}

export class UnknownMethodError extends ProtocolError {
  constructor(readonly method: string) {
    super(`Method not found: ${method}`);
  }
}

export class InvalidParamsError extends ProtocolError {}

export class UnsupportedLanguageError extends ProtocolError {
  constructor(readonly language: string) {
    super(`Language not supported: ${language}`);
  }
}

export class ConfigError extends ProtocolError {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
