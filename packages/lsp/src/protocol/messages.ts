import { DecodeError } from './errors.js';

export type JsonRpcId = string | number;

export type JsonRpcRequest = {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
};

export type JsonRpcNotification = {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
};

export type JsonRpcErrorObject = {
  code: number;
  message: string;
  data?: unknown;
};

export type JsonRpcSuccessResponse = {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
};

/**
 * `id` is only `null` when replying to a message whose id could not be read.
 */
export type JsonRpcErrorResponse = {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
};

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type JsonRpcMessage =
  | JsonRpcRequest
  | JsonRpcNotification
  | JsonRpcResponse;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isId = (value: unknown): value is JsonRpcId =>
  typeof value === 'string' ||
  (typeof value === 'number' && Number.isFinite(value));

export const isRequest = (
  message: JsonRpcMessage,
): message is JsonRpcRequest => 'method' in message && 'id' in message;

export const isNotification = (
  message: JsonRpcMessage,
): message is JsonRpcNotification => 'method' in message && !('id' in message);

export const isResponse = (
  message: JsonRpcMessage,
): message is JsonRpcResponse => !('method' in message);

export const isErrorResponse = (
  message: JsonRpcResponse,
): message is JsonRpcErrorResponse => 'error' in message;

export const createRequest = (
  id: JsonRpcId,
  method: string,
  params?: unknown,
): JsonRpcRequest =>
  params === undefined
    ? { jsonrpc: '2.0', id, method }
    : { jsonrpc: '2.0', id, method, params };

export const createNotification = (
  method: string,
  params?: unknown,
): JsonRpcNotification =>
  params === undefined
    ? { jsonrpc: '2.0', method }
    : { jsonrpc: '2.0', method, params };

export const createSuccessResponse = (
  id: JsonRpcId,
  result: unknown,
): JsonRpcSuccessResponse => ({
  jsonrpc: '2.0',
  id,
  // An absent result would vanish from the JSON and break classification.
  result: result === undefined ? null : result,
});

export const createErrorResponse = (
  id: JsonRpcId | null,
  error: JsonRpcErrorObject,
): JsonRpcErrorResponse => ({
  jsonrpc: '2.0',
  id,
  error:
    error.data === undefined
      ? { code: error.code, message: error.message }
      : { code: error.code, message: error.message, data: error.data },
});

const parseErrorObject = (value: unknown): JsonRpcErrorObject => {
  if (
    !isRecord(value) ||
    typeof value.code !== 'number' ||
    typeof value.message !== 'string'
  ) {
    throw new DecodeError(
      'invalid-message',
      'Response error must have a numeric code and a string message',
    );
  }
  return 'data' in value
    ? { code: value.code, message: value.message, data: value.data }
    : { code: value.code, message: value.message };
};

/**
 * Classifies an already-parsed JSON value as a request, response or
 * notification.
 */
export function toMessage(value: unknown): JsonRpcMessage {
  if (!isRecord(value)) {
    throw new DecodeError(
      'invalid-message',
      Array.isArray(value)
        ? 'Batch messages are not supported'
        : 'JSON-RPC message must be an object',
    );
  }

  if (value.jsonrpc !== undefined && value.jsonrpc !== '2.0') {
    throw new DecodeError(
      'invalid-message',
      `Unsupported JSON-RPC version: ${String(value.jsonrpc)}`,
    );
  }

  const hasId = 'id' in value;
  const hasMethod = 'method' in value;

  if (hasMethod && typeof value.method !== 'string') {
    throw new DecodeError('invalid-message', 'Method must be a string');
  }

  if (hasId && hasMethod) {
    const id = value.id;
    if (!isId(id)) {
      throw new DecodeError(
        'invalid-message',
        'Request id must be a string or a number',
      );
    }
    return createRequest(id, String(value.method), value.params);
  }

  if (hasId && ('result' in value || 'error' in value)) {
    const id = value.id;
    if ('error' in value) {
      if (id === null || isId(id)) {
        return createErrorResponse(id, parseErrorObject(value.error));
      }
      throw new DecodeError(
        'invalid-message',
        'Response id must be a string, a number or null',
      );
    }
    if (!isId(id)) {
      throw new DecodeError(
        'invalid-message',
        'Response id must be a string or a number',
      );
    }
    return createSuccessResponse(id, value.result);
  }

  if (hasMethod) {
    return createNotification(String(value.method), value.params);
  }

  throw new DecodeError(
    'invalid-message',
    'Message is neither a request, a response nor a notification',
  );
}

export function parseMessage(text: string): JsonRpcMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text) as unknown;
  } catch (error) {
    throw new DecodeError('parse', 'Invalid JSON-RPC payload', {
      cause: error,
    });
  }
  return toMessage(parsed);
}

export function serializeMessage(message: JsonRpcMessage): string {
  return JSON.stringify(message);
}
