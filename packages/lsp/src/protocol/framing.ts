import { DecodeError } from './errors.js';
import { serializeMessage, type JsonRpcMessage } from './messages.js';

/**
 * `content-length` is the LSP base protocol (headers, blank line, body);
 * `newline` carries one JSON document per line.
 */
export type Framing = 'content-length' | 'newline';

export interface FrameDecoder {
  /** Appends raw bytes and returns every complete message body. */
  push(chunk: Buffer | string): string[];
  /** True when bytes of an unfinished frame are buffered. */
  hasPartialFrame(): boolean;
}

const HEADER_SEPARATOR = Buffer.from('\r\n\r\n', 'ascii');
const NEWLINE = 0x0a;
const MAX_HEADER_BYTES = 8 * 1024;
const SUPPORTED_CHARSETS = new Set(['utf-8', 'utf8']);

const toBuffer = (chunk: Buffer | string): Buffer =>
  typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;

export function encodeFrame(message: JsonRpcMessage, framing: Framing): Buffer {
  const body = serializeMessage(message);
  if (framing === 'newline') {
    return Buffer.from(`${body}\n`, 'utf8');
  }

  const bodyBytes = Buffer.from(body, 'utf8');
  const header = Buffer.from(
    `Content-Length: ${bodyBytes.byteLength}\r\n\r\n`,
    'ascii',
  );
  return Buffer.concat([header, bodyBytes]);
}

export class ContentLengthDecoder implements FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer | string): string[] {
    this.buffer =
      this.buffer.length === 0
        ? toBuffer(chunk)
        : Buffer.concat([this.buffer, toBuffer(chunk)]);

    const bodies: string[] = [];
    while (true) {
      const headerEnd = this.buffer.indexOf(HEADER_SEPARATOR);
      if (headerEnd < 0) {
        if (this.buffer.length > MAX_HEADER_BYTES) {
          throw new DecodeError(
            'framing',
            `No header terminator within ${MAX_HEADER_BYTES} bytes`,
          );
        }
        return bodies;
      }

      const contentLength = parseHeaders(
        this.buffer.subarray(0, headerEnd).toString('ascii'),
      );
      const start = headerEnd + HEADER_SEPARATOR.length;
      const end = start + contentLength;
      if (this.buffer.length < end) {
        return bodies;
      }

      bodies.push(this.buffer.subarray(start, end).toString('utf8'));
      this.buffer = this.buffer.subarray(end);
    }
  }

  hasPartialFrame(): boolean {
    return this.buffer.length > 0;
  }
}

function parseHeaders(block: string): number {
  let contentLength: number | undefined;

  for (const line of block.split('\r\n')) {
    const separator = line.indexOf(':');
    if (separator <= 0) {
      throw new DecodeError('framing', `Malformed header line: ${line}`);
    }

    const name = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (name === 'content-length') {
      if (!/^\d+$/u.test(value)) {
        throw new DecodeError('framing', `Invalid Content-Length: ${value}`);
      }
      contentLength = Number.parseInt(value, 10);
    } else if (name === 'content-type') {
      const charset = /charset=([^;]+)/iu.exec(value)?.[1];
      const normalized = charset?.trim().replace(/^"|"$/gu, '').toLowerCase();
      if (normalized !== undefined && !SUPPORTED_CHARSETS.has(normalized)) {
        throw new DecodeError('framing', `Unsupported charset: ${charset}`);
      }
    }
  }

  if (contentLength === undefined) {
    throw new DecodeError('framing', 'Missing Content-Length header');
  }
  return contentLength;
}

export class NewlineDecoder implements FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer | string): string[] {
    this.buffer =
      this.buffer.length === 0
        ? toBuffer(chunk)
        : Buffer.concat([this.buffer, toBuffer(chunk)]);

    const lines: string[] = [];
    while (true) {
      const newlineIndex = this.buffer.indexOf(NEWLINE);
      if (newlineIndex < 0) {
        return lines;
      }

      const line = this.buffer.subarray(0, newlineIndex).toString('utf8').trim();
      this.buffer = this.buffer.subarray(newlineIndex + 1);
      if (line.length > 0) {
        lines.push(line);
      }
    }
  }

  hasPartialFrame(): boolean {
    return this.buffer.toString('utf8').trim().length > 0;
  }
}

export function createFrameDecoder(framing: Framing): FrameDecoder {
  return framing === 'newline'
    ? new NewlineDecoder()
    : new ContentLengthDecoder();
}
