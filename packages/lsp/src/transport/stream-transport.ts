import type { Readable, Writable } from 'node:stream';

import { DebugLogger } from '@symbolgate/core';

import {
  DecodeError,
  TransportError,
  errorMessage,
} from '../protocol/errors.js';
import {
  createFrameDecoder,
  encodeFrame,
  type FrameDecoder,
  type Framing,
} from '../protocol/framing.js';
import { parseMessage, type JsonRpcMessage } from '../protocol/messages.js';
import { BaseTransport } from './transport.js';

type Listener = Parameters<Readable['off']>[1];

export interface StreamTransportOptions {
  framing: Framing;
  label?: string;
  /** End the output stream on stop; false for the host's own stdout. */
  endOutputOnStop?: boolean;
  logger?: DebugLogger;
}

/**
 * Carries framed JSON-RPC messages over a readable/writable stream pair.
 */
export class StreamTransport extends BaseTransport {
  private readonly decoder: FrameDecoder;
  private readonly logger: DebugLogger;
  private writeChain: Promise<void> = Promise.resolve();
  private started = false;
  private readonly detachers: Array<() => void> = [];

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    private readonly options: StreamTransportOptions,
  ) {
    super(options.label ?? `stream:${options.framing}`);
    this.decoder = createFrameDecoder(options.framing);
    this.logger =
      options.logger ?? DebugLogger.getLogger('symbolgate:lsp:transport');
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    if (this.closed) {
      throw new TransportError('closed', `Transport '${this.label}' is closed`);
    }
    this.started = true;

    this.track(this.input, 'data', (chunk: Buffer | string) =>
      this.onData(chunk),
    );
    this.track(this.input, 'end', () => this.onEnd());
    this.track(this.input, 'close', () => this.onEnd());
    // Error listeners outlive close; late EPIPEs from a dead peer must stay handled.
    this.input.on('error', (error: Error) =>
      this.close(
        new TransportError(
          'closed',
          `Transport '${this.label}' read failed: ${error.message}`,
          { cause: error },
        ),
      ),
    );
    this.output.on('error', (error: Error) =>
      this.close(
        new TransportError(
          'write',
          `Transport '${this.label}' write failed: ${error.message}`,
          { cause: error },
        ),
      ),
    );
  }

  send(message: JsonRpcMessage): Promise<void> {
    let frame: Buffer;
    try {
      frame = encodeFrame(message, this.options.framing);
    } catch (error) {
      return Promise.reject(error);
    }
    const write = this.writeChain.then(() => this.writeFrame(frame));
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  async stop(): Promise<void> {
    if (this.closed) {
      return;
    }
    await this.writeChain;
    if (this.options.endOutputOnStop !== false) {
      this.output.end();
    }
    this.close(
      new TransportError('closed', `Transport '${this.label}' was stopped`),
    );
  }

  dispose(): void {
    this.close(
      new TransportError('closed', `Transport '${this.label}' was disposed`),
    );
  }

  /**
   * Closes with the given reason without touching the output stream; used by
   * owners that learn about the peer's death first (e.g. process exit).
   */
  close(reason: TransportError): void {
    if (this.closed) {
      return;
    }
    for (const detach of this.detachers.splice(0)) {
      detach();
    }
    this.logger.debug(() => `${this.label}: closed (${reason.message})`);
    this.markClosed(reason);
  }

  private writeFrame(frame: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.closed || !this.output.writable) {
        reject(
          new TransportError(
            'closed',
            `Cannot write to closed transport '${this.label}'`,
          ),
        );
        return;
      }
      this.output.write(frame, (error?: Error | null) => {
        if (error) {
          reject(
            new TransportError(
              'write',
              `Transport '${this.label}' write failed: ${error.message}`,
              { cause: error },
            ),
          );
          return;
        }
        resolve();
      });
    });
  }

  private onData(chunk: Buffer | string): void {
    let bodies: string[];
    try {
      bodies = this.decoder.push(chunk);
    } catch (error) {
      // A broken header leaves no way to find the next frame boundary.
      this.close(
        new TransportError(
          'framing',
          `Transport '${this.label}' received a malformed frame: ${errorMessage(error)}`,
          { cause: error },
        ),
      );
      return;
    }

    for (const body of bodies) {
      if (this.closed) {
        return;
      }
      let message: JsonRpcMessage;
      try {
        message = parseMessage(body);
      } catch (error) {
        if (error instanceof DecodeError) {
          this.logger.warn(`${this.label}: ${error.message}`);
          this.emitDecodeError(error);
          continue;
        }
        throw error;
      }
      this.emitMessage(message);
    }
  }

  private onEnd(): void {
    const reason = this.decoder.hasPartialFrame()
      ? `Transport '${this.label}' closed in the middle of a message`
      : `Transport '${this.label}' reached end of stream`;
    this.close(new TransportError('closed', reason));
  }

  private track(stream: Readable, event: string, listener: Listener): void {
    stream.on(event, listener);
    this.detachers.push(() => {
      stream.off(event, listener);
    });
  }
}
