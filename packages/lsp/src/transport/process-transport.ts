import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { existsSync } from 'node:fs';

import { DebugLogger } from '@symbolgate/core';

import { TransportError } from '../protocol/errors.js';
import type { JsonRpcMessage } from '../protocol/messages.js';
import { StreamTransport } from './stream-transport.js';
import { BaseTransport } from './transport.js';

export interface ProcessCommand {
  command: string;
  args?: readonly string[];
  cwd?: string;
  env?: Readonly<Record<string, string>>;
}

export interface ProcessTransportOptions {
  label?: string;
  /** How long `stop()` waits for a voluntary exit before SIGKILL. */
  shutdownGraceMs?: number;
  /** A child that dies within this window counts as a failed spawn. */
  startupWindowMs?: number;
  logger?: DebugLogger;
}

export const DEFAULT_SHUTDOWN_GRACE_MS = 2_000;
const DEFAULT_STARTUP_WINDOW_MS = 25;

type ExitStatus = { code: number | null; signal: NodeJS.Signals | null };

const describeExit = ({ code, signal }: ExitStatus): string =>
  signal ? `signal ${signal}` : `code ${String(code)}`;

async function settlesWithin(
  promise: Promise<void>,
  timeoutMs: number,
): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs a language server as a child process and speaks the Content-Length
 * framed protocol over its stdin/stdout. stderr goes to the debug log.
 */
export class ProcessTransport extends BaseTransport {
  private child: ChildProcessWithoutNullStreams | null = null;
  private stream: StreamTransport | null = null;
  private exitStatus: ExitStatus | null = null;
  private exitPromise: Promise<ExitStatus> | null = null;
  private readonly logger: DebugLogger;
  private readonly shutdownGraceMs: number;

  constructor(
    private readonly launch: ProcessCommand,
    private readonly options: ProcessTransportOptions = {},
  ) {
    super(options.label ?? launch.command);
    this.logger =
      options.logger ?? DebugLogger.getLogger('symbolgate:lsp:transport');
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  get hasExited(): boolean {
    return this.exitStatus !== null;
  }

  async start(): Promise<void> {
    if (this.child) {
      return;
    }
    if (this.closed) {
      throw new TransportError('closed', `Transport '${this.label}' is closed`);
    }

    const args = [...(this.launch.args ?? [])];
    const cwd =
      this.launch.cwd && existsSync(this.launch.cwd) ? this.launch.cwd : process.cwd();
    this.logger.debug(
      () => `${this.label}: spawning ${[this.launch.command, ...args].join(' ')}`,
    );

    const child = spawn(this.launch.command, args, {
      cwd,
      env: { ...process.env, ...this.launch.env },
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    this.child = child;
    this.exitPromise = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code, signal) => {
        this.exitStatus = { code, signal };
        resolve(this.exitStatus);
      });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', () => resolve());
        child.once('error', reject);
      });
    } catch (error) {
      const failure = new TransportError(
        'spawn',
        `Failed to start '${this.launch.command}': ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
      this.exitStatus = { code: null, signal: null };
      this.markClosed(failure);
      throw failure;
    }

    child.on('error', (error: Error) => {
      this.logger.warn(`${this.label}: process error: ${error.message}`);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      const text = chunk.toString('utf8').trimEnd();
      if (text.length > 0) {
        this.logger.debug(() => `${this.label} stderr: ${text}`);
      }
    });

    const stream = new StreamTransport(child.stdout, child.stdin, {
      framing: 'content-length',
      label: this.label,
      logger: this.logger,
    });
    this.stream = stream;
    stream.onMessage((message) => this.emitMessage(message));
    stream.onDecodeError((error) => this.emitDecodeError(error));
    stream.onClose((reason) => this.markClosed(reason));
    void this.exitPromise.then((status) => {
      const reason = new TransportError(
        'exited',
        `Language server '${this.label}' exited with ${describeExit(status)}`,
      );
      stream.close(reason);
      this.markClosed(reason);
    });
    await stream.start();

    const startupWindowMs =
      this.options.startupWindowMs ?? DEFAULT_STARTUP_WINDOW_MS;
    const earlyExit = await this.waitForExit(startupWindowMs);
    if (earlyExit) {
      throw new TransportError(
        'spawn',
        `Language server '${this.label}' exited immediately with ${describeExit(earlyExit)}`,
      );
    }
  }

  send(message: JsonRpcMessage): Promise<void> {
    if (!this.stream || this.closed) {
      return Promise.reject(
        new TransportError(
          'closed',
          `Cannot send '${'method' in message ? message.method : 'response'}' because '${this.label}' is not running`,
        ),
      );
    }
    return this.stream.send(message);
  }

  /**
   * Flushes and closes stdin, waits up to the grace period for the server
   * to exit, then kills it. A flush that outlasts the grace period goes
   * straight to the kill. Resolves once the child is gone.
   */
  async stop(): Promise<void> {
    const child = this.child;
    if (!child || this.exitStatus) {
      this.markStopped();
      return;
    }

    const stream = this.stream;
    let flushed = true;
    if (stream) {
      // A wedged server may never read stdin, so the flush is bounded too.
      flushed = await settlesWithin(stream.stop(), this.shutdownGraceMs);
      if (!flushed) {
        this.logger.warn(
          `${this.label}: stdin not drained within ${this.shutdownGraceMs}ms`,
        );
        child.stdin.destroy();
        stream.close(
          new TransportError('closed', `Transport '${this.label}' was stopped`),
        );
      }
    }
    this.markStopped();

    if (flushed && (await this.waitForExit(this.shutdownGraceMs))) {
      return;
    }

    this.logger.warn(
      `${this.label}: no exit within ${this.shutdownGraceMs}ms, killing pid ${String(child.pid)}`,
    );
    child.kill('SIGKILL');
    await this.waitForExit(this.shutdownGraceMs);
  }

  /** Synchronous last resort for process exit hooks. */
  dispose(): void {
    if (this.child && !this.exitStatus) {
      this.child.kill('SIGKILL');
    }
    this.markStopped();
  }

  private markStopped(): void {
    this.markClosed(
      new TransportError('closed', `Transport '${this.label}' was stopped`),
    );
  }

  private async waitForExit(timeoutMs: number): Promise<ExitStatus | null> {
    if (this.exitStatus) {
      return this.exitStatus;
    }
    const exitPromise = this.exitPromise;
    if (!exitPromise) {
      return null;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMs);
    });
    try {
      return await Promise.race([exitPromise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
