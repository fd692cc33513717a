import { resolve } from 'node:path';

import { DebugLogger } from '@symbolgate/core';

import {
  NotReadyError,
  UnsupportedLanguageError,
  errorMessage,
} from '../protocol/errors.js';
import {
  DEFAULT_SHUTDOWN_GRACE_MS,
  ProcessTransport,
} from '../transport/process-transport.js';
import type { MessageTransport } from '../transport/transport.js';
import {
  findLanguage,
  getBuiltinLanguages,
  languageForFile,
  type LanguageServerEntry,
} from './languages.js';
import { LspSession, type SessionState } from './lsp-session.js';

export type TransportFactory = (
  entry: LanguageServerEntry,
  workspaceRoot: string,
) => MessageTransport;

export interface SessionPoolOptions {
  languages?: readonly LanguageServerEntry[];
  requestTimeoutMs?: number;
  shutdownGraceMs?: number;
  /** Defaults to spawning `entry.command` in the workspace root. */
  createTransport?: TransportFactory;
  logger?: DebugLogger;
}

export interface SessionStatus {
  language: string;
  workspaceRoot: string;
  state: SessionState;
}

type SessionKey = string;

const sessionKey = (language: string, workspaceRoot: string): SessionKey =>
  `${language}::${workspaceRoot}`;

export const processTransportFactory =
  (shutdownGraceMs = DEFAULT_SHUTDOWN_GRACE_MS): TransportFactory =>
  (entry, workspaceRoot) =>
    new ProcessTransport(
      {
        command: entry.command,
        args: entry.args,
        cwd: workspaceRoot,
        env: entry.env,
      },
      { label: `${entry.language}@${workspaceRoot}`, shutdownGraceMs },
    );

/**
 * Keeps one language server session per (workspace root, language). Sessions
 * start on first use; a session that failed or terminated is replaced on the
 * next request for it.
 */
export class SessionPool {
  private readonly sessions = new Map<SessionKey, LspSession>();
  private readonly startups = new Map<SessionKey, Promise<LspSession>>();
  private readonly table: readonly LanguageServerEntry[];
  private readonly createTransport: TransportFactory;
  private readonly logger: DebugLogger;
  private closed = false;

  constructor(private readonly options: SessionPoolOptions = {}) {
    this.table = options.languages ?? getBuiltinLanguages();
    this.createTransport =
      options.createTransport ??
      processTransportFactory(options.shutdownGraceMs);
    this.logger = options.logger ?? DebugLogger.getLogger('symbolgate:lsp:pool');
  }

  get languages(): readonly LanguageServerEntry[] {
    return this.table;
  }

  languageForFile(filePath: string): LanguageServerEntry | undefined {
    return languageForFile(filePath, this.table);
  }

  async getOrCreateSession(
    workspaceRoot: string,
    language: string,
  ): Promise<LspSession> {
    if (this.closed) {
      throw new NotReadyError('terminated', 'Session pool has been shut down');
    }

    const root = resolve(workspaceRoot);
    const key = sessionKey(language, root);

    const inFlight = this.startups.get(key);
    if (inFlight) {
      return await inFlight;
    }

    const existing = this.sessions.get(key);
    if (existing?.state === 'ready') {
      return existing;
    }

    const entry = findLanguage(language, this.table);
    if (!entry) {
      throw new UnsupportedLanguageError(language);
    }

    // Registered before the first await so concurrent callers share it.
    const startup = this.startSession(key, entry, root, existing);
    this.startups.set(key, startup);
    return await startup;
  }

  status(): SessionStatus[] {
    return [...this.sessions.values()]
      .map((session) => ({
        language: session.language,
        workspaceRoot: session.workspaceRoot,
        state: session.state,
      }))
      .sort(
        (a, b) =>
          a.workspaceRoot.localeCompare(b.workspaceRoot) ||
          a.language.localeCompare(b.language),
      );
  }

  async shutdownAll(): Promise<void> {
    this.closed = true;
    await Promise.allSettled([...this.startups.values()]);

    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(
      sessions.map(async (session) => {
        try {
          await session.shutdown();
        } catch (error) {
          this.logger.warn(
            `${session.label}: shutdown failed: ${errorMessage(error)}`,
          );
        }
      }),
    );
  }

  /** Kills every remaining server synchronously. */
  dispose(): void {
    this.closed = true;
    for (const session of this.sessions.values()) {
      session.dispose();
    }
    this.sessions.clear();
  }

  private async startSession(
    key: SessionKey,
    entry: LanguageServerEntry,
    workspaceRoot: string,
    previous: LspSession | undefined,
  ): Promise<LspSession> {
    try {
      if (previous) {
        this.logger.warn(
          `${previous.label}: discarding session in state '${previous.state}'`,
        );
        this.sessions.delete(key);
        await previous.shutdown();
      }
      return await this.launch(key, entry, workspaceRoot);
    } finally {
      this.startups.delete(key);
    }
  }

  private async launch(
    key: SessionKey,
    entry: LanguageServerEntry,
    workspaceRoot: string,
  ): Promise<LspSession> {
    const session = new LspSession({
      language: entry.language,
      languageId: entry.languageId,
      workspaceRoot,
      initializationOptions: entry.initializationOptions,
      requestTimeoutMs: this.options.requestTimeoutMs,
      createTransport: () => this.createTransport(entry, workspaceRoot),
    });
    this.sessions.set(key, session);
    this.logger.debug(() => `${session.label}: starting ${entry.command}`);

    try {
      await session.start();
      return session;
    } catch (error) {
      if (this.sessions.get(key) === session) {
        this.sessions.delete(key);
      }
      throw error;
    }
  }
}
