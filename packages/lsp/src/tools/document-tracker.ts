import { readFile } from 'node:fs/promises';

import type { LspSession } from '../service/lsp-session.js';
import { toFileUri } from '../service/uri.js';

export type SyncOutcome = 'opened' | 'changed' | 'unchanged';

type ReadText = (filePath: string) => Promise<string>;

/**
 * Mirrors files on disk into sessions before a request touches them and
 * runs operations on the same document one after another, so open, change
 * and the request that follows never interleave for one URI.
 */
export class DocumentTracker {
  private readonly queues = new Map<string, Promise<void>>();
  private readonly synced = new WeakMap<LspSession, Map<string, string>>();

  constructor(
    private readonly readText: ReadText = (filePath) =>
      readFile(filePath, 'utf8'),
  ) {}

  /**
   * Brings `filePath` up to date in `session`, then runs `operation` with its
   * URI and the sync outcome.
   */
  async withDocument<T>(
    session: LspSession,
    filePath: string,
    operation: (uri: string, outcome: SyncOutcome) => Promise<T>,
  ): Promise<T> {
    const uri = toFileUri(filePath);
    return await this.enqueue(`${session.label}|${uri}`, async () => {
      const outcome = await this.sync(session, filePath, uri);
      return await operation(uri, outcome);
    });
  }

  private async sync(
    session: LspSession,
    filePath: string,
    uri: string,
  ): Promise<SyncOutcome> {
    const text = await this.readText(filePath);
    let texts = this.synced.get(session);
    if (!texts) {
      texts = new Map<string, string>();
      this.synced.set(session, texts);
    }

    if (!session.isDocumentOpen(uri)) {
      session.openDocument(uri, text);
      texts.set(uri, text);
      return 'opened';
    }
    if (texts.get(uri) !== text) {
      session.changeDocument(uri, text);
      texts.set(uri, text);
      return 'changed';
    }
    return 'unchanged';
  }

  private async enqueue<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    let release = (): void => {};
    const next = new Promise<void>((resolveRelease) => {
      release = resolveRelease;
    });
    const tail = previous.then(() => next);
    this.queues.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      if (this.queues.get(key) === tail) {
        this.queues.delete(key);
      }
    }
  }
}
