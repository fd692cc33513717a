import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  NotReadyError,
  ProtocolError,
  UnsupportedLanguageError,
} from '../src/protocol/errors.js';
import type { LanguageServerEntry } from '../src/service/languages.js';
import { SessionPool, type TransportFactory } from '../src/service/session-pool.js';
import { StubLanguageServer, createTransportPair } from './helpers/stub-peer.js';

function stubFactory(
  configure: (server: StubLanguageServer, index: number) => void = () => undefined,
) {
  const servers: StubLanguageServer[] = [];
  const launched: string[] = [];
  const factory: TransportFactory = (entry: LanguageServerEntry, workspaceRoot: string) => {
    const pair = createTransportPair();
    const server = new StubLanguageServer(pair.server);
    configure(server, servers.length);
    servers.push(server);
    launched.push(`${entry.language}@${workspaceRoot}`);
    void server.start();
    return pair.client;
  };
  return { factory, servers, launched };
}

const pools: SessionPool[] = [];

function createPool(factory: TransportFactory): SessionPool {
  const pool = new SessionPool({ createTransport: factory, requestTimeoutMs: 1_000 });
  pools.push(pool);
  return pool;
}

afterEach(async () => {
  await Promise.all(pools.map((pool) => pool.shutdownAll()));
  pools.length = 0;
});

describe('SessionPool', () => {
  it('reuses the ready session for a root and language', async () => {
    const { factory, launched } = stubFactory();
    const pool = createPool(factory);

    const first = await pool.getOrCreateSession('/workspace/a', 'typescript');
    const second = await pool.getOrCreateSession('/workspace/a/', 'typescript');

    expect(second).toBe(first);
    expect(launched).toEqual(['typescript@/workspace/a']);
  });

  it('shares one startup between concurrent callers', async () => {
    const { factory, launched } = stubFactory();
    const pool = createPool(factory);

    const [a, b] = await Promise.all([
      pool.getOrCreateSession('/workspace/a', 'python'),
      pool.getOrCreateSession('/workspace/a', 'python'),
    ]);

    expect(a).toBe(b);
    expect(launched).toEqual(['python@/workspace/a']);
  });

  it('keeps separate sessions per language and per root', async () => {
    const { factory } = stubFactory();
    const pool = createPool(factory);

    await pool.getOrCreateSession('/workspace/b', 'python');
    await pool.getOrCreateSession('/workspace/a', 'typescript');
    await pool.getOrCreateSession('/workspace/a', 'go');

    expect(pool.status()).toEqual([
      { language: 'go', workspaceRoot: '/workspace/a', state: 'ready' },
      { language: 'typescript', workspaceRoot: '/workspace/a', state: 'ready' },
      { language: 'python', workspaceRoot: '/workspace/b', state: 'ready' },
    ]);
  });

  it('rejects a language it has no server for', async () => {
    const { factory, launched } = stubFactory();
    const pool = createPool(factory);

    await expect(pool.getOrCreateSession('/workspace/a', 'cobol')).rejects.toThrow(
      new UnsupportedLanguageError('cobol'),
    );
    expect(launched).toEqual([]);
  });

  it('forgets a session whose startup failed', async () => {
    const { factory, launched } = stubFactory((server, index) => {
      if (index === 0) {
        server.handle('initialize', () => 'not an initialize result');
      }
    });
    const pool = createPool(factory);

    await expect(pool.getOrCreateSession('/workspace/a', 'rust')).rejects.toBeInstanceOf(
      ProtocolError,
    );
    expect(pool.status()).toEqual([]);

    const session = await pool.getOrCreateSession('/workspace/a', 'rust');
    expect(session.state).toBe('ready');
    expect(launched).toHaveLength(2);
  });

  it('replaces a session whose server went away', async () => {
    const { factory, servers } = stubFactory();
    const pool = createPool(factory);
    const first = await pool.getOrCreateSession('/workspace/a', 'typescript');

    await servers[0]?.transport.stop();
    await vi.waitFor(() => expect(first.state).toBe('failed'));
    const second = await pool.getOrCreateSession('/workspace/a', 'typescript');

    expect(second).not.toBe(first);
    expect(second.state).toBe('ready');
    expect(first.state).toBe('terminated');
    expect(servers).toHaveLength(2);
  });

  it('shares one replacement between concurrent callers', async () => {
    const { factory, servers } = stubFactory();
    const pool = createPool(factory);
    const first = await pool.getOrCreateSession('/workspace/a', 'typescript');
    await servers[0]?.transport.stop();
    await vi.waitFor(() => expect(first.state).toBe('failed'));

    const [a, b] = await Promise.all([
      pool.getOrCreateSession('/workspace/a', 'typescript'),
      pool.getOrCreateSession('/workspace/a', 'typescript'),
    ]);

    expect(a).toBe(b);
    expect(servers).toHaveLength(2);
    expect(pool.status()).toEqual([
      { language: 'typescript', workspaceRoot: '/workspace/a', state: 'ready' },
    ]);

    await pool.shutdownAll();
    expect(a.state).toBe('terminated');
  });

  it('shuts every session down and refuses new ones', async () => {
    const { factory, servers } = stubFactory();
    const pool = createPool(factory);
    const session = await pool.getOrCreateSession('/workspace/a', 'typescript');

    await pool.shutdownAll();

    expect(session.state).toBe('terminated');
    expect(pool.status()).toEqual([]);
    expect(await servers[0]?.waitForRequest('shutdown')).toHaveLength(1);
    await expect(pool.getOrCreateSession('/workspace/a', 'typescript')).rejects.toBeInstanceOf(
      NotReadyError,
    );
  });

  it('waits for a startup in flight before shutting down', async () => {
    const { factory } = stubFactory();
    const pool = createPool(factory);

    const starting = pool.getOrCreateSession('/workspace/a', 'typescript');
    await pool.shutdownAll();
    const session = await starting;

    expect(session.state).toBe('terminated');
  });

  it('disposes sessions synchronously', async () => {
    const { factory } = stubFactory();
    const pool = createPool(factory);
    const session = await pool.getOrCreateSession('/workspace/a', 'typescript');

    pool.dispose();

    expect(session.state).toBe('terminated');
    expect(pool.status()).toEqual([]);
  });

  it('looks up the language of a file by extension', () => {
    const pool = createPool(stubFactory().factory);

    expect(pool.languageForFile('/workspace/a/src/main.PY')?.language).toBe('python');
    expect(pool.languageForFile('/workspace/a/Makefile')).toBeUndefined();
  });
});
