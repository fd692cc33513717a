import { setTimeout as delay } from 'node:timers/promises';

import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  DocumentAlreadyOpenError,
  DocumentNotOpenError,
  NotReadyError,
  ProtocolError,
  RequestTimeoutError,
} from '../src/protocol/errors.js';
import type { LspSession } from '../src/service/lsp-session.js';
import {
  WORKSPACE_ROOT,
  createStubSession,
  type StubSession,
} from './helpers/stub-peer.js';

const FILE = `${WORKSPACE_ROOT}/src/app.ts`;
const FILE_URI = `file://${FILE}`;

const range = (line: number, start: number, end: number) => ({
  start: { line, character: start },
  end: { line, character: end },
});

const sessions: LspSession[] = [];

async function readySession(
  options: Parameters<typeof createStubSession>[0] = {},
): Promise<StubSession> {
  const stub = await createStubSession(options);
  sessions.push(stub.session);
  await stub.session.start();
  return stub;
}

afterEach(async () => {
  await Promise.all(sessions.map((session) => session.shutdown()));
  sessions.length = 0;
});

describe('LspSession lifecycle', () => {
  it('completes the initialize handshake', async () => {
    const { session, server } = await readySession();

    expect(session.state).toBe('ready');
    expect(session.capabilities).toEqual({ hoverProvider: true, definitionProvider: true });

    const [params] = await server.waitForRequest('initialize');
    expect(params).toMatchObject({
      processId: process.pid,
      rootUri: 'file:///workspace/project',
      rootPath: WORKSPACE_ROOT,
      workspaceFolders: [{ uri: 'file:///workspace/project', name: 'project' }],
      clientInfo: { name: 'symbolgate' },
    });
    expect(await server.waitForNotification('initialized')).toEqual([{}]);
  });

  it('passes initialization options through', async () => {
    const { server } = await readySession({
      initializationOptions: { preferences: { quoteStyle: 'single' } },
    });

    const [params] = await server.waitForRequest('initialize');
    expect(params).toMatchObject({
      initializationOptions: { preferences: { quoteStyle: 'single' } },
    });
  });

  it('refuses requests before it is started', async () => {
    const { session } = await createStubSession();
    sessions.push(session);

    await expect(session.hover(FILE, 0, 0)).rejects.toBeInstanceOf(NotReadyError);
    expect(() => session.openDocument(FILE, 'x')).toThrow(
      "Cannot run 'textDocument/didOpen': session 'typescript@/workspace/project' is uninitialized",
    );
  });

  it('cannot be started twice', async () => {
    const { session } = await readySession();

    await expect(session.start()).rejects.toThrow(
      "Session 'typescript@/workspace/project' cannot start from state 'ready'",
    );
  });

  it('fails when the server answers initialize with something else', async () => {
    const { session, server } = await createStubSession();
    sessions.push(session);
    server.handle('initialize', () => 42);

    await expect(session.start()).rejects.toBeInstanceOf(ProtocolError);
    expect(session.state).toBe('failed');
  });

  it('sends shutdown then exit and terminates', async () => {
    const { session, server } = await readySession();

    await session.shutdown();

    expect(session.state).toBe('terminated');
    expect(await server.waitForRequest('shutdown')).toHaveLength(1);
    expect(await server.waitForNotification('exit')).toHaveLength(1);
  });

  it('treats repeated shutdown as a no-op', async () => {
    const { session, server } = await readySession();

    await Promise.all([session.shutdown(), session.shutdown()]);
    await session.shutdown();

    expect(server.requestsOf('shutdown')).toHaveLength(1);
    await expect(session.hover(FILE, 0, 0)).rejects.toMatchObject({ state: 'terminated' });
  });

  it('stops even when the server never answers shutdown', async () => {
    const { session, server } = await readySession({ shutdownTimeoutMs: 30 });
    server.handle('shutdown', () => new Promise<never>(() => undefined));

    await session.shutdown();

    expect(session.state).toBe('terminated');
  });

  it('shuts down a session that was never started', async () => {
    const { session, server } = await createStubSession();

    await session.shutdown();

    expect(session.state).toBe('terminated');
    expect(server.requestsOf('shutdown')).toEqual([]);
  });

  it('fails when the server goes away', async () => {
    const { session, server } = await readySession();

    await server.transport.stop();

    await vi.waitFor(() => expect(session.state).toBe('failed'));
  });
});

describe('LspSession documents', () => {
  it('opens, changes and closes documents with increasing versions', async () => {
    const { session, server } = await readySession();

    session.openDocument(FILE, 'let a = 1;');
    session.changeDocument(FILE, 'let a = 2;');
    expect(session.documentVersion(FILE)).toBe(2);
    expect(session.openDocumentUris()).toEqual([FILE_URI]);
    session.closeDocument(FILE);

    expect(await server.waitForNotification('textDocument/didOpen')).toEqual([
      {
        textDocument: { uri: FILE_URI, languageId: 'typescript', version: 1, text: 'let a = 1;' },
      },
    ]);
    expect(await server.waitForNotification('textDocument/didChange')).toEqual([
      { textDocument: { uri: FILE_URI, version: 2 }, contentChanges: [{ text: 'let a = 2;' }] },
    ]);
    expect(await server.waitForNotification('textDocument/didClose')).toEqual([
      { textDocument: { uri: FILE_URI } },
    ]);
    expect(session.isDocumentOpen(FILE)).toBe(false);
  });

  it('treats a path and its file URI as the same document', async () => {
    const { session } = await readySession();

    session.openDocument(FILE_URI, '');

    expect(session.isDocumentOpen(FILE)).toBe(true);
    expect(() => session.openDocument(FILE, '')).toThrow(DocumentAlreadyOpenError);
  });

  it('rejects changes and requests for documents that are not open', async () => {
    const { session } = await readySession();

    expect(() => session.changeDocument(FILE, 'x')).toThrow(DocumentNotOpenError);
    await expect(session.hover(FILE, 0, 0)).rejects.toThrow(`Document is not open: ${FILE_URI}`);
  });
});

describe('LspSession requests', () => {
  it('returns hover text', async () => {
    const { session, server } = await readySession();
    server.handle('textDocument/hover', () => ({
      contents: { kind: 'markdown', value: '```ts\nconst a: number\n```' },
    }));
    session.openDocument(FILE, 'const a = 1;');

    expect(await session.hover(FILE, 0, 6)).toBe('```ts\nconst a: number\n```');
    expect(server.requestsOf('textDocument/hover')).toEqual([
      { textDocument: { uri: FILE_URI }, position: { line: 0, character: 6 } },
    ]);
  });

  it('returns definitions from location links', async () => {
    const { session, server } = await readySession();
    server.handle('textDocument/definition', () => [
      {
        targetUri: 'file:///workspace/project/src/lib.ts',
        targetRange: range(3, 0, 20),
        targetSelectionRange: range(3, 9, 12),
      },
    ]);
    session.openDocument(FILE, 'foo();');

    expect(await session.definition(FILE, 0, 1)).toEqual([
      { uri: 'file:///workspace/project/src/lib.ts', range: range(3, 9, 12) },
    ]);
  });

  it('asks for references with the declaration flag', async () => {
    const { session, server } = await readySession();
    server.handle('textDocument/references', () => [
      { uri: FILE_URI, range: range(1, 0, 3) },
    ]);
    session.openDocument(FILE, 'foo();\nfoo();');

    expect(await session.references(FILE, 0, 0, false)).toEqual([
      { uri: FILE_URI, range: range(1, 0, 3) },
    ]);
    expect(server.requestsOf('textDocument/references')).toEqual([
      {
        textDocument: { uri: FILE_URI },
        position: { line: 0, character: 0 },
        context: { includeDeclaration: false },
      },
    ]);
  });

  it('queries workspace symbols without an open document', async () => {
    const { session, server } = await readySession();
    server.handle('workspace/symbol', () => [
      { name: 'Widget', kind: 5, location: { uri: FILE_URI, range: range(0, 0, 6) } },
    ]);

    expect(await session.workspaceSymbols('Wid')).toEqual([
      { name: 'Widget', kind: 'class', location: { uri: FILE_URI, range: range(0, 0, 6) } },
    ]);
  });

  it('times out a request the server never answers', async () => {
    const { session, server } = await readySession({ requestTimeoutMs: 50 });
    server.handle('textDocument/completion', () => new Promise<never>(() => undefined));
    session.openDocument(FILE, '');

    await expect(session.completion(FILE, 0, 0)).rejects.toBeInstanceOf(RequestTimeoutError);
    expect(await server.waitForNotification('$/cancelRequest')).toEqual([{ id: 2 }]);
  });
});

describe('LspSession server requests and notifications', () => {
  it('answers workspace/configuration with one null per item', async () => {
    const { server } = await readySession();

    expect(
      await server.rpc.call('workspace/configuration', {
        items: [{ section: 'typescript' }, { section: 'editor' }],
      }),
    ).toEqual([null, null]);
    expect(await server.rpc.call('workspace/workspaceFolders')).toEqual([
      { uri: 'file:///workspace/project', name: 'project' },
    ]);
    expect(await server.rpc.call('client/registerCapability', { registrations: [] })).toBeNull();
  });

  it('rejects server requests it does not know', async () => {
    const { server } = await readySession();

    await expect(server.rpc.call('custom/unknown')).rejects.toMatchObject({ code: -32601 });
  });

  it('stores published diagnostics and wakes waiters', async () => {
    const { session, server } = await readySession();
    session.openDocument(FILE, 'let x: string = 1;');

    const waiting = session.waitForDiagnostics(FILE, 1_000);
    server.publishDiagnostics(FILE_URI, [
      { range: range(0, 4, 5), severity: 1, message: "Type 'number' is not assignable", code: 2322, source: 'ts' },
      { range: range(0, 0, 3), severity: 2, message: 'Prefer const' },
      { message: 'missing range is skipped' },
    ]);

    const expected = [
      {
        range: range(0, 4, 5),
        severity: 'error',
        message: "Type 'number' is not assignable",
        code: 2322,
        source: 'ts',
      },
      { range: range(0, 0, 3), severity: 'warning', message: 'Prefer const' },
    ];
    expect(await waiting).toEqual(expected);
    expect(session.getDiagnostics(FILE)).toEqual(expected);
  });

  it('forgets diagnostics when the document is closed', async () => {
    const { session, server } = await readySession();
    session.openDocument(FILE, 'let x = y;');

    const waiting = session.waitForDiagnostics(FILE, 1_000);
    server.publishDiagnostics(FILE_URI, [
      { range: range(0, 8, 9), severity: 1, message: "Cannot find name 'y'" },
    ]);
    expect(await waiting).toHaveLength(1);

    session.closeDocument(FILE);

    expect(session.getDiagnostics(FILE)).toEqual([]);
  });

  it('resolves a diagnostics wait with what it has after the timeout', async () => {
    const { session, server } = await readySession();
    server.publishDiagnostics('file:///workspace/project/src/other.ts', []);

    const startedAt = Date.now();
    expect(await session.waitForDiagnostics(FILE, 40)).toEqual([]);
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(30);
  });

  it('ends diagnostics waits when the session shuts down', async () => {
    const { session } = await readySession();

    const waiting = session.waitForDiagnostics(FILE, 60_000);
    await session.shutdown();

    expect(await waiting).toEqual([]);
  });

  it('forwards server notifications to listeners', async () => {
    const { session, server } = await readySession();
    const received: string[] = [];
    session.onNotification((method) => received.push(method));

    server.rpc.notify('window/logMessage', { type: 3, message: 'indexing' });
    server.rpc.notify('$/progress', { token: 't', value: { kind: 'end' } });
    await delay(20);

    expect(received).toEqual(['window/logMessage', '$/progress']);
  });
});
