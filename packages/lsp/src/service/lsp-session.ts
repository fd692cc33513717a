import { EventEmitter } from 'node:events';
import { basename } from 'node:path';

import { DebugLogger } from '@symbolgate/core';

import {
  DocumentAlreadyOpenError,
  DocumentNotOpenError,
  NotReadyError,
  ProtocolError,
  type TransportError,
  errorMessage,
} from '../protocol/errors.js';
import {
  RequestMultiplexer,
  type NotificationListener,
} from '../rpc/multiplexer.js';
import type { MessageTransport, Unsubscribe } from '../transport/transport.js';
import { PRODUCT_NAME, PRODUCT_VERSION } from '../version.js';
import {
  toCompletionItems,
  toDocumentSymbols,
  toHoverText,
  toInitializeResult,
  toLocations,
  toPublishedDiagnostics,
  toWorkspaceSymbols,
  type CompletionItem,
  type Diagnostic,
  type DocumentSymbol,
  type Location,
  type ServerCapabilities,
  type WorkspaceSymbol,
} from './lsp-types.js';
import { toFileUri } from './uri.js';

export type SessionState =
  | 'uninitialized'
  | 'initializing'
  | 'ready'
  | 'shuttingDown'
  | 'terminated'
  | 'failed';

export interface OpenDocument {
  languageId: string;
  version: number;
}

export interface LspSessionOptions {
  /** Pool key of the language, used in labels and logs. */
  language: string;
  /** Default `languageId` for `didOpen`. */
  languageId: string;
  workspaceRoot: string;
  createTransport: () => MessageTransport;
  initializationOptions?: Readonly<Record<string, unknown>>;
  requestTimeoutMs?: number;
  /** Bound on the `shutdown` request; the server is stopped either way. */
  shutdownTimeoutMs?: number;
  logger?: DebugLogger;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 2_000;
const DIAGNOSTICS_EVENT = 'diagnostics';
const CLOSED_EVENT = 'closed';

const CLIENT_CAPABILITIES = {
  workspace: {
    workspaceFolders: true,
    configuration: true,
    symbol: { dynamicRegistration: false },
  },
  textDocument: {
    synchronization: {
      dynamicRegistration: false,
      didSave: false,
      willSave: false,
    },
    hover: { contentFormat: ['markdown', 'plaintext'] },
    definition: { linkSupport: true },
    references: {},
    documentSymbol: { hierarchicalDocumentSymbolSupport: true },
    completion: {
      completionItem: {
        snippetSupport: false,
        documentationFormat: ['markdown', 'plaintext'],
      },
    },
    publishDiagnostics: { relatedInformation: false },
  },
  window: { workDoneProgress: true },
} as const;

const logMessageParams = (
  params: unknown,
): { type: number; message: string } | null => {
  if (typeof params !== 'object' || params === null) {
    return null;
  }
  const type = 'type' in params ? params.type : undefined;
  const message = 'message' in params ? params.message : undefined;
  return typeof type === 'number' && typeof message === 'string'
    ? { type, message }
    : null;
};

/**
 * Client side of one language server connection: lifecycle, document sync,
 * diagnostics and the feature requests the tools use.
 *
 * Callers must serialize open/change/close of the same document; the session
 * only rejects operations on documents it has not seen opened.
 */
export class LspSession {
  private currentState: SessionState = 'uninitialized';
  private transport: MessageTransport | null = null;
  private rpc: RequestMultiplexer | null = null;
  private serverCapabilities: ServerCapabilities = {};
  private shutdownPromise: Promise<void> | null = null;
  private readonly documents = new Map<string, OpenDocument>();
  private readonly diagnostics = new Map<string, Diagnostic[]>();
  private readonly notificationListeners = new Set<NotificationListener>();
  private readonly events = new EventEmitter();
  private readonly logger: DebugLogger;
  private readonly requestTimeoutMs: number;
  private readonly rootUri: string;

  constructor(private readonly options: LspSessionOptions) {
    this.logger =
      options.logger ?? DebugLogger.getLogger('symbolgate:lsp:session');
    this.requestTimeoutMs =
      options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.rootUri = toFileUri(options.workspaceRoot);
    this.events.setMaxListeners(0);
  }

  get state(): SessionState {
    return this.currentState;
  }

  get language(): string {
    return this.options.language;
  }

  get workspaceRoot(): string {
    return this.options.workspaceRoot;
  }

  get capabilities(): ServerCapabilities {
    return this.serverCapabilities;
  }

  get label(): string {
    return `${this.options.language}@${this.options.workspaceRoot}`;
  }

  async start(): Promise<void> {
    if (this.currentState !== 'uninitialized') {
      throw new NotReadyError(
        this.currentState,
        `Session '${this.label}' cannot start from state '${this.currentState}'`,
      );
    }
    this.setState('initializing');

    try {
      const transport = this.options.createTransport();
      this.transport = transport;
      const rpc = new RequestMultiplexer(transport, {
        label: this.label,
        defaultTimeoutMs: this.requestTimeoutMs,
        inbound: 'concurrent',
        malformed: 'close',
        cancelMethod: '$/cancelRequest',
        logger: this.logger,
      });
      this.rpc = rpc;
      this.registerServerRequests(rpc);
      rpc.onNotification((method, params) =>
        this.handleNotification(method, params),
      );
      transport.onClose((reason) => this.handleTransportClosed(reason));

      await transport.start();
      const result = toInitializeResult(
        await rpc.call('initialize', this.initializeParams()),
      );
      if (!result) {
        throw new ProtocolError(
          `Language server '${this.label}' returned an invalid initialize result`,
        );
      }
      if (this.state !== 'initializing') {
        throw new NotReadyError(
          this.currentState,
          `Session '${this.label}' left initialization in state '${this.currentState}'`,
        );
      }

      this.serverCapabilities = result.capabilities;
      rpc.notify('initialized', {});
      this.setState('ready');
      this.logger.log(
        `${this.label}: ready (${result.serverInfo?.name ?? 'unnamed server'})`,
      );
    } catch (error) {
      if (this.state === 'initializing') {
        this.setState('failed');
      }
      this.logger.error(`${this.label}: failed to start: ${errorMessage(error)}`);
      await this.stopTransport();
      throw error;
    }
  }

  async hover(
    uri: string,
    line: number,
    character: number,
  ): Promise<string | null> {
    const result = await this.documentRequest(
      'textDocument/hover',
      uri,
      { position: { line, character } },
    );
    return toHoverText(result);
  }

  async definition(
    uri: string,
    line: number,
    character: number,
  ): Promise<Location[]> {
    const result = await this.documentRequest(
      'textDocument/definition',
      uri,
      { position: { line, character } },
    );
    return toLocations(result);
  }

  async references(
    uri: string,
    line: number,
    character: number,
    includeDeclaration = true,
  ): Promise<Location[]> {
    const result = await this.documentRequest(
      'textDocument/references',
      uri,
      { position: { line, character }, context: { includeDeclaration } },
    );
    return toLocations(result);
  }

  async documentSymbols(uri: string): Promise<DocumentSymbol[]> {
    const result = await this.documentRequest(
      'textDocument/documentSymbol',
      uri,
      {},
    );
    return toDocumentSymbols(result);
  }

  async workspaceSymbols(query: string): Promise<WorkspaceSymbol[]> {
    const rpc = this.assertReady('workspace/symbol');
    return toWorkspaceSymbols(await rpc.call('workspace/symbol', { query }));
  }

  async completion(
    uri: string,
    line: number,
    character: number,
  ): Promise<CompletionItem[]> {
    const result = await this.documentRequest(
      'textDocument/completion',
      uri,
      { position: { line, character } },
    );
    return toCompletionItems(result);
  }

  openDocument(uri: string, text: string, languageId?: string): void {
    const rpc = this.assertReady('textDocument/didOpen');
    const documentUri = toFileUri(uri);
    if (this.documents.has(documentUri)) {
      throw new DocumentAlreadyOpenError(documentUri);
    }

    const document: OpenDocument = {
      languageId: languageId ?? this.options.languageId,
      version: 1,
    };
    this.documents.set(documentUri, document);
    rpc.notify('textDocument/didOpen', {
      textDocument: {
        uri: documentUri,
        languageId: document.languageId,
        version: document.version,
        text,
      },
    });
  }

  /** Replaces the whole document text and bumps its version. */
  changeDocument(uri: string, text: string): void {
    const rpc = this.assertReady('textDocument/didChange');
    const documentUri = toFileUri(uri);
    const document = this.requireOpen(documentUri);
    document.version += 1;
    rpc.notify('textDocument/didChange', {
      textDocument: { uri: documentUri, version: document.version },
      contentChanges: [{ text }],
    });
  }

  closeDocument(uri: string): void {
    const rpc = this.assertReady('textDocument/didClose');
    const documentUri = toFileUri(uri);
    this.requireOpen(documentUri);
    this.documents.delete(documentUri);
    this.diagnostics.delete(documentUri);
    rpc.notify('textDocument/didClose', { textDocument: { uri: documentUri } });
  }

  isDocumentOpen(uri: string): boolean {
    return this.documents.has(toFileUri(uri));
  }

  documentVersion(uri: string): number | undefined {
    return this.documents.get(toFileUri(uri))?.version;
  }

  openDocumentUris(): string[] {
    return [...this.documents.keys()];
  }

  getDiagnostics(uri: string): Diagnostic[] {
    return [...(this.diagnostics.get(toFileUri(uri)) ?? [])];
  }

  /**
   * Resolves with the next diagnostics the server publishes for `uri`, or
   * with what is already known once `timeoutMs` passes or the session ends.
   */
  waitForDiagnostics(uri: string, timeoutMs: number): Promise<Diagnostic[]> {
    const documentUri = toFileUri(uri);
    if (this.currentState !== 'ready') {
      return Promise.resolve(this.getDiagnostics(documentUri));
    }

    return new Promise<Diagnostic[]>((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        this.events.off(DIAGNOSTICS_EVENT, onDiagnostics);
        this.events.off(CLOSED_EVENT, finish);
        resolve(this.getDiagnostics(documentUri));
      };
      const onDiagnostics = (publishedUri: string): void => {
        if (publishedUri === documentUri) {
          finish();
        }
      };
      const timer = setTimeout(finish, timeoutMs);
      this.events.on(DIAGNOSTICS_EVENT, onDiagnostics);
      this.events.once(CLOSED_EVENT, finish);
    });
  }

  onNotification(listener: NotificationListener): Unsubscribe {
    this.notificationListeners.add(listener);
    return () => {
      this.notificationListeners.delete(listener);
    };
  }

  /**
   * Sends `shutdown` and `exit`, then stops the transport. Safe to call in
   * any state and any number of times.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.runShutdown();
    return this.shutdownPromise;
  }

  /** Synchronous teardown for process exit hooks. */
  dispose(): void {
    this.transport?.dispose();
    if (this.currentState !== 'terminated') {
      this.setState('terminated');
    }
    this.events.emit(CLOSED_EVENT);
  }

  private async runShutdown(): Promise<void> {
    const previous = this.currentState;
    if (previous === 'terminated') {
      return;
    }
    this.setState('shuttingDown');

    const rpc = this.rpc;
    if (previous === 'ready' && rpc && !rpc.closed) {
      try {
        await rpc.call('shutdown', undefined, {
          timeoutMs: this.options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
        });
      } catch (error) {
        this.logger.debug(
          () => `${this.label}: shutdown request failed: ${errorMessage(error)}`,
        );
      }
      rpc.notify('exit');
    }

    await this.stopTransport();
    this.documents.clear();
    this.setState('terminated');
    this.events.emit(CLOSED_EVENT);
  }

  private async stopTransport(): Promise<void> {
    const transport = this.transport;
    if (!transport) {
      return;
    }
    try {
      await transport.stop();
    } catch (error) {
      this.logger.warn(
        `${this.label}: failed to stop transport: ${errorMessage(error)}`,
      );
    }
  }

  private async documentRequest(
    method: string,
    uri: string,
    params: Record<string, unknown>,
  ): Promise<unknown> {
    const rpc = this.assertReady(method);
    const documentUri = toFileUri(uri);
    this.requireOpen(documentUri);
    return await rpc.call(method, {
      textDocument: { uri: documentUri },
      ...params,
    });
  }

  private assertReady(operation: string): RequestMultiplexer {
    const rpc = this.rpc;
    if (this.currentState !== 'ready' || !rpc) {
      throw new NotReadyError(
        this.currentState,
        `Cannot run '${operation}': session '${this.label}' is ${this.currentState}`,
      );
    }
    return rpc;
  }

  private requireOpen(uri: string): OpenDocument {
    const document = this.documents.get(uri);
    if (!document) {
      throw new DocumentNotOpenError(uri);
    }
    return document;
  }

  private initializeParams(): Record<string, unknown> {
    return {
      processId: process.pid,
      clientInfo: { name: PRODUCT_NAME, version: PRODUCT_VERSION },
      rootUri: this.rootUri,
      rootPath: this.options.workspaceRoot,
      workspaceFolders: [
        { uri: this.rootUri, name: basename(this.options.workspaceRoot) },
      ],
      capabilities: CLIENT_CAPABILITIES,
      ...(this.options.initializationOptions
        ? { initializationOptions: this.options.initializationOptions }
        : {}),
    };
  }

  private registerServerRequests(rpc: RequestMultiplexer): void {
    rpc.onRequest('workspace/configuration', (params) => {
      const items =
        typeof params === 'object' && params !== null && 'items' in params
          ? params.items
          : undefined;
      return Array.isArray(items) ? items.map(() => null) : [];
    });
    rpc.onRequest('workspace/workspaceFolders', () => [
      { uri: this.rootUri, name: basename(this.options.workspaceRoot) },
    ]);
    rpc.onRequest('client/registerCapability', () => null);
    rpc.onRequest('client/unregisterCapability', () => null);
    rpc.onRequest('window/workDoneProgress/create', () => null);
    rpc.onRequest('window/showMessageRequest', () => null);
  }

  private handleNotification(method: string, params: unknown): void {
    if (method === 'textDocument/publishDiagnostics') {
      const published = toPublishedDiagnostics(params);
      if (published) {
        const uri = toFileUri(published.uri);
        this.diagnostics.set(uri, published.diagnostics);
        this.events.emit(DIAGNOSTICS_EVENT, uri);
      }
    } else if (method === 'window/logMessage' || method === 'window/showMessage') {
      this.logServerMessage(params);
    }

    for (const listener of [...this.notificationListeners]) {
      try {
        listener(method, params);
      } catch (error) {
        this.logger.error(
          `${this.label}: notification listener failed: ${errorMessage(error)}`,
        );
      }
    }
  }

  private logServerMessage(params: unknown): void {
    const entry = logMessageParams(params);
    if (!entry) {
      return;
    }
    const text = `${this.label} server: ${entry.message}`;
    switch (entry.type) {
      case 1:
        this.logger.error(text);
        break;
      case 2:
        this.logger.warn(text);
        break;
      case 3:
        this.logger.log(text);
        break;
      default:
        this.logger.debug(text);
    }
  }

  private handleTransportClosed(reason: TransportError): void {
    if (this.currentState === 'initializing' || this.currentState === 'ready') {
      this.logger.warn(`${this.label}: connection lost: ${reason.message}`);
      this.setState('failed');
      this.events.emit(CLOSED_EVENT);
    }
  }

  private setState(next: SessionState): void {
    this.logger.debug(() => `${this.label}: ${this.currentState} -> ${next}`);
    this.currentState = next;
  }
}
