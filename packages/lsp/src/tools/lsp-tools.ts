import { basename, extname, relative, resolve, sep } from 'node:path';

import { z } from 'zod';

import type {
  ToolContext,
  ToolDefinition,
  ToolRegistry,
} from '../gateway/tool-registry.js';
import { InvalidParamsError, UnsupportedLanguageError } from '../protocol/errors.js';
import type { LspSession } from '../service/lsp-session.js';
import type {
  Diagnostic,
  Location,
  Position,
} from '../service/lsp-types.js';
import { fromFileUri } from '../service/uri.js';
import type { SyncOutcome } from './document-tracker.js';

const DEFAULT_DIAGNOSTICS_WAIT_MS = 1_000;
const DEFAULT_COMPLETION_LIMIT = 50;

const filePositionSchema = z.object({
  filePath: z.string().describe('File path, absolute or relative to the workspace root'),
  line: z.number().int().nonnegative().describe('Zero-based line'),
  character: z.number().int().nonnegative().describe('Zero-based character offset'),
});

const fileSchema = z.object({
  filePath: z.string().describe('File path, absolute or relative to the workspace root'),
});

export const validateFilePath = (
  filePath: string,
  workspaceRoot: string,
): string => {
  const root = resolve(workspaceRoot);
  const normalized = resolve(root, filePath);

  if (normalized === root || normalized.startsWith(`${root}${sep}`)) {
    return normalized;
  }

  throw new InvalidParamsError(`File is outside workspace boundary: ${filePath}`);
};

export const toDisplayPath = (value: string, workspaceRoot: string): string => {
  const root = resolve(workspaceRoot);
  const abs = resolve(fromFileUri(value));
  const rel = relative(root, abs).replace(/\\/gu, '/');
  return rel === ''
    ? '.'
    : rel.startsWith('..')
      ? abs.replace(/\\/gu, '/')
      : rel;
};

const formatLineCol = (position: Position): string =>
  `${position.line + 1}:${position.character + 1}`;

export const formatLocation = (
  location: Location,
  workspaceRoot: string,
): string =>
  `${toDisplayPath(location.uri, workspaceRoot)}:${formatLineCol(location.range.start)}`;

export const formatDiagnostic = (
  filePath: string,
  diagnostic: Diagnostic,
  workspaceRoot: string,
): string =>
  `${toDisplayPath(filePath, workspaceRoot)}:${formatLineCol(diagnostic.range.start)} [${diagnostic.severity}] ${diagnostic.message}`;

const listOr = (lines: readonly string[], empty: string): string =>
  lines.length > 0 ? lines.join('\n') : empty;

/**
 * Resolves the file, its language and a ready session for it, syncs the file
 * into the session and runs `operation` on its URI.
 */
async function withFile<T>(
  context: ToolContext,
  filePath: string,
  operation: (session: LspSession, uri: string, outcome: SyncOutcome) => Promise<T>,
): Promise<T> {
  const absolutePath = validateFilePath(filePath, context.workspaceRoot);
  const entry = context.pool.languageForFile(absolutePath);
  if (!entry) {
    throw new UnsupportedLanguageError(
      extname(absolutePath) || basename(absolutePath),
    );
  }
  const session = await context.pool.getOrCreateSession(
    context.workspaceRoot,
    entry.language,
  );
  return await context.documents.withDocument(
    session,
    absolutePath,
    async (uri, outcome) => {
      context.logger.debug(
        () =>
          `${session.label}: ${toDisplayPath(absolutePath, context.workspaceRoot)} ${outcome}`,
      );
      return await operation(session, uri, outcome);
    },
  );
}

const hoverTool: ToolDefinition<typeof filePositionSchema> = {
  name: 'lsp_hover',
  description: 'Show type information and documentation for the symbol at a position.',
  parameters: filePositionSchema,
  create: (context) => ({
    async execute({ filePath, line, character }) {
      const hover = await withFile(
        context,
        filePath,
        (session, uri) => session.hover(uri, line, character),
      );
      return hover ?? 'No hover information';
    },
  }),
};

const gotoDefinitionTool: ToolDefinition<typeof filePositionSchema> = {
  name: 'lsp_goto_definition',
  description: 'Find where the symbol at a position is defined.',
  parameters: filePositionSchema,
  create: (context) => ({
    async execute({ filePath, line, character }) {
      const locations = await withFile(
        context,
        filePath,
        (session, uri) => session.definition(uri, line, character),
      );
      return listOr(
        locations.map((location) => formatLocation(location, context.workspaceRoot)),
        'No definition found',
      );
    },
  }),
};

const referencesSchema = filePositionSchema.extend({
  includeDeclaration: z
    .boolean()
    .default(true)
    .describe('Include the declaration itself in the results'),
});

const findReferencesTool: ToolDefinition<typeof referencesSchema> = {
  name: 'lsp_find_references',
  description: 'List every reference to the symbol at a position.',
  parameters: referencesSchema,
  create: (context) => ({
    async execute({ filePath, line, character, includeDeclaration }) {
      const locations = await withFile(
        context,
        filePath,
        (session, uri) => session.references(uri, line, character, includeDeclaration),
      );
      return listOr(
        locations.map((location) => formatLocation(location, context.workspaceRoot)),
        'No references found',
      );
    },
  }),
};

const documentSymbolsTool: ToolDefinition<typeof fileSchema> = {
  name: 'lsp_document_symbols',
  description: 'Outline the symbols declared in a file.',
  parameters: fileSchema,
  create: (context) => ({
    async execute({ filePath }) {
      const symbols = await withFile(
        context,
        filePath,
        (session, uri) => session.documentSymbols(uri),
      );
      return listOr(
        symbols.map((symbol) => {
          const name = symbol.containerName
            ? `${symbol.containerName}.${symbol.name}`
            : symbol.name;
          return `${name} (${symbol.kind}) - ${formatLineCol(symbol.range.start)}`;
        }),
        'No symbols found',
      );
    },
  }),
};

const workspaceSymbolsSchema = z.object({
  query: z.string().describe('Symbol name or fragment'),
  language: z.string().describe('Language whose server is asked, e.g. typescript'),
});

const workspaceSymbolsTool: ToolDefinition<typeof workspaceSymbolsSchema> = {
  name: 'lsp_workspace_symbols',
  description: 'Search the workspace for symbols matching a query.',
  parameters: workspaceSymbolsSchema,
  create: (context) => ({
    async execute({ query, language }) {
      const session = await context.pool.getOrCreateSession(
        context.workspaceRoot,
        language,
      );
      context.logger.debug(() => `${session.label}: workspace symbols for '${query}'`);
      const symbols = await session.workspaceSymbols(query);
      return listOr(
        symbols.map(
          (symbol) =>
            `${symbol.name} (${symbol.kind}) - ${formatLocation(symbol.location, context.workspaceRoot)}`,
        ),
        'No symbols found',
      );
    },
  }),
};

const completionSchema = filePositionSchema.extend({
  limit: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_COMPLETION_LIMIT)
    .describe('Maximum number of items returned'),
});

const completionTool: ToolDefinition<typeof completionSchema> = {
  name: 'lsp_completion',
  description: 'Suggest completions at a position.',
  parameters: completionSchema,
  create: (context) => ({
    async execute({ filePath, line, character, limit }) {
      const items = await withFile(
        context,
        filePath,
        (session, uri) => session.completion(uri, line, character),
      );
      return listOr(
        items
          .slice(0, limit)
          .map((item) => (item.detail ? `${item.label} - ${item.detail}` : item.label)),
        'No completions',
      );
    },
  }),
};

const diagnosticsSchema = fileSchema.extend({
  waitMs: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_DIAGNOSTICS_WAIT_MS)
    .describe('How long to wait for fresh diagnostics after syncing the file'),
});

const diagnosticsTool: ToolDefinition<typeof diagnosticsSchema> = {
  name: 'lsp_diagnostics',
  description: 'Report errors and warnings the language server found in a file.',
  parameters: diagnosticsSchema,
  create: (context) => ({
    async execute({ filePath, waitMs }) {
      const absolutePath = validateFilePath(filePath, context.workspaceRoot);
      const diagnostics = await withFile(
        context,
        absolutePath,
        async (session, uri, outcome) =>
          outcome === 'unchanged'
            ? session.getDiagnostics(uri)
            : await session.waitForDiagnostics(uri, waitMs),
      );
      return listOr(
        diagnostics.map((diagnostic) =>
          formatDiagnostic(absolutePath, diagnostic, context.workspaceRoot),
        ),
        'No diagnostics',
      );
    },
  }),
};

const noArgumentsSchema = z.object({});

const serverStatusTool: ToolDefinition<typeof noArgumentsSchema> = {
  name: 'lsp_server_status',
  description: 'List the running language server sessions and their states.',
  parameters: noArgumentsSchema,
  create: (context) => ({
    async execute() {
      return {
        workspaceRoot: context.workspaceRoot,
        sessions: context.pool.status(),
      };
    },
  }),
};

export function registerLspTools(registry: ToolRegistry): ToolRegistry {
  return registry
    .register(hoverTool)
    .register(gotoDefinitionTool)
    .register(findReferencesTool)
    .register(documentSymbolsTool)
    .register(workspaceSymbolsTool)
    .register(completionTool)
    .register(diagnosticsTool)
    .register(serverStatusTool);
}
