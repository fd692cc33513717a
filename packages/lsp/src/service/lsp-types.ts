import { z } from 'zod';

const positionSchema = z.object({
  line: z.number().int().nonnegative(),
  character: z.number().int().nonnegative(),
});

const rangeSchema = z.object({
  start: positionSchema,
  end: positionSchema,
});

const locationSchema = z.object({
  uri: z.string(),
  range: rangeSchema,
});

const locationLinkSchema = z.object({
  targetUri: z.string(),
  targetRange: rangeSchema,
  targetSelectionRange: rangeSchema.optional(),
});

export type Position = z.infer<typeof positionSchema>;
export type Range = z.infer<typeof rangeSchema>;
export type Location = z.infer<typeof locationSchema>;

export interface DocumentSymbol {
  name: string;
  kind: string;
  detail?: string;
  containerName?: string;
  range: Range;
}

export interface WorkspaceSymbol {
  name: string;
  kind: string;
  containerName?: string;
  location: Location;
}

export interface CompletionItem {
  label: string;
  kind?: string;
  detail?: string;
  documentation?: string;
  insertText?: string;
}

export type DiagnosticSeverity = 'error' | 'warning' | 'info' | 'hint';

export interface Diagnostic {
  range: Range;
  severity: DiagnosticSeverity;
  message: string;
  code?: string | number;
  source?: string;
}

export interface PublishedDiagnostics {
  uri: string;
  version?: number;
  diagnostics: Diagnostic[];
}

export type ServerCapabilities = Record<string, unknown>;

export interface InitializeResult {
  capabilities: ServerCapabilities;
  serverInfo?: { name: string; version?: string };
}

const SYMBOL_KINDS = [
  'file',
  'module',
  'namespace',
  'package',
  'class',
  'method',
  'property',
  'field',
  'constructor',
  'enum',
  'interface',
  'function',
  'variable',
  'constant',
  'string',
  'number',
  'boolean',
  'array',
  'object',
  'key',
  'null',
  'enumMember',
  'struct',
  'event',
  'operator',
  'typeParameter',
] as const;

const COMPLETION_KINDS = [
  'text',
  'method',
  'function',
  'constructor',
  'field',
  'variable',
  'class',
  'interface',
  'module',
  'property',
  'unit',
  'value',
  'enum',
  'keyword',
  'snippet',
  'color',
  'file',
  'reference',
  'folder',
  'enumMember',
  'constant',
  'struct',
  'event',
  'operator',
  'typeParameter',
] as const;

/** LSP kinds are 1-based. */
const kindName = (table: readonly string[], kind: number): string =>
  table[kind - 1] ?? `kind(${kind})`;

export const symbolKindName = (kind: number): string =>
  kindName(SYMBOL_KINDS, kind);

export const completionKindName = (kind: number): string =>
  kindName(COMPLETION_KINDS, kind);

export function mapSeverity(lspSeverity: number | undefined): DiagnosticSeverity {
  switch (lspSeverity) {
    case 2:
      return 'warning';
    case 3:
      return 'info';
    case 4:
      return 'hint';
    default:
      return 'error';
  }
}

const markupSchema = z.union([
  z.string(),
  z.object({ value: z.string() }),
]);

const markupText = (value: z.infer<typeof markupSchema>): string =>
  typeof value === 'string' ? value : value.value;

/** Keeps the items of `values` that match `schema`, dropping the rest. */
function parseEach<T>(values: unknown, schema: z.ZodType<T>): T[] {
  if (!Array.isArray(values)) {
    return [];
  }
  return values.flatMap((value: unknown) => {
    const parsed = schema.safeParse(value);
    return parsed.success ? [parsed.data] : [];
  });
}

const initializeResultSchema = z.object({
  capabilities: z.record(z.string(), z.unknown()),
  serverInfo: z
    .object({ name: z.string(), version: z.string().optional() })
    .optional(),
});

/** Returns null when the server's reply is not an InitializeResult. */
export function toInitializeResult(result: unknown): InitializeResult | null {
  const parsed = initializeResultSchema.safeParse(result);
  return parsed.success ? parsed.data : null;
}

export function toLocations(result: unknown): Location[] {
  const items = Array.isArray(result) ? result : result ? [result] : [];
  return items.flatMap((item: unknown) => {
    const location = locationSchema.safeParse(item);
    if (location.success) {
      return [location.data];
    }
    const link = locationLinkSchema.safeParse(item);
    if (link.success) {
      return [
        {
          uri: link.data.targetUri,
          range: link.data.targetSelectionRange ?? link.data.targetRange,
        },
      ];
    }
    return [];
  });
}

const hoverSchema = z.object({
  contents: z.union([markupSchema, z.array(markupSchema)]),
});

export function toHoverText(result: unknown): string | null {
  const parsed = hoverSchema.safeParse(result);
  if (!parsed.success) {
    return null;
  }
  const contents = parsed.data.contents;
  const text = Array.isArray(contents)
    ? contents.map(markupText).join('\n')
    : markupText(contents);
  return text.trim().length > 0 ? text : null;
}

interface RawDocumentSymbol {
  name: string;
  kind: number;
  detail?: string;
  range: Range;
  children?: RawDocumentSymbol[];
}

const documentSymbolSchema: z.ZodType<RawDocumentSymbol> = z.object({
  name: z.string(),
  kind: z.number(),
  detail: z.string().optional(),
  range: rangeSchema,
  children: z.lazy(() => z.array(documentSymbolSchema)).optional(),
});

const symbolInformationSchema = z.object({
  name: z.string(),
  kind: z.number(),
  containerName: z.string().optional(),
  location: locationSchema,
});

function flattenSymbols(
  symbols: readonly RawDocumentSymbol[],
  containerName: string | undefined,
): DocumentSymbol[] {
  return symbols.flatMap((symbol) => [
    {
      name: symbol.name,
      kind: symbolKindName(symbol.kind),
      ...(symbol.detail ? { detail: symbol.detail } : {}),
      ...(containerName ? { containerName } : {}),
      range: symbol.range,
    },
    ...flattenSymbols(symbol.children ?? [], symbol.name),
  ]);
}

/**
 * Accepts both the hierarchical DocumentSymbol[] and the flat
 * SymbolInformation[] shapes; children are flattened in document order.
 */
export function toDocumentSymbols(result: unknown): DocumentSymbol[] {
  const hierarchical = parseEach(result, documentSymbolSchema);
  const flat = parseEach(result, symbolInformationSchema);
  if (hierarchical.length === 0 && flat.length > 0) {
    return flat.map((symbol) => ({
      name: symbol.name,
      kind: symbolKindName(symbol.kind),
      ...(symbol.containerName ? { containerName: symbol.containerName } : {}),
      range: symbol.location.range,
    }));
  }
  return flattenSymbols(hierarchical, undefined);
}

const EMPTY_RANGE: Range = {
  start: { line: 0, character: 0 },
  end: { line: 0, character: 0 },
};

const workspaceSymbolSchema = z.object({
  name: z.string(),
  kind: z.number(),
  containerName: z.string().optional(),
  location: z.object({ uri: z.string(), range: rangeSchema.optional() }),
});

export function toWorkspaceSymbols(result: unknown): WorkspaceSymbol[] {
  return parseEach(result, workspaceSymbolSchema).map((symbol) => ({
    name: symbol.name,
    kind: symbolKindName(symbol.kind),
    ...(symbol.containerName ? { containerName: symbol.containerName } : {}),
    location: {
      uri: symbol.location.uri,
      range: symbol.location.range ?? EMPTY_RANGE,
    },
  }));
}

const completionItemSchema = z.object({
  label: z.string(),
  kind: z.number().optional(),
  detail: z.string().optional(),
  documentation: markupSchema.optional(),
  insertText: z.string().optional(),
});

export function toCompletionItems(result: unknown): CompletionItem[] {
  const list = z.object({ items: z.array(z.unknown()) }).safeParse(result);
  const items = list.success ? list.data.items : result;
  return parseEach(items, completionItemSchema).map((item) => ({
    label: item.label,
    ...(item.kind !== undefined ? { kind: completionKindName(item.kind) } : {}),
    ...(item.detail ? { detail: item.detail } : {}),
    ...(item.documentation !== undefined
      ? { documentation: markupText(item.documentation) }
      : {}),
    ...(item.insertText ? { insertText: item.insertText } : {}),
  }));
}

const diagnosticSchema = z.object({
  range: rangeSchema,
  severity: z.number().optional(),
  message: z.string(),
  code: z.union([z.string(), z.number()]).optional(),
  source: z.string().optional(),
});

const publishDiagnosticsSchema = z.object({
  uri: z.string(),
  version: z.number().optional(),
  diagnostics: z.array(z.unknown()),
});

export function toPublishedDiagnostics(
  params: unknown,
): PublishedDiagnostics | null {
  const parsed = publishDiagnosticsSchema.safeParse(params);
  if (!parsed.success) {
    return null;
  }
  return {
    uri: parsed.data.uri,
    ...(parsed.data.version !== undefined
      ? { version: parsed.data.version }
      : {}),
    diagnostics: parseEach(parsed.data.diagnostics, diagnosticSchema).map(
      (diagnostic) => ({
        range: diagnostic.range,
        severity: mapSeverity(diagnostic.severity),
        message: diagnostic.message,
        ...(diagnostic.code !== undefined ? { code: diagnostic.code } : {}),
        ...(diagnostic.source ? { source: diagnostic.source } : {}),
      }),
    ),
  };
}
