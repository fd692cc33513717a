import { describe, expect, it } from 'vitest';

import {
  completionKindName,
  mapSeverity,
  symbolKindName,
  toCompletionItems,
  toDocumentSymbols,
  toHoverText,
  toInitializeResult,
  toLocations,
  toPublishedDiagnostics,
  toWorkspaceSymbols,
} from '../src/service/lsp-types.js';
import { fromFileUri, toFileUri } from '../src/service/uri.js';

const range = (line: number, start: number, end: number) => ({
  start: { line, character: start },
  end: { line, character: end },
});

describe('kind names', () => {
  it('maps 1-based kinds and labels unknown ones', () => {
    expect(symbolKindName(1)).toBe('file');
    expect(symbolKindName(12)).toBe('function');
    expect(symbolKindName(26)).toBe('typeParameter');
    expect(symbolKindName(99)).toBe('kind(99)');
    expect(completionKindName(3)).toBe('function');
    expect(completionKindName(0)).toBe('kind(0)');
  });

  it('treats missing and unknown severities as errors', () => {
    expect(mapSeverity(1)).toBe('error');
    expect(mapSeverity(2)).toBe('warning');
    expect(mapSeverity(3)).toBe('info');
    expect(mapSeverity(4)).toBe('hint');
    expect(mapSeverity(undefined)).toBe('error');
    expect(mapSeverity(7)).toBe('error');
  });
});

describe('toInitializeResult', () => {
  it('requires a capabilities object', () => {
    expect(toInitializeResult({ capabilities: {}, serverInfo: { name: 'srv' } })).toEqual({
      capabilities: {},
      serverInfo: { name: 'srv' },
    });
    expect(toInitializeResult({ serverInfo: { name: 'srv' } })).toBeNull();
    expect(toInitializeResult(null)).toBeNull();
  });
});

describe('toLocations', () => {
  it('accepts a single location, an array or nothing', () => {
    const location = { uri: 'file:///a.ts', range: range(1, 2, 3) };

    expect(toLocations(location)).toEqual([location]);
    expect(toLocations([location, { bogus: true }])).toEqual([location]);
    expect(toLocations(null)).toEqual([]);
  });

  it('falls back to the target range of a link', () => {
    expect(
      toLocations([{ targetUri: 'file:///b.ts', targetRange: range(4, 0, 10) }]),
    ).toEqual([{ uri: 'file:///b.ts', range: range(4, 0, 10) }]);
  });
});

describe('toHoverText', () => {
  it('reads every shape of hover contents', () => {
    expect(toHoverText({ contents: 'plain' })).toBe('plain');
    expect(toHoverText({ contents: { kind: 'markdown', value: '**bold**' } })).toBe('**bold**');
    expect(
      toHoverText({ contents: [{ language: 'ts', value: 'let a: number' }, 'docs'] }),
    ).toBe('let a: number\ndocs');
  });

  it('returns null for empty or missing hovers', () => {
    expect(toHoverText(null)).toBeNull();
    expect(toHoverText({ contents: '   ' })).toBeNull();
    expect(toHoverText({ contents: [] })).toBeNull();
  });
});

describe('toDocumentSymbols', () => {
  it('flattens hierarchical symbols with their container', () => {
    expect(
      toDocumentSymbols([
        {
          name: 'Widget',
          kind: 5,
          range: range(0, 0, 40),
          selectionRange: range(0, 6, 12),
          children: [
            { name: 'render', kind: 6, detail: '(): void', range: range(1, 2, 20), selectionRange: range(1, 2, 8) },
          ],
        },
        { name: 'helper', kind: 12, range: range(42, 0, 10), selectionRange: range(42, 9, 15) },
      ]),
    ).toEqual([
      { name: 'Widget', kind: 'class', range: range(0, 0, 40) },
      {
        name: 'render',
        kind: 'method',
        detail: '(): void',
        containerName: 'Widget',
        range: range(1, 2, 20),
      },
      { name: 'helper', kind: 'function', range: range(42, 0, 10) },
    ]);
  });

  it('maps flat symbol information', () => {
    expect(
      toDocumentSymbols([
        {
          name: 'run',
          kind: 12,
          containerName: 'tasks',
          location: { uri: 'file:///t.py', range: range(3, 0, 9) },
        },
      ]),
    ).toEqual([{ name: 'run', kind: 'function', containerName: 'tasks', range: range(3, 0, 9) }]);
  });

  it('returns nothing for a null result', () => {
    expect(toDocumentSymbols(null)).toEqual([]);
  });
});

describe('toWorkspaceSymbols', () => {
  it('fills in a missing range', () => {
    expect(
      toWorkspaceSymbols([{ name: 'Config', kind: 11, location: { uri: 'file:///c.ts' } }]),
    ).toEqual([
      { name: 'Config', kind: 'interface', location: { uri: 'file:///c.ts', range: range(0, 0, 0) } },
    ]);
  });
});

describe('toCompletionItems', () => {
  it('accepts a completion list or a bare array', () => {
    const item = {
      label: 'forEach',
      kind: 2,
      detail: '(callback) => void',
      documentation: { kind: 'markdown', value: 'Calls callback for each element' },
    };
    const expected = [
      {
        label: 'forEach',
        kind: 'method',
        detail: '(callback) => void',
        documentation: 'Calls callback for each element',
      },
    ];

    expect(toCompletionItems({ isIncomplete: false, items: [item] })).toEqual(expected);
    expect(toCompletionItems([item])).toEqual(expected);
    expect(toCompletionItems(null)).toEqual([]);
  });
});

describe('toPublishedDiagnostics', () => {
  it('keeps the version and drops malformed entries', () => {
    expect(
      toPublishedDiagnostics({
        uri: 'file:///a.py',
        version: 3,
        diagnostics: [
          { range: range(0, 0, 1), message: 'undefined name', severity: 1, source: 'pyright' },
          { range: range(1, 0, 1) },
        ],
      }),
    ).toEqual({
      uri: 'file:///a.py',
      version: 3,
      diagnostics: [
        { range: range(0, 0, 1), severity: 'error', message: 'undefined name', source: 'pyright' },
      ],
    });
    expect(toPublishedDiagnostics({ diagnostics: [] })).toBeNull();
  });
});

describe('file URIs', () => {
  it('converts paths to file URIs and back', () => {
    expect(toFileUri('/workspace/project/a b.ts')).toBe('file:///workspace/project/a%20b.ts');
    expect(toFileUri('file:///already/uri.ts')).toBe('file:///already/uri.ts');
    expect(fromFileUri('file:///workspace/project/a%20b.ts')).toBe('/workspace/project/a b.ts');
    expect(fromFileUri('/plain/path.ts')).toBe('/plain/path.ts');
  });
});
