import { basename, extname } from 'node:path';

import { ConfigError } from '../protocol/errors.js';

export interface LanguageServerEntry {
  /** Pool key, e.g. `python`. */
  language: string;
  displayName: string;
  /** Identifier sent in `textDocument/didOpen`. */
  languageId: string;
  extensions: readonly string[];
  command: string;
  args?: readonly string[];
  env?: Readonly<Record<string, string>>;
  initializationOptions?: Readonly<Record<string, unknown>>;
}

/**
 * A user entry replaces or extends the built-in one with the same
 * `language`; `command: ''` removes the language.
 */
export type LanguageServerOverride = Partial<
  Omit<LanguageServerEntry, 'language'>
> & { language: string };

const BUILTIN_LANGUAGES: readonly LanguageServerEntry[] = [
  {
    language: 'python',
    displayName: 'Python',
    languageId: 'python',
    extensions: ['.py', '.pyi'],
    command: 'pyright-langserver',
    args: ['--stdio'],
  },
  {
    language: 'kotlin',
    displayName: 'Kotlin',
    languageId: 'kotlin',
    extensions: ['.kt', '.kts'],
    command: 'kotlin-language-server',
  },
  {
    language: 'java',
    displayName: 'Java',
    languageId: 'java',
    extensions: ['.java'],
    command: 'jdtls',
  },
  {
    language: 'typescript',
    displayName: 'TypeScript',
    languageId: 'typescript',
    extensions: ['.ts', '.tsx', '.mts', '.cts'],
    command: 'typescript-language-server',
    args: ['--stdio'],
  },
  {
    language: 'javascript',
    displayName: 'JavaScript',
    languageId: 'javascript',
    extensions: ['.js', '.jsx', '.mjs', '.cjs'],
    command: 'typescript-language-server',
    args: ['--stdio'],
  },
  {
    language: 'go',
    displayName: 'Go',
    languageId: 'go',
    extensions: ['.go'],
    command: 'gopls',
  },
  {
    language: 'rust',
    displayName: 'Rust',
    languageId: 'rust',
    extensions: ['.rs'],
    command: 'rust-analyzer',
  },
  {
    language: 'csharp',
    displayName: 'C#',
    languageId: 'csharp',
    extensions: ['.cs'],
    command: 'omnisharp',
    args: ['--languageserver'],
  },
  {
    language: 'php',
    displayName: 'PHP',
    languageId: 'php',
    extensions: ['.php'],
    command: 'intelephense',
    args: ['--stdio'],
  },
  {
    language: 'ruby',
    displayName: 'Ruby',
    languageId: 'ruby',
    extensions: ['.rb', '.rake', '.gemspec'],
    command: 'solargraph',
    args: ['stdio'],
  },
  {
    language: 'elixir',
    displayName: 'Elixir',
    languageId: 'elixir',
    extensions: ['.ex', '.exs'],
    command: 'elixir-ls',
  },
  {
    language: 'clojure',
    displayName: 'Clojure',
    languageId: 'clojure',
    extensions: ['.clj', '.cljs', '.cljc'],
    command: 'clojure-lsp',
  },
  {
    language: 'dart',
    displayName: 'Dart',
    languageId: 'dart',
    extensions: ['.dart'],
    command: 'dart',
    args: ['language-server'],
  },
  {
    language: 'terraform',
    displayName: 'Terraform',
    languageId: 'terraform',
    extensions: ['.tf', '.tfvars'],
    command: 'terraform-ls',
    args: ['serve'],
  },
];

const cloneEntry = (entry: LanguageServerEntry): LanguageServerEntry => ({
  ...entry,
  extensions: [...entry.extensions],
  args: entry.args ? [...entry.args] : undefined,
  env: entry.env ? { ...entry.env } : undefined,
  initializationOptions: entry.initializationOptions
    ? { ...entry.initializationOptions }
    : undefined,
});

const normalizeExtension = (ext: string): string => {
  const lower = ext.toLowerCase();
  return lower.length === 0 || lower.startsWith('.') ? lower : `.${lower}`;
};

export const getBuiltinLanguages = (): LanguageServerEntry[] =>
  BUILTIN_LANGUAGES.map(cloneEntry);

export const mergeLanguageServers = (
  builtins: readonly LanguageServerEntry[],
  overrides?: readonly LanguageServerOverride[],
): LanguageServerEntry[] => {
  const merged = new Map<string, LanguageServerEntry>();
  for (const builtin of builtins) {
    merged.set(builtin.language, cloneEntry(builtin));
  }

  for (const override of overrides ?? []) {
    if (override.command === '') {
      merged.delete(override.language);
      continue;
    }

    const base = merged.get(override.language);
    if (base) {
      merged.set(override.language, cloneEntry({ ...base, ...override }));
      continue;
    }

    const { command, extensions } = override;
    if (!command || !extensions || extensions.length === 0) {
      throw new ConfigError([
        `servers.${override.language}: a new language needs a command and at least one extension`,
      ]);
    }
    merged.set(
      override.language,
      cloneEntry({
        ...override,
        displayName: override.displayName ?? override.language,
        languageId: override.languageId ?? override.language,
        extensions: extensions.map(normalizeExtension),
        command,
      }),
    );
  }

  return [...merged.values()];
};

export const findLanguage = (
  language: string,
  table: readonly LanguageServerEntry[],
): LanguageServerEntry | undefined =>
  table.find((entry) => entry.language === language);

/**
 * Picks the language whose extension list matches the file name; the first
 * table entry wins when two languages share an extension.
 */
export const languageForFile = (
  filePath: string,
  table: readonly LanguageServerEntry[],
): LanguageServerEntry | undefined => {
  const extension = normalizeExtension(extname(basename(filePath)));
  if (extension.length === 0) {
    return undefined;
  }
  return table.find((entry) =>
    entry.extensions.some((candidate) => normalizeExtension(candidate) === extension),
  );
};
