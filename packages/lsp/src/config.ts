import { resolve } from 'node:path';

import yargs from 'yargs/yargs';
import { z } from 'zod';

import { ConfigError } from './protocol/errors.js';
import { PRODUCT_NAME, PRODUCT_VERSION } from './version.js';

export const BOOTSTRAP_ENV = 'SYMBOLGATE_BOOTSTRAP';

const serverOverrideSchema = z.strictObject({
  language: z.string().min(1),
  displayName: z.string().min(1).optional(),
  languageId: z.string().min(1).optional(),
  extensions: z.array(z.string().min(1)).min(1).optional(),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  env: z.record(z.string(), z.string()).optional(),
  initializationOptions: z.record(z.string(), z.unknown()).optional(),
});

export const gatewaySettingsSchema = z.strictObject({
  workspaceRoot: z.string().min(1),
  transport: z.enum(['stdio', 'websocket']).default('stdio'),
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(0).max(65_535).default(3000),
  path: z.string().startsWith('/').default('/mcp'),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  shutdownGraceMs: z.number().int().positive().default(2_000),
  debug: z.boolean().default(false),
  servers: z.array(serverOverrideSchema).default([]),
});

export type GatewaySettings = z.output<typeof gatewaySettingsSchema>;

export interface CliArgs {
  workspace?: string;
  transport?: string;
  host?: string;
  port?: number;
  path?: string;
  timeout?: number;
  debug?: boolean;
}

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.map(String).join('.')}: ${issue.message}`
      : issue.message,
  );

/** Reads the JSON object in SYMBOLGATE_BOOTSTRAP; absent means `{}`. */
export function readBootstrap(
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const raw = env[BOOTSTRAP_ENV];
  if (raw === undefined || raw.trim().length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError([`${BOOTSTRAP_ENV} must be valid JSON`]);
  }

  const record = z.record(z.string(), z.unknown()).safeParse(parsed);
  if (!record.success) {
    throw new ConfigError([`${BOOTSTRAP_ENV} must be a JSON object`]);
  }
  return record.data;
}

export async function parseArguments(argv: readonly string[]): Promise<CliArgs> {
  const parsed = await yargs([...argv])
    .locale('en')
    .scriptName(PRODUCT_NAME)
    .usage(
      '$0 [workspace] [options]',
      'Serve language-server tools to agents over JSON-RPC (stdio or WebSocket)',
    )
    .option('transport', {
      alias: 't',
      choices: ['stdio', 'websocket'],
      description: 'Protocol transport.',
    })
    .option('host', {
      type: 'string',
      description: 'WebSocket bind address.',
    })
    .option('port', {
      alias: 'p',
      type: 'number',
      description: 'WebSocket port.',
    })
    .option('path', {
      type: 'string',
      description: 'WebSocket route.',
    })
    .option('timeout', {
      type: 'number',
      description: 'Language server request timeout in milliseconds.',
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      description: 'Log to stderr at debug level.',
    })
    .strictOptions()
    .fail((message: string, error: Error | undefined) => {
      throw error ?? new ConfigError([message]);
    })
    .version(PRODUCT_VERSION)
    .help()
    .parseAsync();

  const [workspace] = parsed._;
  return {
    ...(workspace !== undefined ? { workspace: String(workspace) } : {}),
    ...(parsed.transport !== undefined ? { transport: parsed.transport } : {}),
    ...(parsed.host !== undefined ? { host: parsed.host } : {}),
    ...(parsed.port !== undefined ? { port: parsed.port } : {}),
    ...(parsed.path !== undefined ? { path: parsed.path } : {}),
    ...(parsed.timeout !== undefined ? { timeout: parsed.timeout } : {}),
    ...(parsed.debug !== undefined ? { debug: parsed.debug } : {}),
  };
}

/**
 * Layers CLI flags over the bootstrap environment variable and validates the
 * result. Every problem is reported at once in a ConfigError.
 */
export function resolveSettings(
  cli: CliArgs,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): GatewaySettings {
  const bootstrap = readBootstrap(env);
  const flags: Record<string, unknown> = {
    workspaceRoot: cli.workspace,
    transport: cli.transport,
    host: cli.host,
    port: cli.port,
    path: cli.path,
    requestTimeoutMs: cli.timeout,
    debug: cli.debug,
  };

  const merged: Record<string, unknown> = { ...bootstrap };
  for (const [key, value] of Object.entries(flags)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  merged.workspaceRoot ??= cwd;

  const parsed = gatewaySettingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return {
    ...parsed.data,
    workspaceRoot: resolve(cwd, parsed.data.workspaceRoot),
  };
}
