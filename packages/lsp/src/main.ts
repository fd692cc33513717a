import { realpathSync } from 'node:fs';
import { stderr } from 'node:process';
import type { Readable, Writable } from 'node:stream';
import { pathToFileURL } from 'node:url';

import { hideBin } from 'yargs/helpers';

import { ConfigurationManager, DebugLogger } from '@symbolgate/core';

import { parseArguments, resolveSettings, type GatewaySettings } from './config.js';
import { ProtocolGateway } from './gateway/gateway.js';
import { serveStdio } from './gateway/stdio-server.js';
import { ToolRegistry } from './gateway/tool-registry.js';
import { startWebSocketServer } from './gateway/websocket-server.js';
import { errorMessage } from './protocol/errors.js';
import { getBuiltinLanguages, mergeLanguageServers } from './service/languages.js';
import { SessionPool } from './service/session-pool.js';
import { DocumentTracker } from './tools/document-tracker.js';
import { registerLspTools } from './tools/lsp-tools.js';

export interface RunningGateway {
  settings: GatewaySettings;
  pool: SessionPool;
  /** Where the WebSocket server listens; absent for stdio. */
  url?: string;
  /** Settles when the stdio client disconnects; never for WebSocket. */
  done: Promise<void>;
  stop(): Promise<void>;
}

export interface GatewayIo {
  input?: Readable;
  output?: Writable;
}

/** Builds the pool, tools and gateway and starts the configured transport. */
export async function startGateway(
  settings: GatewaySettings,
  io: GatewayIo = {},
): Promise<RunningGateway> {
  const logger = DebugLogger.getLogger('symbolgate:main');
  const pool = new SessionPool({
    languages: mergeLanguageServers(getBuiltinLanguages(), settings.servers),
    requestTimeoutMs: settings.requestTimeoutMs,
    shutdownGraceMs: settings.shutdownGraceMs,
  });
  const registry = registerLspTools(new ToolRegistry());
  const gateway = new ProtocolGateway({
    registry,
    context: {
      workspaceRoot: settings.workspaceRoot,
      pool,
      documents: new DocumentTracker(),
      logger: DebugLogger.getLogger('symbolgate:tools'),
    },
  });

  if (settings.transport === 'websocket') {
    const server = await startWebSocketServer(gateway, {
      host: settings.host,
      port: settings.port,
      path: settings.path,
    });
    return {
      settings,
      pool,
      url: server.url,
      done: new Promise<void>(() => undefined),
      stop: async () => {
        await server.close();
        await pool.shutdownAll();
      },
    };
  }

  const stdio = await serveStdio(gateway, io.input, io.output);
  logger.log(`serving ${settings.workspaceRoot} over stdio`);
  return {
    settings,
    pool,
    done: stdio.closed.then(() => undefined),
    stop: async () => {
      await stdio.stop();
      await pool.shutdownAll();
    },
  };
}

export async function main(argv: readonly string[] = hideBin(process.argv)): Promise<void> {
  const settings = resolveSettings(await parseArguments(argv));
  if (settings.debug) {
    ConfigurationManager.getInstance().setCliConfig({
      enabled: true,
      namespaces: ['symbolgate:*'],
      level: 'debug',
    });
  }

  const running = await startGateway(settings);
  if (running.url) {
    stderr.write(`symbolgate listening on ${running.url}\n`);
  }

  let shuttingDown = false;
  const shutdown = async (code: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    try {
      await running.stop();
    } catch (error) {
      stderr.write(`Error during shutdown: ${errorMessage(error)}\n`);
    }
    process.exit(code);
  };

  process.on('SIGTERM', () => {
    void shutdown(0);
  });
  process.on('SIGINT', () => {
    void shutdown(0);
  });
  process.on('exit', () => {
    running.pool.dispose();
  });
  process.on('uncaughtException', (error) => {
    stderr.write(`Uncaught exception: ${errorMessage(error)}\n`);
    void shutdown(1);
  });
  process.on('unhandledRejection', (error) => {
    stderr.write(`Unhandled rejection: ${errorMessage(error)}\n`);
  });

  await running.done;
  await shutdown(0);
}

const isMainModule = (): boolean => {
  const argvEntry = process.argv[1];
  if (!argvEntry || !import.meta.url.startsWith('file://')) {
    return false;
  }

  try {
    return import.meta.url === pathToFileURL(realpathSync(argvEntry)).href;
  } catch {
    return false;
  }
};

/** Runs `main` and exits non-zero with the message on failure. */
export function runCli(argv?: readonly string[]): void {
  main(argv).catch((error: unknown) => {
    stderr.write(`${errorMessage(error)}\n`);
    process.exit(1);
  });
}

if (isMainModule()) {
  runCli();
}
