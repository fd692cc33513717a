import {
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { DebugLogger } from '@symbolgate/core';

import {
  InvalidParamsError,
  UnknownMethodError,
  errorMessage,
} from '../protocol/errors.js';
import { RequestMultiplexer } from '../rpc/multiplexer.js';
import type { MessageTransport } from '../transport/transport.js';
import { PRODUCT_NAME, PRODUCT_VERSION } from '../version.js';
import type { ToolContext, ToolRegistry } from './tool-registry.js';

export interface GatewayOptions {
  registry: ToolRegistry;
  context: ToolContext;
  name?: string;
  version?: string;
  logger?: DebugLogger;
}

export interface AttachOptions {
  label?: string;
  inbound: 'sequential' | 'concurrent';
}

export type TextContent = { type: 'text'; text: string };

export interface ToolCallResult {
  content: TextContent[];
  isError: boolean;
}

const initializeParamsSchema = z.looseObject({
  protocolVersion: z.string().optional(),
  clientInfo: z
    .looseObject({ name: z.string(), version: z.string().optional() })
    .optional(),
});

const toolCallParamsSchema = z.object({
  name: z.string(),
  arguments: z.record(z.string(), z.unknown()).optional(),
});

const toText = (value: unknown): string =>
  typeof value === 'string' ? value : (JSON.stringify(value, null, 2) ?? 'null');

/**
 * Answers the agent-facing JSON-RPC methods over any transport: handshake,
 * tool listing and tool calls. A failing tool is reported as an `isError`
 * result and never takes the connection down.
 */
export class ProtocolGateway {
  private readonly logger: DebugLogger;

  constructor(private readonly options: GatewayOptions) {
    this.logger = options.logger ?? DebugLogger.getLogger('symbolgate:gateway');
  }

  attach(transport: MessageTransport, options: AttachOptions): RequestMultiplexer {
    const label = options.label ?? transport.label;
    const rpc = new RequestMultiplexer(transport, {
      label,
      inbound: options.inbound,
      malformed: 'reply',
      logger: this.logger,
    });
    rpc.setFallbackHandler((method, params) => this.handle(method, params));
    rpc.onNotification((method) => {
      if (method === 'initialized' || method === 'notifications/initialized') {
        this.logger.log(`${label}: client initialized`);
        return;
      }
      this.logger.debug(() => `${label}: ignoring notification '${method}'`);
    });
    transport.onClose((reason) => {
      this.logger.debug(() => `${label}: disconnected (${reason.message})`);
    });
    return rpc;
  }

  async handle(method: string, params: unknown): Promise<unknown> {
    switch (method) {
      case 'initialize':
        return this.initialize(params);
      case 'tools/list':
        return { tools: this.options.registry.list() };
      case 'tools/call':
        return await this.callTool(params);
      case 'ping':
        return {};
      case 'prompts/list':
        return { prompts: [] };
      case 'resources/list':
        return { resources: [] };
      default:
        throw new UnknownMethodError(method);
    }
  }

  private initialize(params: unknown): Record<string, unknown> {
    const parsed = initializeParamsSchema.safeParse(params ?? {});
    const requested = parsed.success ? parsed.data.protocolVersion : undefined;
    const protocolVersion =
      requested !== undefined && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
        ? requested
        : LATEST_PROTOCOL_VERSION;

    const client = parsed.success ? parsed.data.clientInfo : undefined;
    this.logger.log(
      `initialize from ${client?.name ?? 'unknown client'}, protocol ${protocolVersion}`,
    );

    return {
      protocolVersion,
      capabilities: {
        tools: { listChanged: false },
        logging: {},
        prompts: { listChanged: false },
        resources: { subscribe: false, listChanged: false },
      },
      serverInfo: {
        name: this.options.name ?? PRODUCT_NAME,
        version: this.options.version ?? PRODUCT_VERSION,
      },
    };
  }

  private async callTool(params: unknown): Promise<ToolCallResult> {
    const parsed = toolCallParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new InvalidParamsError(
        'tools/call requires a string "name" and an optional "arguments" object',
      );
    }

    const { name } = parsed.data;
    const run = this.options.registry.prepare(
      name,
      parsed.data.arguments ?? {},
      this.options.context,
    );

    const startedAt = Date.now();
    try {
      const text = toText(await run());
      this.logger.debug(() => `tool ${name} finished in ${Date.now() - startedAt}ms`);
      return { content: [{ type: 'text', text }], isError: false };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`tool ${name} failed: ${message}`);
      return { content: [{ type: 'text', text: message }], isError: true };
    }
  }
}
