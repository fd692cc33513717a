import { z } from 'zod';

import type { DebugLogger } from '@symbolgate/core';

import { InvalidParamsError, UnknownToolError } from '../protocol/errors.js';
import type { SessionPool } from '../service/session-pool.js';
import type { DocumentTracker } from '../tools/document-tracker.js';

/** Everything a tool may touch, built once at startup. */
export interface ToolContext {
  workspaceRoot: string;
  pool: SessionPool;
  documents: DocumentTracker;
  logger: DebugLogger;
}

export interface Tool<TArgs> {
  /** Strings are sent as text; anything else as pretty-printed JSON. */
  execute(args: TArgs): Promise<unknown>;
}

export interface ToolDefinition<TSchema extends z.ZodType> {
  name: string;
  description: string;
  parameters: TSchema;
  create(context: ToolContext): Tool<z.output<TSchema>>;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

/** A validated call, ready to execute. */
export type PreparedToolCall = () => Promise<unknown>;

interface RegisteredTool {
  descriptor: ToolDescriptor;
  prepare(context: ToolContext, args: unknown): PreparedToolCall;
}

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');

/**
 * Tools are registered explicitly by name; `tools/list` and `tools/call`
 * are answered from this table.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register<TSchema extends z.ZodType>(
    definition: ToolDefinition<TSchema>,
  ): this {
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool already registered: ${definition.name}`);
    }

    const inputSchema: Record<string, unknown> = {
      ...z.toJSONSchema(definition.parameters, { io: 'input' }),
    };
    delete inputSchema.$schema;

    this.tools.set(definition.name, {
      descriptor: {
        name: definition.name,
        description: definition.description,
        inputSchema,
      },
      prepare: (context, args) => {
        const parsed = definition.parameters.safeParse(args ?? {});
        if (!parsed.success) {
          throw new InvalidParamsError(
            `Invalid arguments for tool '${definition.name}': ${formatIssues(parsed.error)}`,
          );
        }
        return async () => await definition.create(context).execute(parsed.data);
      },
    });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => tool.descriptor);
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name)?.descriptor;
  }

  /**
   * Resolves and validates a call without running it, so that an unknown
   * name or bad arguments can be told apart from a failure of the tool.
   */
  prepare(name: string, args: unknown, context: ToolContext): PreparedToolCall {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    return tool.prepare(context, args);
  }

  async call(name: string, args: unknown, context: ToolContext): Promise<unknown> {
    return await this.prepare(name, args, context)();
  }
}
