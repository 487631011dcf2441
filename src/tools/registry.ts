/**
 * Tool Registry
 *
 * Explicit name → tool table, built once at startup. The MCP handlers in
 * index.ts only ever go through list() and call().
 */

import type { z } from 'zod';
import { parseArguments } from '../adapter/arguments.js';
import type { ServerContext } from '../context.js';
import { notFound } from '../errors.js';
import { errorResult, jsonResult, type ToolResult } from './results.js';

/** JSON Schema for a tool's arguments, as advertised in tools/list. */
export interface ToolInputSchema {
  [key: string]: unknown;
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  args: S;
  handler: (args: z.output<S>, ctx: ServerContext) => unknown;
}

export interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  invoke(rawArgs: unknown, ctx: ServerContext): Promise<unknown>;
}

export interface ToolListing {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  annotations: { readOnlyHint: true };
}

/** Binds a definition's argument schema to its handler. */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async invoke(rawArgs, ctx) {
      const args = parseArguments(definition.args, rawArgs);
      return await definition.handler(args, ctx);
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(tools: readonly RegisteredTool[]) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolListing[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      annotations: { readOnlyHint: true },
    }));
  }

  async call(name: string, rawArgs: unknown, ctx: ServerContext): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      ctx.log.warn({ tool: name }, 'Unknown tool requested');
      return jsonResult(notFound(`Unknown tool: ${name}`, { available_tools: this.names() }));
    }

    ctx.log.debug({ tool: name }, 'Tool invoked');
    try {
      return jsonResult(await tool.invoke(rawArgs, ctx));
    } catch (error) {
      ctx.log.warn({ tool: name, err: error }, 'Tool invocation failed');
      return errorResult(error);
    }
  }
}
