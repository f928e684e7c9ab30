import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { Tool, CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ToolName } from '../types/tools.js';

// Use official MCP types instead of custom ones
export interface ToolDefinition extends Tool {}

export interface ToolContext {
  server: Server;
  /**
   * Sends a progress notification when the caller asked for progress,
   * a no-op otherwise.
   */
  progress(progress: number, total: number, message: string): Promise<void>;
}

export type ToolHandler<TInput> = (input: TInput, context: ToolContext) => Promise<CallToolResult>;

export interface ToolConfig<TSchema extends z.ZodTypeAny> {
  name: ToolName;
  description: string;
  inputSchema: TSchema;
  handler: ToolHandler<z.infer<TSchema>>;
}

/**
 * A tool with its input type erased, so tools with different schemas can
 * share one registry. Arguments are validated before the handler runs.
 */
export interface RegisteredTool {
  name: ToolName;
  description: string;
  definition: ToolDefinition;
  execute(args: unknown, context: ToolContext): Promise<CallToolResult>;
}

export function defineTool<TSchema extends z.ZodTypeAny>(config: ToolConfig<TSchema>): RegisteredTool {
  return {
    name: config.name,
    description: config.description,
    definition: createToolDefinition(config.name, config.description, config.inputSchema),
    execute: (args, context) => config.handler(config.inputSchema.parse(args ?? {}), context),
  };
}

const JsonObjectSchema = z.object({
  properties: z.record(z.unknown()).default({}),
  required: z.array(z.string()).optional(),
  description: z.string().optional(),
});

/**
 * Creates a tool definition from a Zod schema
 * Ensures compatibility with MCP protocol requirements
 */
export function createToolDefinition(
  name: string,
  description: string,
  schema: z.ZodTypeAny
): ToolDefinition {
  // Inline everything: MCP clients expect a plain object schema without $ref
  const jsonSchema = JsonObjectSchema.parse(zodToJsonSchema(schema, { $refStrategy: 'none' }));

  return {
    name,
    description,
    inputSchema: {
      type: 'object',
      properties: jsonSchema.properties,
      ...(jsonSchema.required && jsonSchema.required.length > 0 ? { required: jsonSchema.required } : {}),
      ...(jsonSchema.description ? { description: jsonSchema.description } : {}),
    },
  };
}

/**
 * Tool registry keyed by tool name
 */
export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  /**
   * Get all tool definitions for MCP
   */
  getToolDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map(tool => tool.definition);
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }
}
