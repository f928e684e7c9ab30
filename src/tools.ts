import {
  ListToolsRequestSchema,
  CallToolRequestSchema
} from "@modelcontextprotocol/sdk/types.js";
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { ToolContext, ToolRegistry } from "./utils/toolDefinition.js";
import { ALL_TOOLS } from "./tools/index.js";
import { handleError } from "./types/errors.js";
import { logger } from "./logger.js";

const log = logger.child({ component: 'tools' });

export function createToolRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of ALL_TOOLS) {
    registry.register(tool);
  }
  return registry;
}

export default function registerTools(server: Server, registry: ToolRegistry = createToolRegistry()) {
  log.debug('Registering tools', { tools: registry.getToolNames() });

  // List tools handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: registry.getToolDefinitions(),
    };
  });

  // Call tool handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name: action, arguments: args } = request.params;

    const tool = registry.get(action);
    if (!tool) {
      throw new Error(`Unknown tool: ${action}`);
    }

    // Extract progress token from request metadata
    const progressToken = request.params._meta?.progressToken;

    const context: ToolContext = {
      server,
      progress: async (progress, total, message) => {
        if (progressToken === undefined) return;
        await server.notification({
          method: "notifications/progress",
          params: {
            progress,
            total,
            progressToken,
            message
          },
        });
      },
    };

    try {
      return await tool.execute(args, context);
    } catch (error) {
      log.error(`Tool ${action} failed`, error);
      return handleError(error);
    }
  });
}
