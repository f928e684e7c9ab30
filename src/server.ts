import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import registerPrompts from './prompts.js';
import registerTools from './tools.js';
import registerResources from './resources.js';

export const SERVER_NAME = 'mcp-sub2clip';
export const SERVER_VERSION = '1.0.0';

export function createServer(): Server {
  const server = new Server({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    title: 'Sub2Clip MCP Server',
  },
    {
      capabilities: {
        prompts: {},
        resources: { listChanged: true },
        tools: {},
        logging: {},
      },
    }
  );

  registerPrompts(server);
  registerResources(server);
  registerTools(server);

  return server;
}
