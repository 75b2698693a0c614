import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { handleToolCall } from './handlers/memoryHandlers.js';
import { MEMORY_TOOLS } from './handlers/toolDefinitions.js';
import { MemoryManager } from './utils/memory-manager.js';

export const SERVER_NAME = 'context-memory';
export const SERVER_VERSION = '0.3.0';

export function createServer(memory: MemoryManager): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Main request handler
  server.setRequestHandler(CallToolRequestSchema, async request => {
    return handleToolCall(request.params.name, request.params.arguments ?? {}, memory);
  });

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: MEMORY_TOOLS };
  });

  return server;
}
