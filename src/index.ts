#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';
import { loadConfig } from './utils/config.js';
import { errorMessage } from './utils/errors.js';
import { MemoryManager } from './utils/memory-manager.js';

export { MemoryManager } from './utils/memory-manager.js';
export type { MemoryManagerOptions } from './utils/memory-manager.js';
export { formatContext } from './utils/context-retriever.js';
export { loadConfig } from './utils/config.js';
export type { MemoryConfig } from './utils/config.js';
export { StorageError, NotFoundError } from './utils/errors.js';
export { ValidationError } from './utils/validation.js';
export * from './types/entities.js';
export * from './repositories/index.js';

async function main(): Promise<void> {
  const memory = new MemoryManager({ config: loadConfig() });
  const server = createServer(memory);

  const shutdown = (): void => {
    memory.close();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // Start server
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`context-memory MCP server using ${memory.config.databasePath}`);
}

if (require.main === module) {
  main().catch(error => {
    console.error(`Failed to start server: ${errorMessage(error)}`);
    process.exit(1);
  });
}
