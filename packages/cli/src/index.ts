export { createCommandRegistry } from './registry.js';
export { runCommand } from './commands/run.js';
export { listTools } from './commands/tools.js';
export { KvctlMcpServer } from './mcp-server.js';
export { VERSION } from './version.js';
