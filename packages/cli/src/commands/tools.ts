import type { CommandRegistry } from '@kvctl/commands-core';
import { createCommandRegistry } from '../registry.js';

/**
 * Prints every MCP tool name with its description, or the full definitions
 * as JSON.
 * @param options - `json` prints the definitions including input schemas
 * @param registry - Registry to list
 */
export function listTools(
  options: { json?: boolean } = {},
  registry: CommandRegistry = createCommandRegistry(),
): void {
  const tools = registry.getAllMCPDefinitions();

  if (options.json) {
    console.info(JSON.stringify(tools, null, 2));
    return;
  }

  for (const tool of tools) {
    console.info(tool.description ? `${tool.name} - ${tool.description}` : tool.name);
  }
}
