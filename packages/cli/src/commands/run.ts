import type { CommandRegistry } from '@kvctl/commands-core';
import { createCommandRegistry } from '../registry.js';

/**
 * Executes a registered command by name with the remaining CLI arguments.
 *
 * Unknown names print the available commands and set a failing exit code.
 * @param name - Command name, e.g. 'kv'
 * @param args - Arguments passed through to the command
 * @param registry - Registry to look the command up in
 * @example
 * ```typescript
 * await runCommand('kv', ['key', 'get', 'home', '--binding', 'CACHE']);
 * ```
 */
export async function runCommand(
  name: string,
  args: string[],
  registry: CommandRegistry = createCommandRegistry(),
): Promise<void> {
  const command = registry.getCommand(name);
  if (!command) {
    console.error(`Command not found: ${name}`);
    console.error(`Available commands: ${registry.getAllCommandNames().join(', ')}`);
    process.exitCode = 1;
    return;
  }

  await command.executeViaCLI(args);
}
