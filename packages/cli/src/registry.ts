import { CommandRegistry } from '@kvctl/commands-core';
import { KVCommand } from '@kvctl/command-kv';

/**
 * Builds the registry of built-in commands.
 *
 * Commands are registered statically; kvctl ships a fixed command suite.
 */
export function createCommandRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  registry.register(new KVCommand());
  return registry;
}
