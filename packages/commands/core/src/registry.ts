/**
 * Command registry for kvctl commands.
 *
 * Maps command names to ICommand instances and exposes their tools under
 * `<command>_<tool>` names for MCP clients.
 * @example
 * ```typescript
 * const registry = new CommandRegistry();
 * registry.register(new KVCommand());
 * await registry.getCommand('kv')?.executeViaCLI(['namespace', 'list']);
 * ```
 * @public
 */

import type { CallToolResult, ICommand, Tool } from './interfaces.js';

/**
 * A registered tool together with the command that executes it.
 * @public
 */
export interface RegisteredTool {
  command: ICommand;
  originalName: string;
  definition: Tool;
}

/**
 * Registry for managing commands and their tools.
 * @public
 */
export class CommandRegistry {
  private commands = new Map<string, ICommand>();

  /**
   * Registers a command, replacing any command with the same name.
   * @param command - Command instance implementing the ICommand interface
   */
  public register(command: ICommand): void {
    this.commands.set(command.name, command);
  }

  /**
   * Retrieves a command by name.
   * @param name - Command name to retrieve
   */
  public getCommand(name: string): ICommand | undefined {
    return this.commands.get(name);
  }

  public getAllCommandNames(): string[] {
    return Array.from(this.commands.keys());
  }

  /**
   * Collects every command's tool definitions, prefixing each tool name with
   * its command name so that tools from different commands cannot collide.
   */
  public getAllMCPDefinitions(): Tool[] {
    return this.getAllTools().map(({ command, definition }) => ({
      ...definition,
      name: `${command.name}_${definition.name}`,
    }));
  }

  /**
   * Looks up a prefixed tool name as produced by getAllMCPDefinitions().
   * @param fullName - `<command>_<tool>`
   */
  public getToolForExecution(fullName: string): RegisteredTool | undefined {
    return this.getAllTools().find(
      ({ command, definition }) =>
        `${command.name}_${definition.name}` === fullName,
    );
  }

  /**
   * Executes a prefixed tool, returning an error result for unknown names.
   * @param fullName - `<command>_<tool>`
   * @param args - Tool arguments
   */
  public async callTool(
    fullName: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult> {
    const tool = this.getToolForExecution(fullName);
    if (!tool) {
      return {
        content: [{ type: 'text', text: `Tool not found: ${fullName}` }],
        isError: true,
      };
    }
    return tool.command.executeToolViaMCP(tool.originalName, args);
  }

  public clear(): void {
    this.commands.clear();
  }

  public size(): number {
    return this.commands.size;
  }

  private getAllTools(): RegisteredTool[] {
    return Array.from(this.commands.values()).flatMap((command) =>
      command.getMCPDefinitions().map((definition) => ({
        command,
        originalName: definition.name,
        definition,
      })),
    );
  }
}
