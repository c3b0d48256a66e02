/**
 * Core interfaces for kvctl commands.
 *
 * A command exposes the same operations two ways: as MCP tools for
 * assistants and as a CLI subcommand tree for people at a terminal.
 * @public
 */
import type { Tool, CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export type { Tool, CallToolResult };

/**
 * Contract every kvctl command implements.
 * @public
 */
export interface ICommand {
  /** Unique command name, used for `kvctl run <name>` and as the tool prefix */
  readonly name: string;

  /** One-line description shown in listings */
  readonly description: string;

  /**
   * Executes one of the command's tools on behalf of an MCP client.
   *
   * Implementations report failures as results with `isError` set rather
   * than rejecting.
   * @param toolName - Tool name as returned by getMCPDefinitions()
   * @param args - Tool arguments from the MCP request
   */
  executeToolViaMCP(
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult>;

  /**
   * Executes the command from the command line.
   * @param args - Arguments after the command name
   */
  executeViaCLI(args: string[]): Promise<void>;

  /** Tool definitions exposed over MCP */
  getMCPDefinitions(): Tool[];
}

/**
 * Descriptive metadata for listings.
 * @public
 */
export interface ICommandMetadata {
  name: string;
  description: string;
  tools: string[];
}

/**
 * Options shared by every command.
 * @public
 */
export interface ICommandOptions {
  verbose?: boolean;
  format?: 'json' | 'text';
}
