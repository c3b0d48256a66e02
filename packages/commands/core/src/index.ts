/**
 * Core infrastructure for kvctl commands.
 *
 * - ICommand interface for dual MCP/CLI command implementations
 * - BaseCommand abstract class with shared option parsing and output helpers
 * - CommandRegistry for looking up commands and their prefixed MCP tools
 * @public
 */

export type {
  ICommand,
  ICommandMetadata,
  ICommandOptions,
  Tool,
  CallToolResult,
} from './interfaces.js';
export { BaseCommand } from './base-command.js';
export { CommandRegistry, type RegisteredTool } from './registry.js';
