/**
 * Base abstract class for kvctl commands.
 *
 * Provides option parsing and output helpers that work for both MCP and CLI
 * execution.
 * @example
 * ```typescript
 * export class MyCommand extends BaseCommand {
 *   readonly name = 'my-command';
 *   readonly description = 'My command description';
 *
 *   async executeViaCLI(args: string[]) {
 *     const options = this.parseCommonOptions(args);
 *     this.log('Processing...', options);
 *   }
 *   // ...
 * }
 * ```
 * @public
 */

import type {
  CallToolResult,
  ICommand,
  ICommandMetadata,
  ICommandOptions,
  Tool,
} from './interfaces.js';

const FORMATS: ReadonlyArray<NonNullable<ICommandOptions['format']>> = [
  'json',
  'text',
];

function isFormat(value: unknown): value is NonNullable<ICommandOptions['format']> {
  return FORMATS.some((format) => format === value);
}

/**
 * Abstract base class that provides common functionality for all commands.
 * @public
 */
export abstract class BaseCommand implements ICommand {
  public abstract readonly name: string;
  public abstract readonly description: string;

  public abstract executeToolViaMCP(
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult>;
  public abstract executeViaCLI(args: string[]): Promise<void>;
  public abstract getMCPDefinitions(): Tool[];

  /**
   * Metadata derived from the tool definitions.
   */
  public getMetadata(): ICommandMetadata {
    return {
      name: this.name,
      description: this.description,
      tools: this.getMCPDefinitions().map((tool) => tool.name),
    };
  }

  /**
   * Parse common command options from arguments.
   *
   * Accepts either MCP arguments (object) or CLI arguments (string array).
   * Supports `--verbose`/`-v` and `--format <json|text>`.
   * @param args - MCP arguments as object or CLI arguments as string array
   * @example
   * ```typescript
   * this.parseCommonOptions(['--verbose', '--format', 'json']);
   * // Returns: \{ verbose: true, format: 'json' \}
   * ```
   */
  protected parseCommonOptions(
    args: Record<string, unknown> | string[],
  ): ICommandOptions {
    const options: ICommandOptions = {};

    if (Array.isArray(args)) {
      options.verbose = args.includes('--verbose') || args.includes('-v');

      const formatIndex = args.findIndex((arg) => arg === '--format');
      if (formatIndex !== -1 && formatIndex < args.length - 1) {
        const format = args[formatIndex + 1];
        if (isFormat(format)) {
          options.format = format;
        }
      }
    } else {
      options.verbose = Boolean(args.verbose);
      if (isFormat(args.format)) {
        options.format = args.format;
      }
    }

    return options;
  }

  /**
   * Log output based on format preference.
   *
   * Suppressed in JSON mode so that machine-readable stdout stays parseable.
   * @param message - The message to log
   * @param options - Command options containing format preference
   */
  protected log(message: string, options: ICommandOptions = {}): void {
    if (options.format === 'json') {
      return;
    }
    console.info(message);
  }

  /**
   * Log error output to stderr.
   *
   * Errors are written in every format; they go to stderr and cannot
   * corrupt JSON on stdout.
   * @param message - The error message to log
   */
  protected logError(message: string): void {
    console.error(message);
  }
}
