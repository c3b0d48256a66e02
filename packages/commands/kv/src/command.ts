import { readFile } from 'fs/promises';
import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  BaseCommand,
  type CallToolResult,
  type ICommandOptions,
  type Tool,
} from '@kvctl/commands-core';
import { logError as recordError, rootLogger } from '@kvctl/core';
import {
  type ExecuteOptions,
  KVExecutor,
  type KVOutcome,
  type KVRequest,
  isDestructive,
} from './executor.js';
import { KVCommandError } from './errors.js';
import { BulkDeleteFileSchema, BulkPutFileSchema } from './types.js';
import {
  type ConfirmFn,
  confirm,
  createErrorResponse,
  createTextResponse,
  parseArgs,
  parseCommonToolArgs,
  parseToolRequest,
  toNamespaceSelector,
} from './util/index.js';

type GlobalCliOptions = {
  config?: string;
  env?: string;
  format: string;
  verbose?: boolean;
};

interface NamespaceCliOptions {
  binding?: string;
  namespaceId?: string;
}

interface DestructiveCliOptions extends NamespaceCliOptions {
  force?: boolean;
}

interface KeyPutCliOptions extends NamespaceCliOptions {
  expiration?: number;
  ttl?: number;
}

interface KeyListCliOptions extends NamespaceCliOptions {
  prefix?: string;
  cursor?: string;
}

/**
 * Configuration options for KVCommand
 */
export interface KVCommandOptions {
  executor?: KVExecutor;
  /** Confirmation gate for the CLI (defaults to a one-line stdin prompt) */
  confirm?: ConfirmFn;
}

const namespaceProperties = {
  binding: {
    type: 'string',
    description: 'Namespace binding name from kvctl.json',
  },
  namespaceId: {
    type: 'string',
    description: 'Namespace id, instead of a binding',
  },
};

const invocationProperties = {
  env: {
    type: 'string',
    description: 'Environment under "env" in kvctl.json',
  },
  config: {
    type: 'string',
    description: 'Path to the project config (default: ./kvctl.json)',
  },
};

const confirmProperty = {
  confirm: {
    type: 'boolean',
    description: 'Must be true: this operation deletes data',
  },
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Reads and validates a JSON file for the bulk subcommands.
 * @internal
 */
async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new KVCommandError(
      `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  try {
    const json: unknown = JSON.parse(text);
    return json;
  } catch (error) {
    throw new KVCommandError(
      `${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Text shown for an outcome: the raw value for reads, JSON for listings,
 * the message otherwise.
 */
function renderOutcome(outcome: KVOutcome): string {
  if (typeof outcome.data === 'string') {
    return outcome.data;
  }
  if (outcome.data !== undefined) {
    return JSON.stringify(outcome.data, null, 2);
  }
  return outcome.message;
}

/**
 * KV namespace administration for kvctl.
 *
 * Manages namespaces, keys and bulk writes through the store's REST API,
 * via MCP tool calls or the command line.
 *
 * Available tools: namespace_create, namespace_list, namespace_rename,
 * namespace_delete, key_put, key_get, key_delete, key_list, bulk_put,
 * bulk_delete. Deleting tools require `confirm: true`.
 * @example MCP tool usage
 * ```typescript
 * const cmd = new KVCommand();
 * await cmd.executeToolViaMCP('key_get', { binding: 'CACHE', key: 'home' });
 * ```
 * @example CLI usage
 * ```typescript
 * await cmd.executeViaCLI(['key', 'put', 'home', '<h1>hi</h1>', '--binding', 'CACHE']);
 * await cmd.executeViaCLI(['namespace', 'delete', '--binding', 'CACHE']);
 * ```
 * @public
 */
export class KVCommand extends BaseCommand {
  public readonly name = 'kv';
  public readonly description = 'Manage KV namespaces, keys and bulk writes';
  private readonly executor: KVExecutor;
  private readonly confirmFn: ConfirmFn;

  /**
   * @param options - Optional executor and confirmation gate, primarily for testing
   */
  public constructor(options: KVCommandOptions = {}) {
    super();
    this.executor = options.executor ?? new KVExecutor();
    this.confirmFn = options.confirm ?? ((prompt) => confirm(prompt));
  }

  public getMCPDefinitions(): Tool[] {
    const tool = (
      name: string,
      description: string,
      properties: Record<string, object>,
      required: string[] = [],
    ): Tool => ({
      name,
      description,
      inputSchema: {
        type: 'object',
        properties: { ...properties, ...invocationProperties },
        required,
      },
    });

    return [
      tool(
        'namespace_create',
        'Create a namespace titled "<worker name>-<binding>" and return its id',
        { binding: { type: 'string', description: 'Binding name for the new namespace' } },
        ['binding'],
      ),
      tool('namespace_list', 'List the namespaces of the configured account', {}),
      tool(
        'namespace_rename',
        'Rename a namespace',
        { ...namespaceProperties, title: { type: 'string', description: 'New title' } },
        ['title'],
      ),
      tool('namespace_delete', 'Delete a namespace and every key in it', {
        ...namespaceProperties,
        ...confirmProperty,
      }),
      tool(
        'key_put',
        'Write a single key',
        {
          ...namespaceProperties,
          key: { type: 'string', description: 'Key name' },
          value: { type: 'string', description: 'Value to store' },
          expiration: { type: 'number', description: 'Absolute expiry, seconds since epoch' },
          expirationTtl: { type: 'number', description: 'Expiry in seconds from now' },
        },
        ['key', 'value'],
      ),
      tool(
        'key_get',
        'Read the value of a key',
        { ...namespaceProperties, key: { type: 'string', description: 'Key name' } },
        ['key'],
      ),
      tool(
        'key_delete',
        'Delete a key',
        {
          ...namespaceProperties,
          key: { type: 'string', description: 'Key name' },
          ...confirmProperty,
        },
        ['key'],
      ),
      tool('key_list', 'List one page of keys; pass the returned cursor for the next', {
        ...namespaceProperties,
        prefix: { type: 'string', description: 'Only keys starting with this prefix' },
        cursor: { type: 'string', description: 'Cursor from a previous page' },
      }),
      tool(
        'bulk_put',
        'Write many keys in one request',
        {
          ...namespaceProperties,
          entries: {
            type: 'array',
            description: 'Entries of { key, value, expiration?, expiration_ttl?, base64? }',
            items: { type: 'object' },
          },
        },
        ['entries'],
      ),
      tool(
        'bulk_delete',
        'Delete many keys in one request',
        {
          ...namespaceProperties,
          keys: { type: 'array', description: 'Key names', items: { type: 'string' } },
          ...confirmProperty,
        },
        ['keys'],
      ),
    ];
  }

  /**
   * Executes a tool via MCP protocol.
   *
   * There is no terminal to prompt on, so deleting tools run only when
   * called with `confirm: true`.
   * @param toolName - Tool name as listed by getMCPDefinitions()
   * @param args - Tool arguments
   * @throws Never throws - all errors are returned as CallToolResult with isError flag
   */
  public async executeToolViaMCP(
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult> {
    try {
      const request = parseToolRequest(toolName, args);
      const common = parseCommonToolArgs(args);

      if (isDestructive(request.op) && common.confirm !== true) {
        return createErrorResponse(
          `${toolName} deletes data. Call it again with "confirm": true to proceed.`,
        );
      }

      const outcome = await this.executor.execute(request, {
        configPath: common.config,
        env: common.env,
        force: true,
      });
      return createTextResponse(renderOutcome(outcome), outcome.hint);
    } catch (error) {
      recordError('kv-mcp', error, { tool: toolName });
      return createErrorResponse(this.describeError(error));
    }
  }

  /**
   * Executes command via CLI interface.
   *
   * Failures are printed to stderr and set a non-zero exit code.
   * @param args - CLI arguments (excluding the 'kv' prefix)
   */
  public async executeViaCLI(args: string[]): Promise<void> {
    try {
      await this.buildProgram().parseAsync(args, { from: 'user' });
    } catch (error) {
      if (error instanceof CommanderError) {
        // commander has already printed usage or help
        if (error.exitCode !== 0) {
          process.exitCode = error.exitCode;
        }
        return;
      }
      recordError('kv-cli', error, { args });
      this.logError(chalk.red(this.describeError(error)));
      process.exitCode = 1;
    }
  }

  private describeError(error: unknown): string {
    if (error instanceof Error && error.name !== 'Error') {
      return error.message;
    }
    return `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
  }

  private buildProgram(): Command {
    const program = new Command('kv')
      .description(this.description)
      .option('-c, --config <path>', 'project config file (default: ./kvctl.json)')
      .option('-e, --env <name>', 'environment under "env" to use')
      .option('--format <format>', 'output format: text or json', 'text')
      .option('-v, --verbose', 'log requests to stderr')
      .exitOverride();

    const withNamespace = (command: Command): Command =>
      command
        .option('-b, --binding <name>', 'namespace binding from kvctl.json')
        .option('-n, --namespace-id <id>', 'namespace id, instead of a binding');

    const namespace = program.command('namespace').description('Manage namespaces');

    namespace
      .command('create <binding>')
      .description('Create a namespace for a new binding')
      .action((binding: string, _options: object, command: Command) =>
        this.runCli({ op: 'namespace_create', binding }, command),
      );

    namespace
      .command('list')
      .description('List namespaces')
      .action((_options: object, command: Command) =>
        this.runCli({ op: 'namespace_list' }, command),
      );

    withNamespace(namespace.command('rename <title>').description('Rename a namespace'))
      .action((title: string, options: NamespaceCliOptions, command: Command) =>
        this.runCli(
          { op: 'namespace_rename', namespace: toNamespaceSelector(options), title },
          command,
        ),
      );

    withNamespace(namespace.command('delete').description('Delete a namespace'))
      .option('-f, --force', 'skip the confirmation prompt')
      .action((options: DestructiveCliOptions, command: Command) =>
        this.runCli(
          { op: 'namespace_delete', namespace: toNamespaceSelector(options) },
          command,
          options.force,
        ),
      );

    const key = program.command('key').description('Manage individual keys');

    withNamespace(key.command('put <key> <value>').description('Write a key'))
      .option('--expiration <epoch>', 'absolute expiry in seconds since epoch', parsePositiveInt)
      .option('--ttl <seconds>', 'expiry in seconds from now', parsePositiveInt)
      .action((name: string, value: string, options: KeyPutCliOptions, command: Command) =>
        this.runCli(
          {
            op: 'key_put',
            namespace: toNamespaceSelector(options),
            key: name,
            value,
            expiration: options.expiration,
            expirationTtl: options.ttl,
          },
          command,
        ),
      );

    withNamespace(key.command('get <key>').description('Print the value of a key'))
      .action((name: string, options: NamespaceCliOptions, command: Command) =>
        this.runCli(
          { op: 'key_get', namespace: toNamespaceSelector(options), key: name },
          command,
        ),
      );

    withNamespace(key.command('delete <key>').description('Delete a key'))
      .option('-f, --force', 'skip the confirmation prompt')
      .action((name: string, options: DestructiveCliOptions, command: Command) =>
        this.runCli(
          { op: 'key_delete', namespace: toNamespaceSelector(options), key: name },
          command,
          options.force,
        ),
      );

    withNamespace(key.command('list').description('List one page of keys'))
      .option('--prefix <prefix>', 'only keys starting with this prefix')
      .option('--cursor <cursor>', 'cursor from a previous page')
      .action((options: KeyListCliOptions, command: Command) =>
        this.runCli(
          {
            op: 'key_list',
            namespace: toNamespaceSelector(options),
            prefix: options.prefix,
            cursor: options.cursor,
          },
          command,
        ),
      );

    const bulk = program.command('bulk').description('Write or delete many keys at once');

    withNamespace(
      bulk.command('put <file>').description('Write the entries of a JSON file'),
    ).action(async (file: string, options: NamespaceCliOptions, command: Command) => {
      const entries = parseArgs(BulkPutFileSchema, await readJsonFile(file));
      await this.runCli(
        { op: 'bulk_put', namespace: toNamespaceSelector(options), entries },
        command,
      );
    });

    withNamespace(
      bulk.command('delete <file>').description('Delete the keys listed in a JSON file'),
    )
      .option('-f, --force', 'skip the confirmation prompt')
      .action(async (file: string, options: DestructiveCliOptions, command: Command) => {
        const keys = parseArgs(BulkDeleteFileSchema, await readJsonFile(file)).map(
          (entry) => (typeof entry === 'string' ? entry : entry.key),
        );
        await this.runCli(
          { op: 'bulk_delete', namespace: toNamespaceSelector(options), keys },
          command,
          options.force,
        );
      });

    return program;
  }

  private async runCli(
    request: KVRequest,
    command: Command,
    force = false,
  ): Promise<void> {
    const globals = command.optsWithGlobals<GlobalCliOptions>();
    const options = this.parseCommonOptions({
      verbose: globals.verbose,
      format: globals.format,
    });
    if (options.verbose) {
      rootLogger.level = 'debug';
    }

    const executeOptions: ExecuteOptions = {
      configPath: globals.config,
      env: globals.env,
      confirm: this.confirmFn,
      force,
    };
    const outcome = await this.executor.execute(request, executeOptions);
    this.printOutcome(outcome, options);
  }

  private printOutcome(outcome: KVOutcome, options: ICommandOptions): void {
    if (options.format === 'json') {
      console.info(JSON.stringify(outcome, null, 2));
      return;
    }

    if (outcome.cancelled) {
      this.log(chalk.yellow(outcome.message), options);
      return;
    }

    if (outcome.data !== undefined) {
      console.info(renderOutcome(outcome));
    } else {
      this.log(chalk.green(`✨ ${outcome.message}`), options);
    }

    if (outcome.hint) {
      this.log(chalk.dim(outcome.hint), options);
    }
  }
}
