#!/usr/bin/env node
import { Command } from 'commander';
import { ConsoleLogger, logError, logEvent } from '@kvctl/core';
import { runCommand } from './commands/run.js';
import { listTools } from './commands/tools.js';
import { KvctlMcpServer } from './mcp-server.js';
import { VERSION } from './version.js';

const logger = new ConsoleLogger('[kvctl]');

// Global error handlers
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', error);
  logError('uncaught-exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', reason);
  logError('unhandled-rejection', reason);
  process.exit(1);
});

const program = new Command();

program
  .name('kvctl')
  .description('Manage KV namespaces, keys and bulk writes from the command line or over MCP')
  .version(VERSION)
  .showHelpAfterError();

program.enablePositionalOptions(true);

program
  .command('run <commandName> [commandArgs...]')
  .description('Run a kvctl command, e.g. `kvctl run kv key get home --binding CACHE`')
  .allowUnknownOption(true)
  .passThroughOptions()
  .action(async (commandName: string, commandArgs: string[] = []) => {
    await runCommand(commandName, commandArgs);
  });

program
  .command('tools')
  .description('List the tools exposed over MCP')
  .option('--json', 'print full tool definitions')
  .action((options: { json?: boolean }) => {
    listTools(options);
  });

program
  .command('mcp')
  .description('Serve every command as MCP tools over stdio')
  .action(async () => {
    await startMcpServer();
  });

let server: KvctlMcpServer | undefined;
let isShuttingDown = false;

async function startMcpServer(): Promise<void> {
  server = new KvctlMcpServer();
  logEvent('info', 'cli:mcp_starting');
  await server.start();
}

/**
 * Closes the MCP server, if one is running, and exits.
 * @param signal - The OS signal that triggered the shutdown
 */
async function handleShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logEvent('info', 'cli:shutdown', { signal, exit_code: 0 });

  if (server) {
    await server.close();
  }

  process.exit(0);
}

/**
 * Initializes the run id and parses command-line arguments.
 */
async function bootstrap(): Promise<void> {
  if (!process.env.KVCTL_RUN_ID) {
    process.env.KVCTL_RUN_ID = `${Date.now()}-${process.pid}`;
  }

  logEvent('info', 'cli:start', { argv: process.argv, cwd: process.cwd() });

  await program.parseAsync(process.argv);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    handleShutdown(signal).catch((error: unknown) => {
      logError('shutdown', error, { signal });
      process.exit(1);
    });
  });
}

bootstrap().catch((error: unknown) => {
  logger.error('Fatal error', error);
  logError('main-fatal', error);
  process.exit(1);
});
