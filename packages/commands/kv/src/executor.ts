import type { GlobalUser, Target } from '@kvctl/schemas';
import {
  logEvent,
  resolveGlobalUser,
  resolveMergedConfig,
  resolveTarget,
} from '@kvctl/core';
import { type KVClient, type KVClientOptions, createKVClient } from './kv-client.js';
import { KVCommandError } from './errors.js';
import type { BulkPutEntry, KeyWriteOptions } from './types.js';
import type { ConfirmFn } from './util/confirm.js';
import { pathSegment } from './operations/paths.js';
import { getNamespaceId } from './util/namespace-id.js';
import { validateTarget } from './util/validate-target.js';
import {
  bulkDelete,
  bulkPut,
  createNamespace,
  deleteKey,
  deleteNamespace,
  getKey,
  listKeys,
  listNamespaces,
  putKey,
  renameNamespace,
} from './operations/index.js';

/**
 * How a request addresses a namespace: through a configured binding or by
 * its remote id directly.
 */
export type NamespaceSelector = { binding: string } | { namespaceId: string };

/**
 * One remote operation, as requested from the CLI or over MCP.
 */
export type KVRequest =
  | { op: 'namespace_create'; binding: string }
  | { op: 'namespace_list' }
  | { op: 'namespace_rename'; namespace: NamespaceSelector; title: string }
  | { op: 'namespace_delete'; namespace: NamespaceSelector }
  | ({
      op: 'key_put';
      namespace: NamespaceSelector;
      key: string;
      value: string;
    } & KeyWriteOptions)
  | { op: 'key_get'; namespace: NamespaceSelector; key: string }
  | { op: 'key_delete'; namespace: NamespaceSelector; key: string }
  | {
      op: 'key_list';
      namespace: NamespaceSelector;
      prefix?: string;
      cursor?: string;
    }
  | { op: 'bulk_put'; namespace: NamespaceSelector; entries: BulkPutEntry[] }
  | { op: 'bulk_delete'; namespace: NamespaceSelector; keys: string[] };

export type KVOperationName = KVRequest['op'];

/**
 * Result of a request, ready to print or return as a tool result.
 */
export interface KVOutcome {
  message: string;
  /** Structured payload for JSON output */
  data?: unknown;
  /** Follow-up advice shown after the message */
  hint?: string;
  /** Set when the user declined a confirmation */
  cancelled?: boolean;
}

/**
 * Everything one invocation needs from configuration.
 *
 * Credentials are resolved lazily, once the target has been validated and
 * the binding resolved.
 */
export interface InvocationContext {
  target: Target;
  apiBaseUrl: string;
  resolveUser: () => GlobalUser;
}

export interface InvocationOptions {
  /** Project config path; defaults to kvctl.json in the working directory */
  configPath?: string;
  /** Environment under `env` to overlay */
  env?: string;
}

export interface ExecuteOptions extends InvocationOptions {
  /** Gate consulted before destructive operations */
  confirm?: ConfirmFn;
  /** Skip the gate; the caller has confirmed by other means */
  force?: boolean;
}

export type ContextLoader = (options: InvocationOptions) => InvocationContext;
export type ClientFactory = (user: GlobalUser, options: KVClientOptions) => KVClient;

/**
 * Configuration options for KVExecutor
 */
export interface KVExecutorOptions {
  loadContext?: ContextLoader;
  createClient?: ClientFactory;
}

const DESTRUCTIVE_OPERATIONS: ReadonlySet<KVOperationName> = new Set([
  'namespace_delete',
  'key_delete',
  'bulk_delete',
]);

const BINDING_NAME_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isDestructive(op: KVOperationName): boolean {
  return DESTRUCTIVE_OPERATIONS.has(op);
}

/**
 * Loads the invocation context from the config files and the environment.
 * @param options - Config path and environment name
 */
export function loadInvocationContext(options: InvocationOptions): InvocationContext {
  const { config } = resolveMergedConfig(options.configPath);
  return {
    target: resolveTarget(config, options.env),
    apiBaseUrl: config.api_base_url,
    resolveUser: () => resolveGlobalUser(config),
  };
}

function selectNamespace(target: Target, selector: NamespaceSelector): string {
  const namespaceId =
    'binding' in selector ? getNamespaceId(target, selector.binding) : selector.namespaceId;
  // checked here so a bad id fails before any prompt
  pathSegment(namespaceId, 'namespace id');
  return namespaceId;
}

const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? '' : 's'}`;

/**
 * A request with its namespace resolved, waiting for a client.
 * @internal
 */
interface PreparedRequest {
  /** Confirmation question, present for destructive operations */
  prompt?: string;
  run: (client: KVClient) => Promise<KVOutcome>;
}

/**
 * Runs KV requests through the invocation pipeline:
 * validate target, resolve namespace, confirm if destructive, build a
 * client, make one remote call.
 *
 * Nothing is retained between calls; each one loads its own context and
 * builds its own client.
 */
export class KVExecutor {
  private readonly loadContext: ContextLoader;
  private readonly createClient: ClientFactory;

  public constructor(options: KVExecutorOptions = {}) {
    this.loadContext = options.loadContext ?? loadInvocationContext;
    this.createClient = options.createClient ?? createKVClient;
  }

  /**
   * Executes a single request.
   * @param request - Operation and its arguments
   * @param options - Invocation options and confirmation handling
   * @throws {ConfigurationError} When the target is incomplete or credentials are missing
   * @throws {DuplicateBindingError} When the target's bindings are ambiguous
   * @throws {BindingNotFoundError} When the binding is not configured
   * @throws {UserInputError} When the confirmation answer is malformed
   * @throws {RemoteOperationError} When the remote call fails
   */
  public async execute(
    request: KVRequest,
    options: ExecuteOptions = {},
  ): Promise<KVOutcome> {
    logEvent('debug', `kv:${request.op}:start`, { env: options.env });

    const context = this.loadContext(options);
    validateTarget(context.target);

    const prepared = this.prepare(request, context.target);

    if (prepared.prompt !== undefined && !options.force) {
      if (!options.confirm) {
        throw new KVCommandError(
          `Refusing to run ${request.op} without confirmation`,
        );
      }
      const confirmed = await options.confirm(prepared.prompt);
      if (!confirmed) {
        logEvent('info', `kv:${request.op}:declined`);
        return { message: 'Operation cancelled', cancelled: true };
      }
    }

    const client = this.createClient(context.resolveUser(), {
      baseUrl: context.apiBaseUrl,
    });
    const outcome = await prepared.run(client);

    logEvent('debug', `kv:${request.op}:done`);
    return outcome;
  }

  private prepare(request: KVRequest, target: Target): PreparedRequest {
    switch (request.op) {
      case 'namespace_create': {
        if (!BINDING_NAME_PATTERN.test(request.binding)) {
          throw new KVCommandError(
            `Binding "${request.binding}" must be a valid JavaScript identifier`,
          );
        }
        const title = `${target.name}-${request.binding}`;
        return {
          run: async (client) => {
            const namespace = await createNamespace(client, target, title);
            return {
              message: `Created namespace "${namespace.title}" with id "${namespace.id}"`,
              hint: `Add the following to "kv_namespaces" in kvctl.json:\n${JSON.stringify({ binding: request.binding, id: namespace.id })}`,
            };
          },
        };
      }

      case 'namespace_list':
        return {
          run: async (client) => {
            const page = await listNamespaces(client, target);
            return {
              message: `Found ${plural(page.items.length, 'namespace')}`,
              data: page.items,
            };
          },
        };

      case 'namespace_rename': {
        const namespaceId = selectNamespace(target, request.namespace);
        return {
          run: async (client) => {
            await renameNamespace(client, target, namespaceId, request.title);
            return {
              message: `Renamed namespace ${namespaceId} to "${request.title}"`,
            };
          },
        };
      }

      case 'namespace_delete': {
        const namespaceId = selectNamespace(target, request.namespace);
        return {
          prompt: `Are you sure you want to delete namespace ${namespaceId}?`,
          run: async (client) => {
            await deleteNamespace(client, target, namespaceId);
            return {
              message: `Deleted namespace ${namespaceId}`,
              hint: 'Remember to remove its binding from "kv_namespaces" in kvctl.json',
            };
          },
        };
      }

      case 'key_put': {
        const namespaceId = selectNamespace(target, request.namespace);
        return {
          run: async (client) => {
            await putKey(client, target, namespaceId, request.key, request.value, {
              expiration: request.expiration,
              expirationTtl: request.expirationTtl,
            });
            return { message: `Wrote key "${request.key}"` };
          },
        };
      }

      case 'key_get': {
        const namespaceId = selectNamespace(target, request.namespace);
        return {
          run: async (client) => {
            const value = await getKey(client, target, namespaceId, request.key);
            return { message: value, data: value };
          },
        };
      }

      case 'key_delete': {
        const namespaceId = selectNamespace(target, request.namespace);
        return {
          prompt: `Are you sure you want to delete key "${request.key}"?`,
          run: async (client) => {
            await deleteKey(client, target, namespaceId, request.key);
            return { message: `Deleted key "${request.key}"` };
          },
        };
      }

      case 'key_list': {
        const namespaceId = selectNamespace(target, request.namespace);
        return {
          run: async (client) => {
            const page = await listKeys(client, target, namespaceId, {
              prefix: request.prefix,
              cursor: request.cursor,
            });
            return {
              message: `Found ${plural(page.items.length, 'key')}`,
              data: page,
              hint: page.cursor
                ? `More keys available, pass --cursor ${page.cursor}`
                : undefined,
            };
          },
        };
      }

      case 'bulk_put': {
        const namespaceId = selectNamespace(target, request.namespace);
        return {
          run: async (client) => {
            await bulkPut(client, target, namespaceId, request.entries);
            return { message: `Wrote ${plural(request.entries.length, 'key')}` };
          },
        };
      }

      case 'bulk_delete': {
        const namespaceId = selectNamespace(target, request.namespace);
        return {
          prompt: `Are you sure you want to delete ${plural(request.keys.length, 'key')} from namespace ${namespaceId}?`,
          run: async (client) => {
            await bulkDelete(client, target, namespaceId, request.keys);
            return { message: `Deleted ${plural(request.keys.length, 'key')}` };
          },
        };
      }
    }
  }
}
