/**
 * Main exports for \@kvctl/command-kv
 */

// Main command
import { KVCommand } from './command.js';
export { KVCommand };
export type { KVCommandOptions } from './command.js';

// Default export: command instance for registration
export default new KVCommand();

// Pipeline
export {
  KVExecutor,
  isDestructive,
  loadInvocationContext,
  type ClientFactory,
  type ContextLoader,
  type ExecuteOptions,
  type InvocationContext,
  type InvocationOptions,
  type KVExecutorOptions,
  type KVOperationName,
  type KVOutcome,
  type KVRequest,
  type NamespaceSelector,
} from './executor.js';
export {
  KVClient,
  KV_CLIENT_TIMEOUT_MS,
  authHeaders,
  createKVClient,
  type HttpMethod,
  type KVClientOptions,
  type KVRequestOptions,
} from './kv-client.js';
export {
  BindingNotFoundError,
  ConfigurationError,
  DuplicateBindingError,
  KVCommandError,
  RemoteOperationError,
  UserInputError,
} from './errors.js';
export * from './operations/index.js';
export type {
  ApiEnvelope,
  ApiError,
  BulkPutEntry,
  KeyInfo,
  KeyWriteOptions,
  ListPage,
  Namespace,
  RemoteFailure,
} from './types.js';
export {
  confirm,
  encodeKey,
  formatFailure,
  getNamespaceId,
  getStatusAdvisory,
  getSuggestion,
  parseConfirmation,
  validateTarget,
  type ConfirmFn,
  type ConfirmIO,
} from './util/index.js';
