import { ConfigurationError } from '@kvctl/core';
import type { RemoteFailure } from './types.js';
import { formatFailure } from './util/format-error.js';

export { ConfigurationError };

/**
 * Error thrown when two bindings in one target share a name.
 *
 * Raised before any lookup, whatever binding was requested.
 */
export class DuplicateBindingError extends Error {
  public constructor(
    public readonly binding: string,
    public readonly targetName: string,
  ) {
    super(`Namespace binding "${binding}" is duplicated in "${targetName}"`);
    this.name = 'DuplicateBindingError';
  }
}

/**
 * Error thrown when no binding with the requested name exists.
 */
export class BindingNotFoundError extends Error {
  public constructor(
    public readonly binding: string,
    public readonly targetName: string,
  ) {
    super(`Namespace binding "${binding}" not found in "${targetName}"`);
    this.name = 'BindingNotFoundError';
  }
}

/**
 * Error thrown when an interactive answer is neither yes nor no.
 */
export class UserInputError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'UserInputError';
  }
}

/**
 * Error thrown when a remote call fails.
 *
 * The message is the translated, human-readable text; the raw failure stays
 * available for callers that need the status or codes.
 */
export class RemoteOperationError extends Error {
  public constructor(public readonly failure: RemoteFailure) {
    super(formatFailure(failure));
    this.name = 'RemoteOperationError';
  }

  public get status(): number | undefined {
    return this.failure.kind === 'api' ? this.failure.status : undefined;
  }
}

/**
 * Error thrown for malformed command arguments (CLI or MCP).
 */
export class KVCommandError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'KVCommandError';
  }
}
