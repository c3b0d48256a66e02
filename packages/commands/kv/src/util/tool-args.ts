/**
 * Parameter validation for MCP tool calls.
 *
 * Turns untyped tool arguments into a typed KVRequest, reporting every
 * invalid argument at once.
 * @internal
 */
import { z } from 'zod';
import { KVCommandError } from '../errors.js';
import type { KVRequest, NamespaceSelector } from '../executor.js';
import { BulkPutFileSchema } from '../types.js';

const positiveInt = z.number().int().positive();

const CommonToolArgsSchema = z.object({
  env: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  confirm: z.boolean().optional(),
});

export type CommonToolArgs = z.infer<typeof CommonToolArgsSchema>;

const SelectorSchema = z.object({
  binding: z.string().min(1).optional(),
  namespaceId: z.string().min(1).optional(),
});

const KeySchema = z.object({ key: z.string().min(1) });

/**
 * Parses arguments against a schema.
 * @throws {KVCommandError} Naming each invalid argument
 */
export function parseArgs<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: unknown,
): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new KVCommandError(`Invalid arguments: ${details}`);
  }
  return parsed.data;
}

/**
 * Builds a namespace selector from `binding` or `namespaceId`; exactly one
 * must be given.
 * @throws {KVCommandError} When neither or both are present
 */
export function toNamespaceSelector(options: {
  binding?: string;
  namespaceId?: string;
}): NamespaceSelector {
  const { binding, namespaceId } = options;
  if (binding !== undefined && namespaceId === undefined) {
    return { binding };
  }
  if (namespaceId !== undefined && binding === undefined) {
    return { namespaceId };
  }
  throw new KVCommandError(
    'Specify exactly one of a binding or a namespace id',
  );
}

export function parseCommonToolArgs(args: Record<string, unknown>): CommonToolArgs {
  return parseArgs(CommonToolArgsSchema, args);
}

/**
 * Maps a tool name and its arguments to a request.
 * @param toolName - Tool name without the command prefix
 * @param args - Raw tool arguments
 * @throws {KVCommandError} For unknown tools or invalid arguments
 */
export function parseToolRequest(
  toolName: string,
  args: Record<string, unknown>,
): KVRequest {
  const namespace = (): NamespaceSelector =>
    toNamespaceSelector(parseArgs(SelectorSchema, args));

  switch (toolName) {
    case 'namespace_create': {
      const { binding } = parseArgs(z.object({ binding: z.string().min(1) }), args);
      return { op: 'namespace_create', binding };
    }
    case 'namespace_list':
      return { op: 'namespace_list' };
    case 'namespace_rename': {
      const { title } = parseArgs(z.object({ title: z.string().min(1) }), args);
      return { op: 'namespace_rename', namespace: namespace(), title };
    }
    case 'namespace_delete':
      return { op: 'namespace_delete', namespace: namespace() };
    case 'key_put': {
      const { key, value, expiration, expirationTtl } = parseArgs(
        KeySchema.extend({
          value: z.string(),
          expiration: positiveInt.optional(),
          expirationTtl: positiveInt.optional(),
        }),
        args,
      );
      return {
        op: 'key_put',
        namespace: namespace(),
        key,
        value,
        expiration,
        expirationTtl,
      };
    }
    case 'key_get': {
      const { key } = parseArgs(KeySchema, args);
      return { op: 'key_get', namespace: namespace(), key };
    }
    case 'key_delete': {
      const { key } = parseArgs(KeySchema, args);
      return { op: 'key_delete', namespace: namespace(), key };
    }
    case 'key_list': {
      const { prefix, cursor } = parseArgs(
        z.object({ prefix: z.string().optional(), cursor: z.string().optional() }),
        args,
      );
      return { op: 'key_list', namespace: namespace(), prefix, cursor };
    }
    case 'bulk_put': {
      const { entries } = parseArgs(z.object({ entries: BulkPutFileSchema }), args);
      return { op: 'bulk_put', namespace: namespace(), entries };
    }
    case 'bulk_delete': {
      const { keys } = parseArgs(
        z.object({ keys: z.array(z.string().min(1)) }),
        args,
      );
      return { op: 'bulk_delete', namespace: namespace(), keys };
    }
    default:
      throw new KVCommandError(`Unknown tool: ${toolName}`);
  }
}
