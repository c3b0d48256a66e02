import { z } from 'zod';
import type { Target } from '@kvctl/schemas';
import type { KVClient } from '../kv-client.js';
import { RemoteOperationError } from '../errors.js';
import { type ListPage, type Namespace, NamespaceSchema } from '../types.js';
import { namespacePath, namespacesPath } from './paths.js';

/**
 * Validates the `result` of an envelope, reporting a mismatch as a protocol
 * failure.
 * @internal
 */
export function parseResult<T>(schema: z.ZodType<T>, result: unknown, what: string): T {
  const parsed = schema.safeParse(result);
  if (!parsed.success) {
    throw new RemoteOperationError({
      kind: 'transport',
      message: `Unexpected ${what} in response: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
    });
  }
  return parsed.data;
}

export async function createNamespace(
  client: KVClient,
  target: Target,
  title: string,
): Promise<Namespace> {
  const envelope = await client.requestJson('POST', namespacesPath(target), {
    body: { json: { title } },
  });
  return parseResult(NamespaceSchema, envelope.result, 'namespace');
}

/**
 * Lists the first page of namespaces in the target's account.
 */
export async function listNamespaces(
  client: KVClient,
  target: Target,
): Promise<ListPage<Namespace>> {
  const envelope = await client.requestJson('GET', namespacesPath(target));
  return {
    items: parseResult(z.array(NamespaceSchema), envelope.result, 'namespace list'),
  };
}

export async function renameNamespace(
  client: KVClient,
  target: Target,
  namespaceId: string,
  title: string,
): Promise<void> {
  await client.requestJson('PUT', namespacePath(target, namespaceId), {
    body: { json: { title } },
  });
}

export async function deleteNamespace(
  client: KVClient,
  target: Target,
  namespaceId: string,
): Promise<void> {
  await client.requestJson('DELETE', namespacePath(target, namespaceId));
}
