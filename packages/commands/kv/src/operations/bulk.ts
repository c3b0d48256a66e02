import type { Target } from '@kvctl/schemas';
import type { KVClient } from '../kv-client.js';
import type { BulkPutEntry } from '../types.js';
import { namespacePath } from './paths.js';

/**
 * Writes all entries in one request. No chunking: the store's own size
 * limits apply and surface as a 413 advisory.
 */
export async function bulkPut(
  client: KVClient,
  target: Target,
  namespaceId: string,
  entries: BulkPutEntry[],
): Promise<void> {
  await client.requestJson('PUT', `${namespacePath(target, namespaceId)}/bulk`, {
    body: { json: entries },
  });
}

export async function bulkDelete(
  client: KVClient,
  target: Target,
  namespaceId: string,
  keys: string[],
): Promise<void> {
  await client.requestJson('DELETE', `${namespacePath(target, namespaceId)}/bulk`, {
    body: { json: keys },
  });
}
