import { z } from 'zod';
import type { Target } from '@kvctl/schemas';
import type { KVClient } from '../kv-client.js';
import {
  type KeyInfo,
  KeyInfoSchema,
  type KeyWriteOptions,
  type ListPage,
} from '../types.js';
import { parseResult } from './namespace.js';
import { namespacePath, valuePath } from './paths.js';

/**
 * Options for listing keys.
 */
export interface ListKeysOptions {
  prefix?: string;
  /** Cursor returned by a previous page */
  cursor?: string;
}

export async function putKey(
  client: KVClient,
  target: Target,
  namespaceId: string,
  key: string,
  value: string,
  { expiration, expirationTtl }: KeyWriteOptions = {},
): Promise<void> {
  await client.requestJson('PUT', valuePath(target, namespaceId, key), {
    query: { expiration, expiration_ttl: expirationTtl },
    body: { text: value },
  });
}

/**
 * Reads a key's value as text.
 */
export async function getKey(
  client: KVClient,
  target: Target,
  namespaceId: string,
  key: string,
): Promise<string> {
  return client.requestText('GET', valuePath(target, namespaceId, key));
}

export async function deleteKey(
  client: KVClient,
  target: Target,
  namespaceId: string,
  key: string,
): Promise<void> {
  await client.requestJson('DELETE', valuePath(target, namespaceId, key));
}

/**
 * Lists one page of keys. The store's cursor is returned as-is when it
 * reports one; following it is left to the caller.
 */
export async function listKeys(
  client: KVClient,
  target: Target,
  namespaceId: string,
  { prefix, cursor }: ListKeysOptions = {},
): Promise<ListPage<KeyInfo>> {
  const envelope = await client.requestJson(
    'GET',
    `${namespacePath(target, namespaceId)}/keys`,
    { query: { prefix, cursor } },
  );
  const items = parseResult(z.array(KeyInfoSchema), envelope.result, 'key list');
  const nextCursor = envelope.result_info?.cursor;
  return nextCursor ? { items, cursor: nextCursor } : { items };
}
