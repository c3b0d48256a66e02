import type { Target } from '@kvctl/schemas';
import { KVCommandError } from '../errors.js';
import { encodeKey } from '../util/encode-key.js';

/**
 * Encodes one path segment of a request URL.
 *
 * `.` and `..` pass through percent-encoding unchanged and URL parsing would
 * collapse them, so they are rejected.
 * @param label - Names the value in the error message
 * @throws {KVCommandError} For `.` or `..`
 */
export function pathSegment(value: string, label: string): string {
  if (value === '.' || value === '..') {
    throw new KVCommandError(`Invalid ${label} "${value}"`);
  }
  return encodeKey(value);
}

export function namespacesPath(target: Target): string {
  return `/accounts/${pathSegment(target.account_id, 'account id')}/storage/kv/namespaces`;
}

export function namespacePath(target: Target, namespaceId: string): string {
  return `${namespacesPath(target)}/${pathSegment(namespaceId, 'namespace id')}`;
}

export function valuePath(target: Target, namespaceId: string, key: string): string {
  return `${namespacePath(target, namespaceId)}/values/${pathSegment(key, 'key')}`;
}
