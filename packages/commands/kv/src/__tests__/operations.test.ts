import { describe, it, expect, beforeEach } from 'vitest';
import {
  BASE_URL,
  createTarget,
  fetchCall,
  jsonResponse,
  mockFetch,
  successEnvelope,
} from './test-utils.js';
import { KVClient } from '../kv-client.js';
import { KVCommandError } from '../errors.js';
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
} from '../operations/index.js';

const NAMESPACES = `${BASE_URL}/accounts/acc123/storage/kv/namespaces`;

describe('KV operations', () => {
  const target = createTarget();
  let client: KVClient;

  beforeEach(() => {
    client = new KVClient({ type: 'token', api_token: 'test-token' }, { baseUrl: BASE_URL });
    mockFetch.mockReset();
  });

  describe('namespaces', () => {
    it('should create a namespace with the given title', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse(successEnvelope({ id: 'ns-new', title: 'my-worker-CACHE' })),
      );

      const namespace = await createNamespace(client, target, 'my-worker-CACHE');

      const { url, init } = fetchCall();
      expect(url).toBe(NAMESPACES);
      expect(init.method).toBe('POST');
      expect(init.body).toBe('{"title":"my-worker-CACHE"}');
      expect(namespace).toEqual({ id: 'ns-new', title: 'my-worker-CACHE' });
    });

    it('should list namespaces', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse(
          successEnvelope([
            { id: 'ns-1', title: 'one', supports_url_encoding: true },
            { id: 'ns-2', title: 'two' },
          ]),
        ),
      );

      const page = await listNamespaces(client, target);

      expect(page).toEqual({
        items: [
          { id: 'ns-1', title: 'one', supports_url_encoding: true },
          { id: 'ns-2', title: 'two' },
        ],
      });
    });

    it('should reject a malformed result', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(successEnvelope({ id: 42 })));

      await expect(createNamespace(client, target, 'x')).rejects.toMatchObject({
        failure: { kind: 'transport' },
      });
    });

    it('should rename a namespace', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(successEnvelope(null)));

      await renameNamespace(client, target, 'ns-cache', 'renamed');

      const { url, init } = fetchCall();
      expect(url).toBe(`${NAMESPACES}/ns-cache`);
      expect(init.method).toBe('PUT');
      expect(init.body).toBe('{"title":"renamed"}');
    });
  });

  describe('keys', () => {
    it('should write a value with expiry options under an encoded key', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(successEnvelope(null)));

      await putKey(client, target, 'ns-cache', 'pages/home', '<h1>hi</h1>', {
        expirationTtl: 60,
      });

      const { url, init } = fetchCall();
      expect(url).toBe(`${NAMESPACES}/ns-cache/values/pages%2Fhome?expiration_ttl=60`);
      expect(init.method).toBe('PUT');
      expect(init.body).toBe('<h1>hi</h1>');
    });

    it('should read a value as text', async () => {
      mockFetch.mockResolvedValueOnce(new Response('stored value', { status: 200 }));

      await expect(getKey(client, target, 'ns-cache', 'greeting')).resolves.toBe(
        'stored value',
      );
      expect(fetchCall().url).toBe(`${NAMESPACES}/ns-cache/values/greeting`);
    });

    it('should delete a key', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(successEnvelope(null)));

      await deleteKey(client, target, 'ns-cache', 'a b');

      const { url, init } = fetchCall();
      expect(url).toBe(`${NAMESPACES}/ns-cache/values/a%20b`);
      expect(init.method).toBe('DELETE');
    });

    it('should return the cursor of a partial listing', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse(
          successEnvelope([{ name: 'user:1' }, { name: 'user:2', expiration: 1700000000 }], {
            count: 2,
            cursor: 'next-page',
          }),
        ),
      );

      const page = await listKeys(client, target, 'ns-cache', { prefix: 'user:' });

      expect(fetchCall().url).toBe(`${NAMESPACES}/ns-cache/keys?prefix=user%3A`);
      expect(page).toEqual({
        items: [{ name: 'user:1' }, { name: 'user:2', expiration: 1700000000 }],
        cursor: 'next-page',
      });
    });

    it('should omit the cursor on the last page', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse(successEnvelope([], { count: 0, cursor: '' })),
      );

      const page = await listKeys(client, target, 'ns-cache', { cursor: 'next-page' });

      expect(fetchCall().url).toBe(`${NAMESPACES}/ns-cache/keys?cursor=next-page`);
      expect(page).toEqual({ items: [] });
    });
  });

  describe('request paths', () => {
    it('should keep a namespace id with slashes inside one path segment', async () => {
      mockFetch.mockResolvedValueOnce(new Response('v', { status: 200 }));

      await getKey(client, target, '../../../user/tokens?x=', 'k');

      const { url } = fetchCall();
      expect(url).toBe(`${NAMESPACES}/..%2F..%2F..%2Fuser%2Ftokens%3Fx%3D/values/k`);
      expect(new URL(url).pathname).toBe(
        '/client/v4/accounts/acc123/storage/kv/namespaces/..%2F..%2F..%2Fuser%2Ftokens%3Fx%3D/values/k',
      );
    });

    it('should encode the account id as one path segment', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(successEnvelope([])));

      await listNamespaces(client, createTarget({ account_id: 'acc/../x' }));

      expect(fetchCall().url).toBe(
        `${BASE_URL}/accounts/acc%2F..%2Fx/storage/kv/namespaces`,
      );
    });

    it.each(['.', '..'])('should refuse %j as a namespace id', async (namespaceId) => {
      await expect(deleteNamespace(client, target, namespaceId)).rejects.toThrow(
        new KVCommandError(`Invalid namespace id "${namespaceId}"`),
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should refuse a dot-segment key', async () => {
      await expect(deleteKey(client, target, 'ns-cache', '..')).rejects.toThrow(
        new KVCommandError('Invalid key ".."'),
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('bulk', () => {
    it('should upload all entries in one request', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(successEnvelope(null)));

      await bulkPut(client, target, 'ns-cache', [
        { key: 'a', value: '1' },
        { key: 'b', value: '2', expiration_ttl: 120 },
      ]);

      const { url, init } = fetchCall();
      expect(url).toBe(`${NAMESPACES}/ns-cache/bulk`);
      expect(init.method).toBe('PUT');
      expect(init.body).toBe(
        '[{"key":"a","value":"1"},{"key":"b","value":"2","expiration_ttl":120}]',
      );
    });

    it('should delete keys in one request', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(successEnvelope(null)));

      await bulkDelete(client, target, 'ns-cache', ['a', 'b']);

      const { url, init } = fetchCall();
      expect(url).toBe(`${NAMESPACES}/ns-cache/bulk`);
      expect(init.method).toBe('DELETE');
      expect(init.body).toBe('["a","b"]');
    });
  });
});
