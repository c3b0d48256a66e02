import type { GlobalUser } from '@kvctl/schemas';
import { DEFAULT_API_BASE_URL } from '@kvctl/schemas';
import { rootLogger } from '@kvctl/core';
import { RemoteOperationError } from './errors.js';
import { type ApiEnvelope, ApiEnvelopeSchema } from './types.js';

/**
 * Per-request timeout. Bulk uploads of large files routinely outlast the
 * usual 30-second client defaults.
 */
export const KV_CLIENT_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Configuration options for KVClient
 */
export interface KVClientOptions {
  /** API root, e.g. `https://api.cloudflare.com/client/v4` */
  baseUrl?: string;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Options of a single request.
 */
export interface KVRequestOptions {
  query?: Record<string, string | number | undefined>;
  body?: { json: unknown } | { text: string };
}

/**
 * Authentication headers for a user identity.
 * @param user - API token or email/global key pair
 */
export function authHeaders(user: GlobalUser): Record<string, string> {
  switch (user.type) {
    case 'token':
      return { Authorization: `Bearer ${user.api_token}` };
    case 'global-key':
      return { 'X-Auth-Email': user.email, 'X-Auth-Key': user.api_key };
  }
}

/**
 * Describes why fetch() rejected, including the low-level cause that undici
 * wraps inside its generic "fetch failed".
 * @internal
 */
function describeTransportError(error: unknown, method: string, url: string): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError') {
      return `${method} ${url} timed out after ${KV_CLIENT_TIMEOUT_MS / 1000} seconds`;
    }
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

/**
 * Parses a body as the store's JSON envelope; undefined when it is not one
 * (gateway error pages, empty bodies).
 * @internal
 */
function parseEnvelope(text: string): ApiEnvelope | undefined {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = ApiEnvelopeSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Authenticated client for the KV REST API.
 *
 * Performs exactly one HTTP request per call, with no retries. Every failure
 * surfaces as a {@link RemoteOperationError}.
 */
export class KVClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  public constructor(user: GlobalUser, options: KVClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.headers = authHeaders(user);
  }

  /**
   * Sends a request whose response is a JSON envelope.
   * @param method - HTTP method
   * @param path - Path below the API root, already encoded
   * @param options - Query and body
   * @returns The successful envelope
   * @throws {RemoteOperationError} On transport failure, error status or `success: false`
   */
  public async requestJson(
    method: HttpMethod,
    path: string,
    options: KVRequestOptions = {},
  ): Promise<ApiEnvelope> {
    const { response, url } = await this.send(method, path, options);
    const text = await this.readBody(response, method, url);
    const envelope = parseEnvelope(text);

    if (!response.ok || (envelope && !envelope.success)) {
      throw new RemoteOperationError({
        kind: 'api',
        status: response.status,
        errors: envelope?.errors ?? [],
      });
    }

    if (!envelope) {
      throw new RemoteOperationError({
        kind: 'transport',
        message: `Unexpected response body from ${method} ${url}`,
      });
    }

    return envelope;
  }

  /**
   * Sends a request whose successful response is a raw body (key values).
   * Error responses are still parsed as envelopes.
   * @param method - HTTP method
   * @param path - Path below the API root, already encoded
   * @param options - Query and body
   * @throws {RemoteOperationError} On transport failure or error status
   */
  public async requestText(
    method: HttpMethod,
    path: string,
    options: KVRequestOptions = {},
  ): Promise<string> {
    const { response, url } = await this.send(method, path, options);
    const text = await this.readBody(response, method, url);

    if (!response.ok) {
      throw new RemoteOperationError({
        kind: 'api',
        status: response.status,
        errors: parseEnvelope(text)?.errors ?? [],
      });
    }

    return text;
  }

  private buildUrl(path: string, query: KVRequestOptions['query']): string {
    const params = new URLSearchParams();
    for (const [name, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        params.set(name, String(value));
      }
    }
    const search = params.toString();
    return `${this.baseUrl}${path}${search ? `?${search}` : ''}`;
  }

  private async send(
    method: HttpMethod,
    path: string,
    options: KVRequestOptions,
  ): Promise<{ response: Response; url: string }> {
    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = { ...this.headers };
    let body: string | undefined;

    if (options.body && 'json' in options.body) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body.json);
    } else if (options.body) {
      headers['Content-Type'] = 'text/plain';
      body = options.body.text;
    }

    rootLogger.debug({ request: { method, url, headers } }, 'kv request');

    try {
      const response = await fetch(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(KV_CLIENT_TIMEOUT_MS),
      });
      rootLogger.debug({ response: { method, url, status: response.status } }, 'kv response');
      return { response, url };
    } catch (error) {
      throw new RemoteOperationError({
        kind: 'transport',
        message: describeTransportError(error, method, url),
      });
    }
  }

  private async readBody(response: Response, method: string, url: string): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw new RemoteOperationError({
        kind: 'transport',
        message: describeTransportError(error, method, url),
      });
    }
  }
}

/**
 * Builds a client for one command invocation.
 * @param user - Identity to authenticate as
 * @param options - Client options
 */
export function createKVClient(user: GlobalUser, options: KVClientOptions = {}): KVClient {
  return new KVClient(user, options);
}
