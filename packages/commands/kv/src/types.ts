import { z } from 'zod';

/**
 * One `(code, message)` pair from the store's `errors` array.
 */
export const ApiErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
});

export type ApiError = z.infer<typeof ApiErrorSchema>;

/**
 * Response envelope wrapped around every JSON response of the store's API.
 */
export const ApiEnvelopeSchema = z.object({
  success: z.boolean(),
  errors: z.array(ApiErrorSchema).default([]),
  messages: z.array(z.unknown()).default([]),
  result: z.unknown(),
  result_info: z
    .object({
      count: z.number().optional(),
      cursor: z.string().optional(),
      page: z.number().optional(),
      per_page: z.number().optional(),
      total_count: z.number().optional(),
    })
    .optional(),
});

export type ApiEnvelope = z.infer<typeof ApiEnvelopeSchema>;

/**
 * Outcome of a failed remote call.
 *
 * `api`: the store (or the gateway in front of it) answered with an error
 * status and zero or more structured errors.
 * `transport`: the request never produced a response (DNS, TLS, connection
 * reset, timeout).
 */
export type RemoteFailure =
  | { kind: 'api'; status: number; errors: ApiError[] }
  | { kind: 'transport'; message: string };

export const NamespaceSchema = z.object({
  id: z.string(),
  title: z.string(),
  supports_url_encoding: z.boolean().optional(),
});

export type Namespace = z.infer<typeof NamespaceSchema>;

export const KeyInfoSchema = z.object({
  name: z.string(),
  expiration: z.number().optional(),
  metadata: z.unknown().optional(),
});

export type KeyInfo = z.infer<typeof KeyInfoSchema>;

/**
 * One page of a listing. `cursor` is passed through untouched when the
 * store reports more results.
 */
export interface ListPage<T> {
  items: T[];
  cursor?: string;
}

/**
 * Entry of a bulk upload file.
 */
export const BulkPutEntrySchema = z.object({
  key: z.string().min(1),
  value: z.string(),
  expiration: z.number().int().positive().optional(),
  expiration_ttl: z.number().int().positive().optional(),
  base64: z.boolean().optional(),
});

export type BulkPutEntry = z.infer<typeof BulkPutEntrySchema>;

export const BulkPutFileSchema = z.array(BulkPutEntrySchema);

/**
 * A bulk delete file lists keys either as strings or as bulk upload entries,
 * so the file used for an upload can be reused to undo it.
 */
export const BulkDeleteFileSchema = z.array(
  z.union([z.string().min(1), z.object({ key: z.string().min(1) })]),
);

/**
 * Expiry options for a single key write. `expiration` is an absolute epoch
 * in seconds, `expirationTtl` a number of seconds from now.
 */
export interface KeyWriteOptions {
  expiration?: number;
  expirationTtl?: number;
}
