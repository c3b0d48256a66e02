/**
 * Encodes a key so that it fits in exactly one URL path segment.
 *
 * Every byte outside the unreserved set is percent-encoded from its UTF-8
 * form, `/` included; `decodeURIComponent` reverses it.
 * @param key - Raw key name
 * @throws {URIError} For strings holding a lone surrogate, which have no UTF-8 form
 */
export function encodeKey(key: string): string {
  return encodeURIComponent(key);
}
