/**
 * Translation of remote failures into actionable text.
 *
 * Everything here is pure: no I/O, no throwing. Unknown codes and statuses
 * degrade to the store's own message.
 * @internal
 */
import type { ApiError, RemoteFailure } from '../types.js';

const ACCOUNT_ID_HINT =
  'Your kvctl.json is likely missing the field "account_id", which is required to write to KV.';
const NAMESPACE_LIST_HINT =
  'Run `kvctl run kv namespace list` to see your existing namespaces with IDs';
const KEY_LIST_HINT = 'Run `kvctl run kv key list` to see your existing keys';
const LIMITS_HINT = 'See the KV limits documentation for the allowed sizes and rates';
const LEGACY_NAMESPACE_HINT = 'Consider moving this namespace';
const PAID_FEATURE_HINT = 'KV is a paid feature, please upgrade your account';

const entries = (codes: number[], hint: string): Array<[number, string]> =>
  codes.map((code) => [code, hint]);

/**
 * Suggestions keyed by the store's numeric error code.
 */
const ADVISORIES: ReadonlyMap<number, string> = new Map([
  ...entries([7000, 7003], ACCOUNT_ID_HINT),
  ...entries([10010, 10011, 10012, 10013, 10014, 10018], NAMESPACE_LIST_HINT),
  ...entries([10009], KEY_LIST_HINT),
  ...entries([10022, 10024, 10030], LIMITS_HINT),
  ...entries([10021, 10035, 10038], LEGACY_NAMESPACE_HINT),
  ...entries([10017, 10026], PAID_FEATURE_HINT),
]);

/**
 * Advisories for statuses produced by the gateway in front of the store.
 * Such responses carry no store error codes of their own.
 */
const STATUS_ADVISORIES: ReadonlyMap<number, string> = new Map([
  [
    413,
    'Returned status code 413, Payload Too Large. Please make sure your upload is less than 100MB in size',
  ],
  [
    504,
    'Returned status code 504, Gateway Timeout. Please try again in a few seconds',
  ],
]);

/**
 * Suggestion for a store error code, or an empty string when unmapped.
 * @param code - Numeric error code from the store
 */
export function getSuggestion(code: number): string {
  return ADVISORIES.get(code) ?? '';
}

/**
 * Fixed advisory for a gateway status, if the status is one.
 * @param status - HTTP status code
 */
export function getStatusAdvisory(status: number): string | undefined {
  return STATUS_ADVISORIES.get(status);
}

function formatApiError({ code, message }: ApiError): string {
  const suggestion = getSuggestion(code);
  // Each error must stay on its own line.
  const text = message.trim().replace(/\s*\r?\n\s*/g, ' ');
  return suggestion
    ? `Error ${code}: ${text} (${suggestion})`
    : `Error ${code}: ${text}`;
}

/**
 * Turns a remote failure into newline-separated diagnostic lines.
 *
 * For `api` failures a gateway advisory (if any) comes first, then one line
 * per structured error in the order the store sent them. A failure with
 * neither still yields a line naming the status. A `transport` failure
 * yields a single line with the underlying description.
 * @param failure - Failure to describe
 * @example
 * ```typescript
 * formatFailure({ kind: 'api', status: 400, errors: [{ code: 10009, message: 'key not found' }] });
 * // 'Error 10009: key not found (Run `kvctl run kv key list` to see your existing keys)'
 * ```
 */
export function formatFailure(failure: RemoteFailure): string {
  switch (failure.kind) {
    case 'api': {
      const lines: string[] = [];
      const advisory = getStatusAdvisory(failure.status);
      if (advisory) {
        lines.push(advisory);
      }
      lines.push(...failure.errors.map(formatApiError));
      if (lines.length === 0) {
        lines.push(`Error: request failed with status ${failure.status}`);
      }
      return lines.join('\n');
    }
    case 'transport':
      return `Error: ${failure.message}`;
  }
}
