import type { Target } from '@kvctl/schemas';
import { ConfigurationError } from '@kvctl/core';

/**
 * Checks the fields a target needs before any remote call.
 *
 * Collects every missing field and reports them together in one error.
 * @param target - Target to check
 * @throws {ConfigurationError} Listing each missing field
 */
export function validateTarget(target: Target): void {
  const missingFields: string[] = [];

  if (target.account_id === '') {
    missingFields.push('account_id');
  }

  if (missingFields.length > 0) {
    throw new ConfigurationError(
      `Your kvctl.json is missing the following field(s): ${missingFields
        .map((field) => `"${field}"`)
        .join(', ')}`,
      missingFields,
    );
  }
}
