import type { GlobalUser, KvctlConfig } from '@kvctl/schemas';
import { ConfigurationError } from './errors.js';

/**
 * Resolves the user identity used to authenticate against the store.
 *
 * Order: KVCTL_API_TOKEN, then KVCTL_EMAIL together with KVCTL_API_KEY,
 * then `credentials` from the merged config.
 * @param config - Merged configuration
 * @param env - Environment to read (defaults to process.env)
 * @throws {ConfigurationError} When only half of an email/key pair is set, or nothing is found
 * @public
 */
export function resolveGlobalUser(
  config: Pick<KvctlConfig, 'credentials'>,
  env: NodeJS.ProcessEnv = process.env,
): GlobalUser {
  const token = env.KVCTL_API_TOKEN?.trim();
  if (token) {
    return { type: 'token', api_token: token };
  }

  const email = env.KVCTL_EMAIL?.trim();
  const apiKey = env.KVCTL_API_KEY?.trim();
  if (email || apiKey) {
    const missing: string[] = [];
    if (!email) missing.push('KVCTL_EMAIL');
    if (!apiKey) missing.push('KVCTL_API_KEY');
    if (email && apiKey) {
      return { type: 'global-key', email, api_key: apiKey };
    }
    throw new ConfigurationError(
      `Incomplete credentials in environment, missing: ${missing.join(', ')}`,
      missing,
    );
  }

  if (config.credentials) {
    return config.credentials;
  }

  throw new ConfigurationError(
    'No credentials found. Set KVCTL_API_TOKEN, or KVCTL_EMAIL and KVCTL_API_KEY, or add "credentials" to your user config',
    ['credentials'],
  );
}
