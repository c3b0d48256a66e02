import { homedir } from 'os';
import { join, resolve } from 'path';

const PROJECT_CONFIG_FILENAME = 'kvctl.json';
const USER_CONFIG_FILENAME = 'config.json';

/**
 * Returns the user-level kvctl directory.
 *
 * Resolves to KVCTL_HOME if set, otherwise ~/.kvctl
 * @public
 */
export function getUserDir(): string {
  const override = process.env.KVCTL_HOME;
  if (override && override.trim()) return override;
  return join(homedir(), '.kvctl');
}

/**
 * Returns the user-level configuration file path.
 * @public
 */
export function getUserConfigPath(): string {
  return join(getUserDir(), USER_CONFIG_FILENAME);
}

/**
 * Returns the default project-level configuration file path.
 * @param cwd - Working directory to resolve from
 * @public
 */
export function getDefaultProjectConfigPath(cwd = process.cwd()): string {
  return resolve(cwd, PROJECT_CONFIG_FILENAME);
}
