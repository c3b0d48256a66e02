import { readFileSync, existsSync } from 'fs';
import { deepmergeCustom } from 'deepmerge-ts';
import {
  type KvctlConfig,
  KvctlConfigSchema,
  type Target,
} from '@kvctl/schemas';
import { ConfigurationError } from './errors.js';
import { getDefaultProjectConfigPath, getUserConfigPath } from './paths.js';

/**
 * Reads and parses a JSON file if it exists.
 * @param path - Absolute path to JSON file
 * @returns Parsed JSON content or undefined if file doesn't exist
 * @throws {ConfigurationError} When the file contains invalid JSON
 * @internal
 */
function readJsonIfExists(path: string): unknown {
  if (!existsSync(path)) return undefined;
  const txt = readFileSync(path, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(txt);
    return parsed;
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Result of loading the merged configuration.
 * @public
 */
export interface LoadedConfig {
  config: KvctlConfig;
  sources: string[];
  paths: { userConfigPath: string; projectConfigPath: string };
}

/**
 * Loads and merges configuration from the user and project config files.
 *
 * Merge precedence (last wins):
 * 1. User config: ~/.kvctl/config.json (or KVCTL_HOME override)
 * 2. Project config: kvctl.json (or explicit path)
 *
 * Arrays are replaced entirely, records are merged key by key with the
 * project file winning. KVCTL_API_BASE_URL overrides `api_base_url`.
 * @param projectConfigPath - Optional explicit path to the project config
 * @throws {ConfigurationError} When no file exists or the merged result is invalid
 * @public
 */
export function resolveMergedConfig(projectConfigPath?: string): LoadedConfig {
  const userConfigPath = getUserConfigPath();
  const projectPath = projectConfigPath ?? getDefaultProjectConfigPath();

  const user = readJsonIfExists(userConfigPath);
  const project = readJsonIfExists(projectPath);

  if (user === undefined && project === undefined) {
    throw new ConfigurationError(
      `No configuration found. Create ${projectPath} or ${userConfigPath}`,
    );
  }

  const merge = deepmergeCustom<Record<string, unknown>>({
    mergeArrays: (values) => values[values.length - 1],
  });

  const merged: unknown = merge(
    isRecord(user) ? user : {},
    isRecord(project) ? project : {},
  );

  const baseUrlOverride = process.env.KVCTL_API_BASE_URL;
  const withOverrides =
    baseUrlOverride && baseUrlOverride.trim()
      ? { ...(isRecord(merged) ? merged : {}), api_base_url: baseUrlOverride.trim() }
      : merged;

  const sources: string[] = [];
  if (user !== undefined) sources.push(userConfigPath);
  if (project !== undefined) sources.push(projectPath);

  const parsed = KvctlConfigSchema.safeParse(withOverrides);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? issue.path.join('.') : '(root)',
    );
    throw new ConfigurationError(
      `Invalid configuration in ${sources.join(', ')}: ${parsed.error.issues
        .map((issue, i) => `${fields[i]}: ${issue.message}`)
        .join('; ')}`,
      fields,
    );
  }

  return {
    config: parsed.data,
    sources,
    paths: { userConfigPath, projectConfigPath: projectPath },
  };
}

/**
 * Builds the Target for a command invocation.
 *
 * Without an environment the top-level fields are used. With one, the
 * environment's `account_id` falls back to the top level, its name defaults
 * to `<name>-<env>`, and its `kv_namespaces` are never inherited: an
 * environment without its own bindings has none.
 * @param config - Merged configuration
 * @param envName - Optional environment key under `env`
 * @throws {ConfigurationError} When the environment is not declared
 * @public
 */
export function resolveTarget(config: KvctlConfig, envName?: string): Target {
  if (envName === undefined) {
    return {
      name: config.name,
      account_id: config.account_id,
      kv_namespaces: config.kv_namespaces,
    };
  }

  const overrides = config.env?.[envName];
  if (!overrides) {
    throw new ConfigurationError(
      `Environment "${envName}" not found in configuration`,
    );
  }

  return {
    name: overrides.name ?? `${config.name}-${envName}`,
    account_id: overrides.account_id ?? config.account_id,
    kv_namespaces: overrides.kv_namespaces,
  };
}
