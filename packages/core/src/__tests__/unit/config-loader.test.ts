import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_API_BASE_URL, type KvctlConfig } from '@kvctl/schemas';
import { resolveMergedConfig, resolveTarget } from '../../config-loader.js';
import { ConfigurationError } from '../../errors.js';

describe('resolveMergedConfig', () => {
  let workDir: string;
  let homeDir: string;
  let projectPath: string;
  const savedEnv = { ...process.env };

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'kvctl-config-'));
    homeDir = join(workDir, 'home');
    mkdirSync(homeDir);
    projectPath = join(workDir, 'kvctl.json');
    process.env.KVCTL_HOME = homeDir;
    delete process.env.KVCTL_API_BASE_URL;
  });

  afterEach(() => {
    process.env = { ...savedEnv };
    rmSync(workDir, { recursive: true, force: true });
  });

  it('should load the project config and record its source', () => {
    writeFileSync(
      projectPath,
      JSON.stringify({
        name: 'my-worker',
        account_id: 'account-1',
        kv_namespaces: [{ binding: 'CACHE', id: 'ns-1' }],
      }),
    );

    const { config, sources } = resolveMergedConfig(projectPath);

    expect(config.name).toBe('my-worker');
    expect(config.account_id).toBe('account-1');
    expect(config.api_base_url).toBe(DEFAULT_API_BASE_URL);
    expect(sources).toEqual([projectPath]);
  });

  it('should let the project config win over the user config', () => {
    writeFileSync(
      join(homeDir, 'config.json'),
      JSON.stringify({
        account_id: 'user-account',
        credentials: { type: 'token', api_token: 'test-token' },
        kv_namespaces: [{ binding: 'USER', id: 'ns-user' }],
      }),
    );
    writeFileSync(
      projectPath,
      JSON.stringify({
        name: 'my-worker',
        account_id: 'project-account',
        kv_namespaces: [{ binding: 'CACHE', id: 'ns-1' }],
      }),
    );

    const { config, sources } = resolveMergedConfig(projectPath);

    expect(config.account_id).toBe('project-account');
    expect(config.credentials).toEqual({ type: 'token', api_token: 'test-token' });
    // arrays are replaced, not concatenated
    expect(config.kv_namespaces).toEqual([{ binding: 'CACHE', id: 'ns-1' }]);
    expect(sources).toEqual([join(homeDir, 'config.json'), projectPath]);
  });

  it('should apply the KVCTL_API_BASE_URL override', () => {
    writeFileSync(projectPath, JSON.stringify({ name: 'my-worker' }));
    process.env.KVCTL_API_BASE_URL = 'http://localhost:8787/client/v4';

    const { config } = resolveMergedConfig(projectPath);

    expect(config.api_base_url).toBe('http://localhost:8787/client/v4');
  });

  it('should throw ConfigurationError when no config file exists', () => {
    expect(() => resolveMergedConfig(projectPath)).toThrow(ConfigurationError);
  });

  it('should throw ConfigurationError for invalid JSON', () => {
    writeFileSync(projectPath, '{ not json');

    expect(() => resolveMergedConfig(projectPath)).toThrow(/Failed to parse/);
  });

  it('should list every invalid field', () => {
    writeFileSync(
      projectPath,
      JSON.stringify({ kv_namespaces: [{ binding: 'CACHE' }] }),
    );

    try {
      resolveMergedConfig(projectPath);
      expect.fail('expected resolveMergedConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.missingFields).toEqual(['name', 'kv_namespaces.0.id']);
      }
    }
  });
});

describe('resolveTarget', () => {
  const config: KvctlConfig = {
    name: 'my-worker',
    account_id: 'account-1',
    api_base_url: DEFAULT_API_BASE_URL,
    kv_namespaces: [{ binding: 'CACHE', id: 'ns-1' }],
    env: {
      staging: { kv_namespaces: [{ binding: 'CACHE', id: 'ns-2' }] },
      production: { name: 'prod-worker', account_id: 'account-2' },
    },
  };

  it('should use top-level fields without an environment', () => {
    expect(resolveTarget(config)).toEqual({
      name: 'my-worker',
      account_id: 'account-1',
      kv_namespaces: [{ binding: 'CACHE', id: 'ns-1' }],
    });
  });

  it('should overlay an environment and derive its name', () => {
    expect(resolveTarget(config, 'staging')).toEqual({
      name: 'my-worker-staging',
      account_id: 'account-1',
      kv_namespaces: [{ binding: 'CACHE', id: 'ns-2' }],
    });
  });

  it('should not inherit namespaces into an environment', () => {
    expect(resolveTarget(config, 'production')).toEqual({
      name: 'prod-worker',
      account_id: 'account-2',
      kv_namespaces: undefined,
    });
  });

  it('should throw ConfigurationError for an unknown environment', () => {
    expect(() => resolveTarget(config, 'qa')).toThrow(
      'Environment "qa" not found in configuration',
    );
  });
});
