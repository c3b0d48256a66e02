import { describe, it, expect } from 'vitest';
import * as core from '../../index.js';

describe('@kvctl/core exports', () => {
  it('should not expose internal constants', () => {
    expect(Object.keys(core).sort()).toEqual([
      'ConfigurationError',
      'ConsoleLogger',
      'createRootLogger',
      'getDefaultProjectConfigPath',
      'getLogDir',
      'getLogFilePath',
      'getUserConfigPath',
      'getUserDir',
      'logError',
      'logEvent',
      'resolveGlobalUser',
      'resolveMergedConfig',
      'resolveTarget',
      'rootLogger',
    ]);
  });
});
