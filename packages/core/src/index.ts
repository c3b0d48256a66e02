export * from './logging/index.js';
export { ConfigurationError } from './errors.js';
export {
  getUserDir,
  getUserConfigPath,
  getDefaultProjectConfigPath,
} from './paths.js';
export {
  resolveMergedConfig,
  resolveTarget,
  type LoadedConfig,
} from './config-loader.js';
export { resolveGlobalUser } from './credentials.js';
