export { NamespaceBindingSchema } from './NamespaceBindingSchema.js';
export { TargetSchema } from './TargetSchema.js';
export { EnvironmentSchema } from './EnvironmentSchema.js';
export {
  CredentialsSchema,
  ApiTokenCredentialsSchema,
  GlobalKeyCredentialsSchema,
} from './CredentialsSchema.js';
export { KvctlConfigSchema, DEFAULT_API_BASE_URL } from './KvctlConfigSchema.js';
