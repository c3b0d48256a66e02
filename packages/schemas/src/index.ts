import { z } from 'zod';
import {
  CredentialsSchema,
  KvctlConfigSchema,
  NamespaceBindingSchema,
  TargetSchema,
} from './config/index.js';

export * from './config/index.js';

export type NamespaceBinding = z.infer<typeof NamespaceBindingSchema>;
export type Target = z.infer<typeof TargetSchema>;
export type GlobalUser = z.infer<typeof CredentialsSchema>;
export type KvctlConfig = z.infer<typeof KvctlConfigSchema>;
