import { z } from 'zod';
import { NamespaceBindingSchema } from './NamespaceBindingSchema.js';
import { EnvironmentSchema } from './EnvironmentSchema.js';
import { CredentialsSchema } from './CredentialsSchema.js';

export const DEFAULT_API_BASE_URL = 'https://api.cloudflare.com/client/v4';

export const KvctlConfigSchema = z.object({
  name: z.string().min(1),
  account_id: z.string().default(''),
  kv_namespaces: z.array(NamespaceBindingSchema).optional(),
  env: z.record(z.string(), EnvironmentSchema).optional(),
  api_base_url: z.string().url().default(DEFAULT_API_BASE_URL),
  credentials: CredentialsSchema.optional(),
});
