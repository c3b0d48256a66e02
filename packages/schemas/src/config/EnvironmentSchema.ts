// Per-environment overrides layered on top of the top-level target fields
import { z } from 'zod';
import { NamespaceBindingSchema } from './NamespaceBindingSchema.js';

export const EnvironmentSchema = z.object({
  name: z.string().optional(),
  account_id: z.string().optional(),
  kv_namespaces: z.array(NamespaceBindingSchema).optional(),
});
