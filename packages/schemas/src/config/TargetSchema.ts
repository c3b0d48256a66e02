// Resolved deployment target: account identity plus its namespace bindings
import { z } from 'zod';
import { NamespaceBindingSchema } from './NamespaceBindingSchema.js';

export const TargetSchema = z.object({
  name: z.string(),
  // Empty is allowed here; validateTarget() rejects it before any remote call
  account_id: z.string().default(''),
  kv_namespaces: z.array(NamespaceBindingSchema).optional(),
});
