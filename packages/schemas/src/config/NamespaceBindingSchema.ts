// A single KV namespace binding declared in the project config
import { z } from 'zod';

export const NamespaceBindingSchema = z.object({
  binding: z.string(),
  id: z.string(),
  bucket: z.string().optional(), // local directory association, not used for resolution
});
