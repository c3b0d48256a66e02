// Zod schemas for the user identity used to authenticate against the store
import { z } from 'zod';

export const ApiTokenCredentialsSchema = z.object({
  type: z.literal('token'),
  api_token: z.string().min(1),
});

export const GlobalKeyCredentialsSchema = z.object({
  type: z.literal('global-key'),
  email: z.string().min(1),
  api_key: z.string().min(1),
});

export const CredentialsSchema = z.discriminatedUnion('type', [
  ApiTokenCredentialsSchema,
  GlobalKeyCredentialsSchema,
]);
