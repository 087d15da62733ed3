import { z } from 'zod';

export const GDRIVE_TOKEN_URI = 'https://oauth2.googleapis.com/token';
export const GDRIVE_SCOPES = ['https://www.googleapis.com/auth/drive.file'];

// Stored credential shapes, as read back by the upload adapters

export const s3CredentialsSchema = z.object({
  access_key: z.string().min(1),
  secret_key: z.string().min(1),
  region: z.string().min(1).default('us-east-1'),
  endpoint: z.string().url().optional(),
});

export const gdriveCredentialsSchema = z.object({
  token: z.string().min(1),
  refresh_token: z.string().nullable().optional(),
  token_uri: z.string().optional(),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  scopes: z.array(z.string()).optional(),
});

export const rcloneCredentialsSchema = z.object({
  remote: z.string().min(1),
  type: z.string().optional(),
});

export type GdriveCredentials = z.infer<typeof gdriveCredentialsSchema>;

// Request bodies for POST /api/cloud/configure/:provider

const configureCommon = {
  name: z.string().max(255).optional(),
  default: z.boolean().optional().default(false),
};

export const configureS3Schema = z.object({
  ...configureCommon,
  access_key: z.string().min(1, 'access_key is required').max(255),
  secret_key: z.string().min(1, 'secret_key is required').max(255),
  region: z.string().min(1).max(64).optional().default('us-east-1'),
  endpoint: z.string().url().max(1024).optional(),
});

export const configureGdriveSchema = z.object({
  ...configureCommon,
  token: z.string().min(1, 'token is required'),
  refresh_token: z.string().optional(),
  client_id: z.string().min(1, 'client_id is required').max(255),
  client_secret: z.string().min(1, 'client_secret is required').max(255),
});

export const configureRcloneSchema = z.object({
  ...configureCommon,
  remote: z.string().min(1, 'remote is required').max(255),
  type: z.string().min(1).max(64).optional().default('drive'),
});
