import { getPool, withTransaction } from './index.js';
import { encryptSensitiveFields, decryptSensitiveFields } from '../utils/encryption.js';
import type { Provider } from '../utils/location.js';

/** Opaque per-provider credential map; only the matching upload adapter reads it */
export type CredentialMap = Record<string, unknown>;

export interface CloudCredential {
  id: number;
  owner_id: number;
  provider: Provider;
  credentials: CredentialMap;
  name: string | null;
  is_default: boolean;
  created_at: Date;
  updated_at: Date;
}

type CloudCredentialRow = {
  id: number;
  owner_id: number;
  provider: Provider;
  credentials: CredentialMap;
  name: string | null;
  is_default: boolean;
  created_at: Date;
  updated_at: Date;
};

// Fields encrypted at rest, per provider
const SENSITIVE_FIELDS: Record<Provider, readonly string[]> = {
  s3: ['access_key', 'secret_key'],
  gdrive: ['token', 'refresh_token', 'client_secret'],
  rclone: [],
};

function toCloudCredential(row: CloudCredentialRow): CloudCredential {
  return {
    ...row,
    credentials: decryptSensitiveFields(row.credentials, SENSITIVE_FIELDS[row.provider] ?? []),
  };
}

/**
 * Credentials for one provider of an owner
 */
export async function getCredentialRecord(ownerId: number, provider: Provider): Promise<CloudCredential | null> {
  const result = await getPool().query<CloudCredentialRow>(
    'SELECT * FROM cloud_credentials WHERE owner_id = $1 AND provider = $2',
    [ownerId, provider]
  );
  return result.rows[0] ? toCloudCredential(result.rows[0]) : null;
}

export async function getCredentials(ownerId: number, provider: Provider): Promise<CredentialMap | null> {
  const record = await getCredentialRecord(ownerId, provider);
  return record ? record.credentials : null;
}

/**
 * The owner's default-flagged record, whichever provider it belongs to.
 * The flag is owner-scoped (see saveCredentials), so at most one row is expected.
 */
export async function getDefaultCredential(ownerId: number): Promise<CloudCredential | null> {
  const result = await getPool().query<CloudCredentialRow>(
    'SELECT * FROM cloud_credentials WHERE owner_id = $1 AND is_default = TRUE ORDER BY updated_at DESC LIMIT 1',
    [ownerId]
  );
  return result.rows[0] ? toCloudCredential(result.rows[0]) : null;
}

export async function listCredentials(ownerId: number): Promise<CloudCredential[]> {
  const result = await getPool().query<CloudCredentialRow>(
    'SELECT * FROM cloud_credentials WHERE owner_id = $1 ORDER BY provider',
    [ownerId]
  );
  return result.rows.map(toCloudCredential);
}

export interface SaveCredentialsOptions {
  name?: string | null;
  makeDefault?: boolean;
}

/**
 * Create or replace the owner's credentials for a provider.
 * makeDefault clears the default flag on every one of the owner's rows first,
 * not only the rows of this provider.
 */
export async function saveCredentials(
  ownerId: number,
  provider: Provider,
  credentials: CredentialMap,
  options: SaveCredentialsOptions = {}
): Promise<CloudCredential> {
  const makeDefault = options.makeDefault ?? false;
  const encrypted = encryptSensitiveFields(credentials, SENSITIVE_FIELDS[provider]);

  return withTransaction(async (client) => {
    if (makeDefault) {
      await client.query(
        'UPDATE cloud_credentials SET is_default = FALSE WHERE owner_id = $1',
        [ownerId]
      );
    }

    const result = await client.query<CloudCredentialRow>(
      `INSERT INTO cloud_credentials (owner_id, provider, credentials, name, is_default)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (owner_id, provider) DO UPDATE
       SET credentials = EXCLUDED.credentials, name = EXCLUDED.name,
           is_default = EXCLUDED.is_default, updated_at = NOW()
       RETURNING *`,
      [ownerId, provider, JSON.stringify(encrypted), options.name ?? null, makeDefault]
    );
    return toCloudCredential(result.rows[0]);
  });
}
