/**
 * Credential store tests
 *
 * Round-trip through encryption at rest, and the owner-scoped default flag
 */

import { describe, it, expect } from 'vitest';
import {
  saveCredentials,
  getCredentials,
  getCredentialRecord,
  getDefaultCredential,
  listCredentials,
} from '../src/db/cloud-credentials.js';
import { getPool } from '../src/db/index.js';
import { isEncrypted } from '../src/utils/encryption.js';

const OWNER = 1;
const OTHER_OWNER = 2;

const gdriveCredentials = {
  token: 'test-access-token',
  refresh_token: 'test-refresh-token',
  token_uri: 'https://oauth2.googleapis.com/token',
  client_id: 'test-client-id',
  client_secret: 'test-client-secret',
  scopes: ['https://www.googleapis.com/auth/drive.file'],
};

describe('Credential store', () => {
  it('should return saved credentials unchanged', async () => {
    const input = { access_key: 'A', secret_key: 'B', region: 'us-east-1' };
    await saveCredentials(OWNER, 's3', input);

    expect(await getCredentials(OWNER, 's3')).toEqual(input);
  });

  it('should return secrets shaped like ciphertext unchanged', async () => {
    const input = { access_key: 'ab:cd:ef', secret_key: 'B', region: 'us-east-1' };
    await saveCredentials(OWNER, 's3', input);

    expect(await getCredentials(OWNER, 's3')).toEqual(input);
  });

  it('should return null when the provider has no credentials', async () => {
    expect(await getCredentials(OWNER, 'rclone')).toBeNull();
  });

  it('should encrypt sensitive fields at rest', async () => {
    await saveCredentials(OWNER, 's3', { access_key: 'A', secret_key: 'B', region: 'eu-west-1' });

    const result = await getPool().query<{ credentials: Record<string, unknown> }>(
      'SELECT credentials FROM cloud_credentials WHERE owner_id = $1',
      [OWNER]
    );
    const stored = result.rows[0].credentials;
    expect(typeof stored.access_key === 'string' && isEncrypted(stored.access_key)).toBe(true);
    expect(typeof stored.secret_key === 'string' && isEncrypted(stored.secret_key)).toBe(true);
    expect(stored.region).toBe('eu-west-1');
  });

  it('should keep one row per owner and provider', async () => {
    await saveCredentials(OWNER, 'rclone', { remote: 'first', type: 'drive' }, { name: 'First' });
    await saveCredentials(OWNER, 'rclone', { remote: 'second', type: 'b2' }, { name: 'Second' });

    const records = await listCredentials(OWNER);
    expect(records).toHaveLength(1);
    expect(records[0].name).toBe('Second');
    expect(records[0].credentials).toEqual({ remote: 'second', type: 'b2' });
  });

  it('should round-trip gdrive token material', async () => {
    await saveCredentials(OWNER, 'gdrive', gdriveCredentials);

    expect(await getCredentials(OWNER, 'gdrive')).toEqual(gdriveCredentials);
  });

  describe('default flag', () => {
    it('should clear the default of every provider of the owner when a new default is saved', async () => {
      await saveCredentials(OWNER, 's3', { access_key: 'A', secret_key: 'B', region: 'us-east-1' }, { makeDefault: true });
      await saveCredentials(OWNER, 'gdrive', gdriveCredentials, { makeDefault: true });

      const defaultRecord = await getDefaultCredential(OWNER);
      expect(defaultRecord?.provider).toBe('gdrive');
      expect(defaultRecord?.credentials).toEqual(gdriveCredentials);

      const s3Record = await getCredentialRecord(OWNER, 's3');
      expect(s3Record?.is_default).toBe(false);
    });

    it('should leave the defaults of other owners alone', async () => {
      await saveCredentials(OTHER_OWNER, 's3', { access_key: 'C', secret_key: 'D', region: 'us-east-1' }, { makeDefault: true });
      await saveCredentials(OWNER, 'gdrive', gdriveCredentials, { makeDefault: true });

      const otherDefault = await getDefaultCredential(OTHER_OWNER);
      expect(otherDefault?.provider).toBe('s3');
      expect(otherDefault?.owner_id).toBe(OTHER_OWNER);
    });

    it('should return null when no record is flagged default', async () => {
      await saveCredentials(OWNER, 's3', { access_key: 'A', secret_key: 'B', region: 'us-east-1' });

      expect(await getDefaultCredential(OWNER)).toBeNull();
    });
  });
});
