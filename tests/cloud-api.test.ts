/**
 * Cloud configuration API tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app.js';
import { generateAccessToken } from '../src/utils/jwt.js';
import { getCredentials } from '../src/db/cloud-credentials.js';

const OWNER = 1;

let app: Express;
let authToken: string;

beforeAll(() => {
  app = createApp({ skipRateLimiting: true });
  authToken = generateAccessToken({ userId: OWNER, email: 'operator@example.com' });
});

describe('Cloud API', () => {
  it('should require authentication', async () => {
    await request(app).post('/api/cloud/configure/s3').expect(401);
    await request(app).get('/api/cloud/status').expect(401);
  });

  describe('POST /api/cloud/configure/:provider', () => {
    it('should store s3 credentials with the default region', async () => {
      const response = await request(app)
        .post('/api/cloud/configure/s3')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ access_key: 'A', secret_key: 'B' })
        .expect(200);

      expect(response.body).toEqual({ success: true, provider: 's3', name: null, default: false });
      expect(await getCredentials(OWNER, 's3')).toEqual({ access_key: 'A', secret_key: 'B', region: 'us-east-1' });
    });

    it('should keep a custom s3 endpoint', async () => {
      await request(app)
        .post('/api/cloud/configure/s3')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ access_key: 'A', secret_key: 'B', region: 'eu-central-1', endpoint: 'https://objects.example.test' })
        .expect(200);

      expect(await getCredentials(OWNER, 's3')).toEqual({
        access_key: 'A',
        secret_key: 'B',
        region: 'eu-central-1',
        endpoint: 'https://objects.example.test',
      });
    });

    it('should store gdrive token material with the token endpoint and scopes', async () => {
      const response = await request(app)
        .post('/api/cloud/configure/gdrive')
        .set('Authorization', `Bearer ${authToken}`)
        .send({
          name: 'Team drive',
          default: true,
          token: 'test-access-token',
          client_id: 'test-client-id',
          client_secret: 'test-client-secret',
        })
        .expect(200);

      expect(response.body).toEqual({ success: true, provider: 'gdrive', name: 'Team drive', default: true });
      expect(await getCredentials(OWNER, 'gdrive')).toEqual({
        token: 'test-access-token',
        refresh_token: null,
        token_uri: 'https://oauth2.googleapis.com/token',
        client_id: 'test-client-id',
        client_secret: 'test-client-secret',
        scopes: ['https://www.googleapis.com/auth/drive.file'],
      });
    });

    it('should store rclone remotes with the default type', async () => {
      await request(app)
        .post('/api/cloud/configure/rclone')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ remote: 'offsite' })
        .expect(200);

      expect(await getCredentials(OWNER, 'rclone')).toEqual({ remote: 'offsite', type: 'drive' });
    });

    it('should reject an unsupported provider', async () => {
      const response = await request(app)
        .post('/api/cloud/configure/dropbox')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ token: 'test-token' })
        .expect(400);

      expect(response.body).toEqual({ error: 'Unsupported provider: dropbox' });
    });

    it('should report missing fields', async () => {
      const response = await request(app)
        .post('/api/cloud/configure/s3')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ secret_key: 'B' })
        .expect(400);

      expect(response.body).toEqual({ error: 'Validation failed', details: ['access_key: Required'] });
    });
  });

  describe('GET /api/cloud/status', () => {
    it('should report every provider as unconfigured initially', async () => {
      const response = await request(app)
        .get('/api/cloud/status')
        .set('Authorization', `Bearer ${authToken}`)
        .expect(200);

      expect(response.body).toEqual({
        s3: { configured: false, default: false },
        gdrive: { configured: false, default: false },
        rclone: { configured: false, default: false },
      });
    });

    it('should move the default to the most recently saved default provider', async () => {
      await request(app)
        .post('/api/cloud/configure/s3')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ access_key: 'A', secret_key: 'B', default: true })
        .expect(200);
      await request(app)
        .post('/api/cloud/configure/gdrive')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ token: 'test-access-token', client_id: 'test-client-id', client_secret: 'test-client-secret', default: true })
        .expect(200);

      const response = await request(app)
        .get('/api/cloud/status')
        .set('Authorization', `Bearer ${authToken}`)
        .expect(200);

      expect(response.body).toEqual({
        s3: { configured: true, default: false },
        gdrive: { configured: true, default: true },
        rclone: { configured: false, default: false },
      });
    });
  });
});
