import { google } from 'googleapis';
import { createReadStream } from 'fs';
import path from 'path';
import type { GdriveCredentials } from '../schemas/cloud-credentials.js';

/**
 * OAuth2 client from stored token material. The library refreshes the
 * access token with the refresh token when it has expired.
 */
export function createDriveAuth(credentials: GdriveCredentials) {
  const auth = new google.auth.OAuth2(credentials.client_id, credentials.client_secret);
  auth.setCredentials({
    access_token: credentials.token,
    refresh_token: credentials.refresh_token ?? null,
    scope: credentials.scopes?.join(' '),
  });
  return auth;
}

/**
 * Create a file resource, optionally under a parent folder, and upload the content
 */
export async function uploadToDrive(
  credentials: GdriveCredentials,
  localFilePath: string,
  folderId?: string | null
): Promise<{ fileId: string }> {
  const drive = google.drive({ version: 'v3', auth: createDriveAuth(credentials) });

  const response = await drive.files.create({
    requestBody: {
      name: path.basename(localFilePath),
      parents: folderId ? [folderId] : undefined,
    },
    media: {
      body: createReadStream(localFilePath),
    },
    fields: 'id',
  });

  const fileId = response.data.id;
  if (!fileId) {
    throw new Error('Drive API returned no file id');
  }
  return { fileId };
}
