/**
 * Drive API upload adapter
 */
import path from 'path';
import { uploadToDrive } from '../gdrive-service.js';
import { gdriveDestinationSchema } from '../../schemas/destinations.js';
import { gdriveCredentialsSchema } from '../../schemas/cloud-credentials.js';
import { formatGdriveLocation } from '../../utils/location.js';
import { ExecutionLog, parseUploadInput, toUploadError, type UploadAdapter, type UploadReceipt } from './types.js';

export const gdriveAdapter: UploadAdapter = {
  provider: 'gdrive',
  requiresCredentials: true,

  async upload(localFilePath, providerConfig, credentials): Promise<UploadReceipt> {
    const log = new ExecutionLog();

    try {
      const destination = parseUploadInput('gdrive', 'destination config', gdriveDestinationSchema, providerConfig);
      const creds = parseUploadInput('gdrive', 'credentials', gdriveCredentialsSchema, credentials);

      log.add(
        `Uploading ${path.basename(localFilePath)} to Drive` +
        (destination.folder_id ? ` folder ${destination.folder_id}` : '')
      );

      const { fileId } = await uploadToDrive(creds, localFilePath, destination.folder_id);
      const location = formatGdriveLocation(fileId);
      log.add(`Uploaded to ${location}`);

      return { location, executionLog: log.toString() };
    } catch (error) {
      throw toUploadError('gdrive', error, log);
    }
  }
};
