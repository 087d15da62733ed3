/**
 * Object-storage upload adapter (S3 and S3-compatible endpoints)
 */
import path from 'path';
import { uploadToS3, describeS3Error } from '../s3-service.js';
import { s3DestinationSchema } from '../../schemas/destinations.js';
import { s3CredentialsSchema } from '../../schemas/cloud-credentials.js';
import { UploadError } from '../../utils/errors.js';
import { formatS3Location } from '../../utils/location.js';
import { ExecutionLog, parseUploadInput, toUploadError, type UploadAdapter, type UploadReceipt } from './types.js';

export const s3Adapter: UploadAdapter = {
  provider: 's3',
  requiresCredentials: true,

  async upload(localFilePath, providerConfig, credentials): Promise<UploadReceipt> {
    const log = new ExecutionLog();

    try {
      const destination = parseUploadInput('s3', 'destination config', s3DestinationSchema, providerConfig);
      const creds = parseUploadInput('s3', 'credentials', s3CredentialsSchema, credentials);

      const uploadConfig = {
        bucket: destination.bucket,
        prefix: destination.prefix,
        region: creds.region,
        endpoint: creds.endpoint,
        access_key: creds.access_key,
        secret_key: creds.secret_key,
      };

      log.add(`Uploading ${path.basename(localFilePath)} to bucket ${destination.bucket}`);

      let key: string;
      try {
        ({ key } = await uploadToS3(uploadConfig, localFilePath));
      } catch (error) {
        throw new UploadError('s3', describeS3Error(error, uploadConfig), { cause: error });
      }

      const location = formatS3Location(destination.bucket, key);
      log.add(`Uploaded to ${location}`);

      return { location, executionLog: log.toString() };
    } catch (error) {
      throw toUploadError('s3', error, log);
    }
  }
};
