import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import path from 'path';

export interface S3UploadConfig {
  bucket: string;
  prefix?: string;
  region: string;
  endpoint?: string;
  access_key: string;
  secret_key: string;
}

export function createS3Client(config: S3UploadConfig): S3Client {
  const clientConfig: ConstructorParameters<typeof S3Client>[0] = {
    region: config.region,
    credentials: {
      accessKeyId: config.access_key,
      secretAccessKey: config.secret_key,
    },
  };

  // Support S3-compatible storage (MinIO, Backblaze B2, etc.)
  if (config.endpoint) {
    clientConfig.endpoint = config.endpoint;
    clientConfig.forcePathStyle = true;
  }

  return new S3Client(clientConfig);
}

/**
 * Object key for an uploaded file: {prefix}/{fileName}, or just fileName without a prefix
 */
export function buildS3Key(prefix: string | undefined, fileName: string): string {
  const trimmed = (prefix ?? '').replace(/^\/+|\/+$/g, '');
  return trimmed ? `${trimmed}/${fileName}` : fileName;
}

/**
 * Turn an AWS SDK error into a message an operator can act on
 */
export function describeS3Error(error: unknown, config: Pick<S3UploadConfig, 'bucket' | 'endpoint'>): string {
  const err = (typeof error === 'object' && error !== null ? error : {}) as {
    name?: string;
    message?: string;
    Code?: string;
    $metadata?: { httpStatusCode?: number };
  };

  const statusCode = err.$metadata?.httpStatusCode;
  const code = err.Code || err.name || 'UnknownError';
  const message = err.message || 'Unknown error occurred';

  let detailedMessage = message;
  if (statusCode === 403) {
    detailedMessage = 'Access denied. Check the access key and secret key have permission to write to the bucket.';
  } else if (statusCode === 404 || code === 'NoSuchBucket') {
    detailedMessage = `Bucket "${config.bucket}" not found. Verify the bucket name and region are correct.`;
  } else if (statusCode === 301) {
    detailedMessage = 'Bucket is in a different region. Check the region or endpoint configuration.';
  } else if (code === 'ENOTFOUND' || code === 'ECONNREFUSED' || code === 'NetworkingError') {
    detailedMessage = `Cannot reach S3 endpoint${config.endpoint ? ` (${config.endpoint})` : ''}.`;
  } else if (code === 'InvalidAccessKeyId') {
    detailedMessage = 'Invalid access key. Check your credentials.';
  } else if (code === 'SignatureDoesNotMatch') {
    detailedMessage = 'Invalid secret key. Check your credentials.';
  } else if (code === 'TimeoutError' || code === 'ETIMEDOUT') {
    detailedMessage = 'Connection timed out.';
  }

  return `${code}: ${detailedMessage}`;
}

export async function uploadToS3(
  config: S3UploadConfig,
  localFilePath: string,
  remoteName?: string
): Promise<{ key: string; size: number }> {
  const client = createS3Client(config);

  try {
    const key = buildS3Key(config.prefix, remoteName || path.basename(localFilePath));

    const fileStats = await stat(localFilePath);
    const fileStream = createReadStream(localFilePath);

    await client.send(
      new PutObjectCommand({
        Bucket: config.bucket,
        Key: key,
        Body: fileStream,
        ContentLength: fileStats.size,
      })
    );

    return { key, size: fileStats.size };
  } finally {
    client.destroy();
  }
}
