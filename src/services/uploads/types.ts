/**
 * Shared types for upload adapters
 *
 * An adapter uploads one local file to one provider and answers with the
 * location URI of the copy. It knows nothing about jobs or history; the
 * backup runner handles those.
 */
import type { ZodType, ZodTypeDef } from 'zod';
import type { CredentialMap } from '../../db/cloud-credentials.js';
import type { Provider } from '../../utils/location.js';
import { UploadError } from '../../utils/errors.js';

export interface UploadReceipt {
  location: string;
  executionLog: string;
}

export interface UploadAdapter {
  readonly provider: Provider;
  /** The runner skips the upload with CredentialMissingError when these are required and absent */
  readonly requiresCredentials: boolean;
  /**
   * Upload a file
   * @param localFilePath - Artifact to upload
   * @param providerConfig - This provider's entry of the job's destination config
   * @param credentials - The owner's stored credentials for this provider, if any
   * @throws UploadError on any transport, auth or API failure
   */
  upload(
    localFilePath: string,
    providerConfig: Record<string, unknown>,
    credentials: CredentialMap | null
  ): Promise<UploadReceipt>;
}

/**
 * Timestamped lines kept alongside each upload result
 */
export class ExecutionLog {
  private readonly lines: string[] = [];

  add(message: string): void {
    this.lines.push(`[${new Date().toISOString()}] ${message}`);
  }

  toString(): string {
    return this.lines.join('\n');
  }
}

/**
 * Parse an adapter input, turning validation failures into an UploadError
 */
export function parseUploadInput<T>(
  provider: Provider,
  what: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new UploadError(provider, `Invalid ${provider} ${what}: ${details}`);
  }
  return result.data;
}

/**
 * Wrap any failure as an UploadError carrying the adapter's execution log
 */
export function toUploadError(provider: Provider, error: unknown, log: ExecutionLog): UploadError {
  const uploadError = error instanceof UploadError
    ? error
    : new UploadError(provider, error instanceof Error ? error.message : `Unknown ${provider} upload error`, { cause: error });
  log.add(`Upload failed: ${uploadError.message}`);
  uploadError.executionLog = log.toString();
  return uploadError;
}
