/**
 * Upload Adapters
 *
 * One adapter per provider:
 * - s3Adapter: S3 and S3-compatible object storage
 * - gdriveAdapter: Drive API with stored OAuth tokens
 * - rcloneAdapter: anything rclone can reach
 */
import type { Provider } from '../../utils/location.js';
import type { UploadAdapter } from './types.js';
import { s3Adapter } from './s3-adapter.js';
import { gdriveAdapter } from './gdrive-adapter.js';
import { rcloneAdapter } from './rclone-adapter.js';

export { s3Adapter } from './s3-adapter.js';
export { gdriveAdapter } from './gdrive-adapter.js';
export { rcloneAdapter, createRcloneAdapter } from './rclone-adapter.js';
export type { UploadAdapter, UploadReceipt } from './types.js';

export type UploadAdapterRegistry = Record<Provider, UploadAdapter>;

export const defaultUploadAdapters: UploadAdapterRegistry = {
  s3: s3Adapter,
  gdrive: gdriveAdapter,
  rclone: rcloneAdapter,
};
