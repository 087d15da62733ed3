/**
 * Generic remote-sync adapter: delegates the transfer to `rclone copy`
 */
import path from 'path';
import { rcloneDestinationSchema } from '../../schemas/destinations.js';
import { rcloneCredentialsSchema } from '../../schemas/cloud-credentials.js';
import { UploadError } from '../../utils/errors.js';
import { formatRcloneLocation } from '../../utils/location.js';
import { runCommand, type CommandRunner } from '../../utils/command.js';
import { ExecutionLog, parseUploadInput, toUploadError, type UploadAdapter, type UploadReceipt } from './types.js';

const RCLONE_BINARY = process.env.RCLONE_BINARY || 'rclone';

export function createRcloneAdapter(commandRunner: CommandRunner = runCommand): UploadAdapter {
  return {
    provider: 'rclone',
    // rclone reads remotes from its own config; stored credentials only supply a fallback remote name
    requiresCredentials: false,

    async upload(localFilePath, providerConfig, credentials): Promise<UploadReceipt> {
      const log = new ExecutionLog();

      try {
        const destination = parseUploadInput('rclone', 'destination config', rcloneDestinationSchema, providerConfig);
        const remote = destination.remote
          ?? (credentials ? parseUploadInput('rclone', 'credentials', rcloneCredentialsSchema, credentials).remote : undefined);

        if (!remote) {
          throw new UploadError('rclone', 'Invalid rclone destination config: remote is required');
        }

        const target = `${remote}:${destination.path}`;
        log.add(`Running ${RCLONE_BINARY} copy ${localFilePath} ${target}`);

        const result = await commandRunner(RCLONE_BINARY, ['copy', localFilePath, target]);
        if (result.exitCode !== 0) {
          throw new UploadError('rclone', `Rclone failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
        }

        const location = formatRcloneLocation(remote, destination.path, path.basename(localFilePath));
        log.add(`Copied to ${location}`);

        return { location, executionLog: log.toString() };
      } catch (error) {
        throw toUploadError('rclone', error, log);
      }
    }
  };
}

export const rcloneAdapter = createRcloneAdapter();
