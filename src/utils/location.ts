/**
 * Location URIs for uploaded artifacts.
 *
 * s3://bucket/key
 * gdrive://fileId
 * rclone://remote:path/name
 */

export const PROVIDERS = ['s3', 'gdrive', 'rclone'] as const;
export type Provider = typeof PROVIDERS[number];

export function isProvider(value: string): value is Provider {
  return (PROVIDERS as readonly string[]).includes(value);
}

export type ParsedLocation =
  | { provider: 's3'; bucket: string; key: string }
  | { provider: 'gdrive'; fileId: string }
  | { provider: 'rclone'; remote: string; path: string; name: string };

export function formatS3Location(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}

export function formatGdriveLocation(fileId: string): string {
  return `gdrive://${fileId}`;
}

export function formatRcloneLocation(remote: string, remotePath: string, name: string): string {
  return `rclone://${remote}:${remotePath}/${name}`;
}

/**
 * Identify provider and parts from a location URI. Unknown schemes give null.
 */
export function parseLocationUri(uri: string): ParsedLocation | null {
  const match = uri.match(/^([a-z0-9]+):\/\/(.+)$/);
  if (!match) return null;

  const [, scheme, rest] = match;

  switch (scheme) {
    case 's3': {
      const slash = rest.indexOf('/');
      if (slash <= 0 || slash === rest.length - 1) return null;
      return { provider: 's3', bucket: rest.slice(0, slash), key: rest.slice(slash + 1) };
    }
    case 'gdrive':
      return rest.includes('/') ? null : { provider: 'gdrive', fileId: rest };
    case 'rclone': {
      const colon = rest.indexOf(':');
      const lastSlash = rest.lastIndexOf('/');
      if (colon <= 0 || lastSlash < colon || lastSlash === rest.length - 1) return null;
      return {
        provider: 'rclone',
        remote: rest.slice(0, colon),
        path: rest.slice(colon + 1, lastSlash),
        name: rest.slice(lastSlash + 1),
      };
    }
    default:
      return null;
  }
}
