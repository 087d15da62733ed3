/**
 * Cloud credential route handlers
 */

import { Response } from 'express';
import {
  saveCredentials,
  listCredentials,
  getDefaultCredential,
  type CredentialMap,
} from '../../db/cloud-credentials.js';
import {
  configureS3Schema,
  configureGdriveSchema,
  configureRcloneSchema,
  GDRIVE_SCOPES,
  GDRIVE_TOKEN_URI,
} from '../../schemas/cloud-credentials.js';
import { formatZodIssues } from '../../middleware/validate.js';
import { AuthRequest } from '../../middleware/auth.js';
import { PROVIDERS, isProvider, type Provider } from '../../utils/location.js';
import { requireOwner, sendError } from '../helpers/responses.js';

type ConfigureRequest =
  | { ok: true; credentials: CredentialMap; name: string | null; makeDefault: boolean }
  | { ok: false; details: string[] };

/**
 * Parse the request body for a provider into the credential map its adapter reads
 */
export function buildCredentialMap(provider: Provider, body: unknown): ConfigureRequest {
  switch (provider) {
    case 's3': {
      const parsed = configureS3Schema.safeParse(body);
      if (!parsed.success) return { ok: false, details: formatZodIssues(parsed.error) };
      const { access_key, secret_key, region, endpoint } = parsed.data;
      const credentials: CredentialMap = { access_key, secret_key, region };
      if (endpoint) credentials.endpoint = endpoint;
      return { ok: true, credentials, name: parsed.data.name ?? null, makeDefault: parsed.data.default };
    }
    case 'gdrive': {
      const parsed = configureGdriveSchema.safeParse(body);
      if (!parsed.success) return { ok: false, details: formatZodIssues(parsed.error) };
      const { token, refresh_token, client_id, client_secret } = parsed.data;
      return {
        ok: true,
        credentials: {
          token,
          refresh_token: refresh_token ?? null,
          token_uri: GDRIVE_TOKEN_URI,
          client_id,
          client_secret,
          scopes: GDRIVE_SCOPES,
        },
        name: parsed.data.name ?? null,
        makeDefault: parsed.data.default,
      };
    }
    case 'rclone': {
      const parsed = configureRcloneSchema.safeParse(body);
      if (!parsed.success) return { ok: false, details: formatZodIssues(parsed.error) };
      const { remote, type } = parsed.data;
      return { ok: true, credentials: { remote, type }, name: parsed.data.name ?? null, makeDefault: parsed.data.default };
    }
  }
}

/**
 * POST /configure/:provider - Save credentials for a provider
 */
export async function configureProvider(req: AuthRequest, res: Response) {
  const ownerId = requireOwner(req, res);
  if (ownerId === null) return;

  const { provider } = req.params;
  if (!isProvider(provider)) {
    res.status(400).json({ error: `Unsupported provider: ${provider}` });
    return;
  }

  const request = buildCredentialMap(provider, req.body);
  if (!request.ok) {
    res.status(400).json({ error: 'Validation failed', details: request.details });
    return;
  }

  try {
    const record = await saveCredentials(ownerId, provider, request.credentials, {
      name: request.name,
      makeDefault: request.makeDefault,
    });

    console.log(`Saved ${provider} credentials for owner ${ownerId}${record.is_default ? ' (default)' : ''}`);
    res.json({
      success: true,
      provider: record.provider,
      name: record.name,
      default: record.is_default,
    });
  } catch (error) {
    sendError(res, error, `Failed to save ${provider} credentials`);
  }
}

/**
 * GET /status - Which providers are configured, and which one is the default
 */
export async function getStatus(req: AuthRequest, res: Response) {
  const ownerId = requireOwner(req, res);
  if (ownerId === null) return;

  try {
    const [records, defaultRecord] = await Promise.all([
      listCredentials(ownerId),
      getDefaultCredential(ownerId),
    ]);

    const status: Record<string, { configured: boolean; default: boolean }> = {};
    for (const provider of PROVIDERS) {
      const record = records.find(r => r.provider === provider);
      status[provider] = {
        configured: record !== undefined,
        default: record !== undefined && defaultRecord?.id === record.id,
      };
    }

    res.json(status);
  } catch (error) {
    sendError(res, error, 'Failed to fetch cloud status');
  }
}
