/**
 * YouTube OAuth token refresh for unattended uploads.
 */
import { z } from 'zod';
import { UploadApiError, UploadAuthMissingError, errorMessage } from '../../shared/errors.js';
import type { UploadSettings } from '../../workspace/types.js';

export type FetchFn = typeof fetch;

export const YOUTUBE_TOKEN_URI = 'https://oauth2.googleapis.com/token';

export interface YouTubeCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

export type YouTubeAuthTokens = z.infer<typeof TokenResponseSchema>;

/** Missing credentials are reported by their environment variable name. */
export function requireCredentials(credentials: UploadSettings['credentials']): YouTubeCredentials {
  if (!credentials.clientId) throw new UploadAuthMissingError('YOUTUBE_CLIENT_ID');
  if (!credentials.clientSecret) throw new UploadAuthMissingError('YOUTUBE_CLIENT_SECRET');
  if (!credentials.refreshToken) throw new UploadAuthMissingError('YOUTUBE_REFRESH_TOKEN');
  return {
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    refreshToken: credentials.refreshToken,
  };
}

export async function refreshYouTubeToken(
  credentials: YouTubeCredentials,
  opts: { fetch?: FetchFn; timeoutMs: number },
): Promise<YouTubeAuthTokens> {
  const http = opts.fetch ?? fetch;
  let resp: Response;
  try {
    resp = await http(YOUTUBE_TOKEN_URI, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret,
        refresh_token: credentials.refreshToken,
        grant_type: 'refresh_token',
      }).toString(),
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
  } catch (err) {
    throw new UploadApiError(`YouTube token refresh failed: ${errorMessage(err)}`);
  }

  if (!resp.ok) {
    throw new UploadApiError(`YouTube token refresh failed: ${resp.status}`, resp.status);
  }

  const parsed = TokenResponseSchema.safeParse(await resp.json());
  if (!parsed.success) {
    throw new UploadApiError('YouTube token refresh returned no access_token');
  }
  return parsed.data;
}
