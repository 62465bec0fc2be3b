import { google } from 'googleapis';
import { getConfig } from '@/lib/config';

// Google access tokens last an hour; sessions last longer
const DEFAULT_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

export interface GoogleAccessToken {
  accessToken: string;
  expiresAt: number;
  refreshToken: string;
}

/**
 * Trades the refresh token from the offline consent for a new access token.
 * Google only sends a refresh token again when it rotates one.
 */
export async function refreshGoogleAccessToken(refreshToken: string): Promise<GoogleAccessToken> {
  const { GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET } = getConfig();
  const client = new google.auth.OAuth2(GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET);
  client.setCredentials({ refresh_token: refreshToken });

  const { credentials } = await client.refreshAccessToken();
  if (!credentials.access_token) {
    throw new Error('Google returned no access token');
  }

  return {
    accessToken: credentials.access_token,
    expiresAt: credentials.expiry_date ?? Date.now() + DEFAULT_TOKEN_LIFETIME_MS,
    refreshToken: credentials.refresh_token ?? refreshToken,
  };
}
