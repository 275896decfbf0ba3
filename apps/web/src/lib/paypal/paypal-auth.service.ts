/**
 * PayPal Auth Service
 *
 * Handles the OAuth 2.0 Client Credentials flow for PayPal API access.
 * Tokens are cached in memory per configuration and client id, so every
 * service instance in the process shares them.
 */

import type { PayPalCredentialService } from './paypal-credential.service';
import type {
  PayPalAccessToken,
  PayPalApiError,
  PayPalConnectionTestResult,
  PayPalCredentials,
  PayPalTokenResponse,
} from './types';
import { PayPalAuthenticationError } from './types';

// ============================================================================
// Constants
// ============================================================================

const TOKEN_PATH = '/v1/oauth2/token';

const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

// Refresh one minute before PayPal expires the token
const TOKEN_REFRESH_BUFFER_MS = 60 * 1000;

// ============================================================================
// Types
// ============================================================================

/**
 * Loads the decrypted credentials a token should be issued for
 */
export type CredentialsLoader = () => Promise<PayPalCredentials>;

interface CachedToken {
  accessToken: string;
  expiresAt: number;
}

const tokenCache = new Map<string, CachedToken>();

/**
 * Drop every cached token
 */
export function clearTokenCache(): void {
  tokenCache.clear();
}

// ============================================================================
// PayPalAuthService Class
// ============================================================================

export class PayPalAuthService {
  constructor(private loadCredentials: CredentialsLoader) {}

  /**
   * Auth service for a stored configuration; the newest active one when no name is given
   */
  static forConfiguration(
    credentialService: PayPalCredentialService,
    name?: string
  ): PayPalAuthService {
    return new PayPalAuthService(() => credentialService.getCredentials(name));
  }

  /**
   * Get a valid access token, requesting a new one when the cached token is stale
   */
  async getAccessToken(): Promise<PayPalAccessToken> {
    const credentials = await this.loadCredentials();
    const key = cacheKey(credentials);
    const cached = tokenCache.get(key);

    if (cached && Date.now() < cached.expiresAt) {
      return { accessToken: cached.accessToken, apiBaseUrl: credentials.apiBaseUrl };
    }

    const token = await this.requestToken(credentials);
    const lifetimeSeconds = token.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS;

    tokenCache.set(key, {
      accessToken: token.access_token,
      expiresAt: Date.now() + lifetimeSeconds * 1000 - TOKEN_REFRESH_BUFFER_MS,
    });

    console.log(`[PayPalAuthService] Obtained access token for ${credentials.name}`);

    return { accessToken: token.access_token, apiBaseUrl: credentials.apiBaseUrl };
  }

  /**
   * Forget the cached token for the current credentials
   */
  async invalidate(): Promise<void> {
    const credentials = await this.loadCredentials();
    tokenCache.delete(cacheKey(credentials));
  }

  /**
   * Test the PayPal connection by requesting a fresh access token
   */
  async testConnection(): Promise<PayPalConnectionTestResult> {
    try {
      await this.invalidate();
      await this.getAccessToken();
      return { success: true };
    } catch (error) {
      console.error('[PayPalAuthService] Test connection error:', error);
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Connection test failed',
      };
    }
  }

  private async requestToken(credentials: PayPalCredentials): Promise<PayPalTokenResponse> {
    const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString(
      'base64'
    );

    const response = await fetch(`${credentials.apiBaseUrl}${TOKEN_PATH}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
        'Accept-Language': 'en_US',
        Authorization: `Basic ${basic}`,
      },
      body: new URLSearchParams({
        grant_type: 'client_credentials',
      }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      console.error('[PayPalAuthService] Token request failed:', response.status);

      const errorBody = parseErrorBody(errorText);
      const message =
        errorBody?.error_description ||
        errorBody?.error ||
        `Authentication failed: ${response.status}`;

      throw new PayPalAuthenticationError(message, response.status, errorBody);
    }

    return (await response.json()) as PayPalTokenResponse;
  }
}

function cacheKey(credentials: PayPalCredentials): string {
  return `${credentials.configId}:${credentials.clientId}`;
}

function parseErrorBody(text: string): PayPalApiError | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'object' && parsed !== null ? (parsed as PayPalApiError) : undefined;
  } catch {
    return undefined;
  }
}
