import { DefaultAzureCredential, type TokenCredential } from '@azure/identity';
import { ServiceError } from '../utils/errors.js';

export const COGNITIVE_SERVICES_SCOPE = 'https://cognitiveservices.azure.com/.default';
export const SEARCH_SCOPE = 'https://search.azure.com/.default';

// Refresh this long before the token actually expires
const EXPIRY_MARGIN_MS = 120000;
const DEFAULT_TOKEN_LIFETIME_MS = 15 * 60 * 1000;

interface CachedToken {
  token: string;
  expiresOnTimestamp: number;
}

export type AuthHeaderProvider = (apiKey?: string) => Promise<Record<string, string>>;

let sharedCredential: TokenCredential | null = null;

function defaultCredential(): TokenCredential {
  sharedCredential ??= new DefaultAzureCredential();
  return sharedCredential;
}

/**
 * Builds the header source for one Azure resource. A key, when given, is sent
 * as `api-key`; otherwise an Entra ID bearer token for `scope` is fetched,
 * cached until shortly before expiry and shared by concurrent callers.
 */
export function createAuthHeaderProvider(
  scope: string,
  credential: () => TokenCredential = defaultCredential
): AuthHeaderProvider {
  let cached: CachedToken | null = null;
  let refreshing: Promise<CachedToken> | null = null;

  async function refresh(): Promise<CachedToken> {
    const tokenResponse = await credential().getToken(scope);
    if (!tokenResponse?.token) {
      throw new ServiceError(`Failed to obtain an Azure AD token for ${scope}`, { code: 'AUTH_FAILED' });
    }

    cached = {
      token: tokenResponse.token,
      expiresOnTimestamp: tokenResponse.expiresOnTimestamp ?? Date.now() + DEFAULT_TOKEN_LIFETIME_MS
    };
    return cached;
  }

  return async (apiKey?: string): Promise<Record<string, string>> => {
    if (apiKey) {
      return { 'api-key': apiKey };
    }

    if (cached && cached.expiresOnTimestamp - Date.now() > EXPIRY_MARGIN_MS) {
      return { Authorization: `Bearer ${cached.token}` };
    }

    refreshing ??= refresh().finally(() => {
      refreshing = null;
    });

    const token = await refreshing;
    return { Authorization: `Bearer ${token.token}` };
  };
}
